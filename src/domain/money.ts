/**
 * Fixed-point money helpers.
 * Amounts live as integer cents; decimals only appear at the file and display boundary.
 */
import { InvalidAmountError } from '../errors.js';

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parse user input ("12.50", "12", 12.5) into cents.
 * Rejects negatives, non-numbers and more than two decimal places.
 */
export function parseAmount(value: string | number): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidAmountError(`Amount must be a number, got ${value}`);
    }
    if (value < 0) {
      throw new InvalidAmountError('Amount must not be negative');
    }
    const cents = Math.round(value * 100);
    if (Math.abs(value * 100 - cents) > 1e-6) {
      throw new InvalidAmountError(`Amount ${value} has more than two decimal places`);
    }
    return checkedCents(cents, String(value));
  }

  const text = value.trim();
  if (text.startsWith('-')) {
    throw new InvalidAmountError('Amount must not be negative');
  }
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new InvalidAmountError(`Amount must be a decimal number, got '${value}'`);
  }
  const whole = Number(match[1]);
  const fraction = Number((match[2] ?? '').padEnd(2, '0'));
  return checkedCents(whole * 100 + fraction, text);
}

function checkedCents(cents: number, raw: string): number {
  if (!Number.isSafeInteger(cents)) {
    throw new InvalidAmountError(`Amount ${raw} is too large`);
  }
  return cents;
}

/** Decimal number as written to JSON files (1234.5 for 123450 cents) */
export function toDecimal(cents: number): number {
  return cents / 100;
}

/** Read a decimal amount back from a data file; tolerant of float noise */
export function fromDecimal(amount: number): number {
  return Math.round(amount * 100);
}

/** Display string with exactly two decimals: 123450 → "1234.50", -5000 → "-50.00" */
export function formatAmount(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}
