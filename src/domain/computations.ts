/**
 * Pure aggregation over a ledger snapshot.
 * No IO and no caching: the same snapshot and arguments give the same result.
 */
import type {
  Snapshot,
  Transaction,
  TxKind,
  Totals,
  CategoryTotal,
  MonthlyReport,
  MonthPoint,
  Budgets,
  BudgetWarning,
  RatingTier,
} from './types.js';

/**
 * Illustrative savings tiers over net (cents), highest bound first.
 * Pass your own table to `rating` to change the bands.
 */
export const DEFAULT_RATING_TABLE: readonly RatingTier[] = [
  { min: 1_000_000, label: 'Excellent', message: 'Savings are in excellent shape.' },
  { min: 50_000, label: 'Good', message: 'Savings are healthy.' },
  { min: 0, label: 'Tight', message: 'Income barely covers spending.' },
  { min: Number.NEGATIVE_INFINITY, label: 'Deficit', message: 'Spending exceeds income.' },
];

export const DEFAULT_NEAR_THRESHOLD = 0.8;
export const DEFAULT_TOP_CATEGORIES = 10;

/** Code-point order, locale independent */
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** YYYY-MM for a calendar month (1-12) */
export function monthKey(year: number, month: number): string {
  if (!Number.isInteger(year) || !Number.isInteger(month) || month < 1 || month > 12) {
    throw new RangeError(`Invalid month ${year}-${month}`);
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

/** Filter transactions to a single calendar month */
export function forMonth<T extends Readonly<Transaction>>(txns: readonly T[], year: number, month: number): T[] {
  const prefix = `${monthKey(year, month)}-`;
  return txns.filter((t) => t.date.startsWith(prefix));
}

export function ofKind<T extends Readonly<Transaction>>(txns: readonly T[], kind: TxKind): T[] {
  return txns.filter((t) => t.kind === kind);
}

function sum(txns: Snapshot): number {
  return txns.reduce((total, t) => total + t.amount, 0);
}

export function totals(txns: Snapshot): Totals {
  const income = sum(ofKind(txns, 'income'));
  const expense = sum(ofKind(txns, 'expense'));
  return { income, expense, net: income - expense };
}

/** First tier whose lower bound the net reaches; the lowest tier when none does */
export function rating(net: number, table: readonly RatingTier[] = DEFAULT_RATING_TABLE): RatingTier {
  if (table.length === 0) {
    throw new RangeError('Rating table is empty');
  }
  const ordered = [...table].sort((a, b) => b.min - a.min);
  return ordered.find((tier) => net >= tier.min) ?? ordered[ordered.length - 1];
}

/** Summed amount per category for one kind, largest first, ties by name */
export function categoryBreakdown(txns: Snapshot, kind: TxKind): CategoryTotal[] {
  const map = new Map<string, number>();
  for (const t of ofKind(txns, kind)) {
    map.set(t.category, (map.get(t.category) ?? 0) + t.amount);
  }
  return Array.from(map.entries())
    .map(([category, amount]) => ({ category, amount }))
    .sort((a, b) => b.amount - a.amount || compareText(a.category, b.category));
}

export function monthlyReport(
  txns: Snapshot,
  year: number,
  month: number,
  topN: number = DEFAULT_TOP_CATEGORIES,
): MonthlyReport {
  const monthTxns = forMonth(txns, year, month);
  return {
    month: monthKey(year, month),
    ...totals(monthTxns),
    count: monthTxns.length,
    topExpenseCategories: categoryBreakdown(monthTxns, 'expense').slice(0, Math.max(0, topN)),
  };
}

/**
 * Budgets at or past the near threshold for the month.
 * OVER means spent > budget; NEAR means spent >= threshold × budget.
 * Zero budgets carry no limit to warn against and are skipped.
 */
export function budgetWarnings(
  txns: Snapshot,
  budgets: Readonly<Budgets>,
  year: number,
  month: number,
  nearThreshold: number = DEFAULT_NEAR_THRESHOLD,
): BudgetWarning[] {
  const spentByCategory = new Map(
    categoryBreakdown(forMonth(txns, year, month), 'expense').map((c) => [c.category, c.amount]),
  );

  const warnings: BudgetWarning[] = [];
  for (const [category, budget] of Object.entries(budgets)) {
    if (budget <= 0) continue;
    const spent = spentByCategory.get(category) ?? 0;
    const percent = Math.round((spent * 10000) / budget) / 100;
    if (spent > budget) {
      warnings.push({ category, status: 'OVER', spent, budget, percent });
    } else if (spent >= budget * nearThreshold) {
      warnings.push({ category, status: 'NEAR', spent, budget, percent });
    }
  }
  return warnings.sort((a, b) => b.percent - a.percent || compareText(a.category, b.category));
}

/**
 * The `count` months ending at (endYear, endMonth), oldest first.
 */
export function lastNMonths(count: number, endYear: number, endMonth: number): { year: number; month: number }[] {
  if (count <= 0) return [];

  return Array.from({ length: count }, (_, index) => {
    const offset = endYear * 12 + (endMonth - 1) - (count - 1 - index);
    return { year: Math.floor(offset / 12), month: (offset % 12) + 1 };
  });
}

/** Per-month income/expense/net for a trend chart */
export function monthlySeries(txns: Snapshot, endYear: number, endMonth: number, count = 12): MonthPoint[] {
  return lastNMonths(count, endYear, endMonth).map(({ year, month }) => ({
    month: monthKey(year, month),
    ...totals(forMonth(txns, year, month)),
  }));
}

/** Creation instant in ms. Zone-less stamps from older files read as local time. */
export function createdTime(t: Readonly<Transaction>): number {
  return Date.parse(t.createdAt);
}

/** Oldest created first; same instant falls back to id */
export function compareCreated(a: Readonly<Transaction>, b: Readonly<Transaction>): number {
  return createdTime(a) - createdTime(b) || a.id - b.id;
}

/** Newest first: date desc, then creation time desc */
export function history<T extends Readonly<Transaction>>(txns: readonly T[]): T[] {
  return [...txns].sort((a, b) => compareText(b.date, a.date) || compareCreated(b, a));
}

/** Local calendar year and month */
export function currentYearMonth(now: Date = new Date()): { year: number; month: number } {
  return { year: now.getFullYear(), month: now.getMonth() + 1 };
}

/** Local calendar date as YYYY-MM-DD */
export function localDate(now: Date = new Date()): string {
  const { year, month } = currentYearMonth(now);
  return `${monthKey(year, month)}-${String(now.getDate()).padStart(2, '0')}`;
}
