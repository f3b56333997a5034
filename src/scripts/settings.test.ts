/**
 * Settings Store tests: budgets and PIN persistence.
 */
import { createHash } from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { SettingsStore } from '../store/settingsStore.js';
import { verifyPin, type ScryptParams } from '../auth/pinHash.js';
import { CorruptDataError, InvalidAmountError, InvalidCategoryError, InvalidPinError } from '../errors.js';

// Cheap parameters; production strength is exercised in credentials.test.ts
const FAST_SCRYPT: ScryptParams = { N: 1024, r: 8, p: 1, keyLength: 32, saltLength: 16 };

let dir: string;
let file: string;

function openSettings(): SettingsStore {
  const store = new SettingsStore(file, { scrypt: FAST_SCRYPT, now: () => new Date(Date.UTC(2025, 0, 15)) });
  store.load();
  return store;
}

function stored(): unknown {
  return JSON.parse(fs.readFileSync(file, 'utf-8'));
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-settings-'));
  file = path.join(dir, 'settings.json');
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('budgets', () => {
  test('setBudget: persists decimal amounts keyed by category', () => {
    const settings = openSettings();
    expect(settings.setBudget('Food', '100')).toBe(10000);
    expect(settings.setBudget(' Fun ', 25.5)).toBe(2550);

    expect(stored()).toEqual({ pin_hash: null, budgets: { Food: 100, Fun: 25.5 } });
    expect(openSettings().listBudgets()).toEqual({ Food: 10000, Fun: 2550 });
  });

  test('setBudget: overwrites an existing limit', () => {
    const settings = openSettings();
    settings.setBudget('Food', '100');
    settings.setBudget('Food', '80');
    expect(settings.listBudgets()).toEqual({ Food: 8000 });
  });

  test('setBudget: zero is allowed', () => {
    const settings = openSettings();
    expect(settings.setBudget('Gifts', '0')).toBe(0);
    expect(settings.listBudgets()).toEqual({ Gifts: 0 });
  });

  test('setBudget: invalid input writes nothing', () => {
    const settings = openSettings();
    expect(() => settings.setBudget('  ', '10')).toThrow(InvalidCategoryError);
    expect(() => settings.setBudget('Food', '-10')).toThrow(InvalidAmountError);
    expect(() => settings.setBudget('Food', 'lots')).toThrow(InvalidAmountError);
    expect(settings.listBudgets()).toEqual({});
    expect(fs.existsSync(file)).toBe(false);
  });

  test('removeBudget: removes only what exists', () => {
    const settings = openSettings();
    settings.setBudget('Food', '100');

    expect(settings.removeBudget('Travel')).toBe(false);
    expect(settings.removeBudget('Food')).toBe(true);
    expect(settings.removeBudget('Food')).toBe(false);
    expect(stored()).toEqual({ pin_hash: null, budgets: {} });
  });

  test('listBudgets: frozen copy', () => {
    const settings = openSettings();
    settings.setBudget('Food', '100');
    const list = settings.listBudgets();
    settings.setBudget('Fun', '5');

    expect(Object.isFrozen(list)).toBe(true);
    expect(list).toEqual({ Food: 10000 });
  });
});

describe('pin', () => {
  test('setPin: stores a salted hash, never the PIN', () => {
    const settings = openSettings();
    settings.setPin('4321');

    const text = fs.readFileSync(file, 'utf-8');
    expect(text).not.toContain('"4321"');
    expect(settings.hasPin()).toBe(true);

    const reopened = openSettings();
    const hash = reopened.pinHash();
    expect(hash?.startsWith('scrypt$1024$8$1$')).toBe(true);
    expect(verifyPin('4321', hash ?? '')).toBe(true);
    expect(verifyPin('1234', hash ?? '')).toBe(false);
  });

  test('setPin: same PIN twice gives different hashes', () => {
    const settings = openSettings();
    settings.setPin('4321');
    const first = settings.pinHash();
    settings.setPin('4321');
    expect(settings.pinHash()).not.toBe(first);
  });

  test('setPin: empty PIN is rejected', () => {
    const settings = openSettings();
    expect(() => settings.setPin('')).toThrow(InvalidPinError);
    expect(settings.hasPin()).toBe(false);
  });

  test('removePin: clears the hash and keeps budgets', () => {
    const settings = openSettings();
    settings.setBudget('Food', '100');
    settings.setPin('4321');
    settings.removePin();

    expect(settings.hasPin()).toBe(false);
    expect(stored()).toEqual({ pin_hash: null, budgets: { Food: 100 } });
  });

  test('load: legacy SHA-256 hash still verifies', () => {
    const legacy = createHash('sha256').update('0000').digest('hex');
    fs.writeFileSync(file, JSON.stringify({ pin_hash: legacy, budgets: {} }));

    const settings = openSettings();
    expect(settings.pinHash()).toBe(legacy);
    expect(verifyPin('0000', legacy)).toBe(true);
  });
});

describe('load', () => {
  test('load: missing file means no PIN and no budgets', () => {
    const settings = openSettings();
    expect(settings.hasPin()).toBe(false);
    expect(settings.listBudgets()).toEqual({});
  });

  test('load: missing keys fall back to defaults', () => {
    fs.writeFileSync(file, '{}');
    const settings = openSettings();
    expect(settings.hasPin()).toBe(false);
    expect(settings.listBudgets()).toEqual({});
  });

  test.each([
    ['not JSON', 'pin'],
    ['list instead of object', '[]'],
    ['negative budget', '{"budgets": {"Food": -5}}'],
    ['non-numeric budget', '{"budgets": {"Food": "lots"}}'],
    ['numeric pin hash', '{"pin_hash": 1234}'],
  ])('load: %s is CorruptDataError', (_label, contents) => {
    fs.writeFileSync(file, contents);
    expect(() => openSettings()).toThrow(CorruptDataError);
  });

  test('quarantine: moves the file aside and uses defaults', () => {
    fs.writeFileSync(file, '[]');
    const settings = new SettingsStore(file, { now: () => new Date(Date.UTC(2025, 0, 15)) });
    expect(() => settings.load()).toThrow(CorruptDataError);

    expect(settings.quarantine()).toBe(`${file}.corrupt-2025-01-15T00-00-00-000Z`);
    expect(settings.hasPin()).toBe(false);
    expect(fs.existsSync(file)).toBe(false);
  });
});

describe('pinNeedsUpgrade', () => {
  test('pinNeedsUpgrade: legacy digests only', () => {
    const settings = openSettings();
    expect(settings.pinNeedsUpgrade()).toBe(false);

    settings.setPin('4321');
    expect(settings.pinNeedsUpgrade()).toBe(false);

    fs.writeFileSync(file, JSON.stringify({ pin_hash: createHash('sha256').update('4321').digest('hex') }));
    expect(openSettings().pinNeedsUpgrade()).toBe(true);
  });
});
