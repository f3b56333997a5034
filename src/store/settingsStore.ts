/**
 * Settings Store: budgets and the PIN hash, persisted to settings.json
 * with the same atomic-write discipline as the Record Store.
 */
import { JsonFile } from './jsonFile.js';
import { defaultSettings, decodeSettings, encodeSettings, type Settings } from './schema.js';
import type { StoreOptions } from './recordStore.js';
import { hashPin, needsRehash, type ScryptParams } from '../auth/pinHash.js';
import { parseAmount } from '../domain/money.js';
import { InvalidCategoryError } from '../errors.js';
import type { Budgets } from '../domain/types.js';

export interface SettingsStoreOptions extends StoreOptions {
  scrypt?: ScryptParams;
}

export class SettingsStore {
  private settings: Settings = defaultSettings();
  private readonly file: JsonFile;
  private readonly now: () => Date;
  private readonly scrypt: ScryptParams | undefined;

  constructor(filePath: string, options: SettingsStoreOptions = {}) {
    this.file = new JsonFile(filePath, options.fs);
    this.now = options.now ?? (() => new Date());
    this.scrypt = options.scrypt;
  }

  get filePath(): string {
    return this.file.filePath;
  }

  load(): void {
    const result = this.file.read();
    this.settings = result.found
      ? decodeSettings(result.data, this.file.filePath)
      : defaultSettings();
    console.log(
      `[settings] Loaded ${Object.keys(this.settings.budgets).length} budgets, PIN ${this.settings.pinHash ? 'on' : 'off'}`,
    );
  }

  // --- Budgets ---

  /** Set or overwrite the monthly limit for a category; returns the stored cents */
  setBudget(category: string, amount: string | number): number {
    const key = category.trim();
    if (key === '') {
      throw new InvalidCategoryError();
    }
    const cents = parseAmount(amount);
    this.commit({ ...this.settings, budgets: { ...this.settings.budgets, [key]: cents } });
    return cents;
  }

  /** Returns false (and writes nothing) when the category had no budget */
  removeBudget(category: string): boolean {
    const key = category.trim();
    if (!Object.prototype.hasOwnProperty.call(this.settings.budgets, key)) {
      return false;
    }
    const budgets = { ...this.settings.budgets };
    delete budgets[key];
    this.commit({ ...this.settings, budgets });
    return true;
  }

  listBudgets(): Readonly<Budgets> {
    return Object.freeze({ ...this.settings.budgets });
  }

  // --- PIN ---

  setPin(pin: string): void {
    this.commit({ ...this.settings, pinHash: hashPin(pin, this.scrypt) });
  }

  removePin(): void {
    this.commit({ ...this.settings, pinHash: null });
  }

  hasPin(): boolean {
    return this.settings.pinHash !== null;
  }

  pinHash(): string | null {
    return this.settings.pinHash;
  }

  /** True when a PIN is set but was hashed with a legacy scheme or weaker parameters */
  pinNeedsUpgrade(): boolean {
    const stored = this.settings.pinHash;
    return stored !== null && needsRehash(stored, this.scrypt);
  }

  /** Move an unreadable settings file aside and continue with defaults */
  quarantine(): string | null {
    const movedTo = this.file.quarantine(this.now());
    this.settings = defaultSettings();
    if (movedTo) {
      console.warn(`[settings] Moved unreadable ${this.file.filePath} to ${movedTo}; using defaults`);
    }
    return movedTo;
  }

  private commit(next: Settings): void {
    this.file.write(encodeSettings(next));
    this.settings = next;
  }
}
