/**
 * Record Store: owns the transaction list and transactions.json.
 *
 * Every mutation writes the full list atomically before the in-memory list is
 * swapped, so a failed write leaves memory and disk on the previous state.
 */
import { JsonFile, type FileSystem } from './jsonFile.js';
import { decodeTransactions, encodeTransaction } from './schema.js';
import { parseAmount } from '../domain/money.js';
import { compareCreated, localDate } from '../domain/computations.js';
import { EmptyStoreError, InvalidDateError, InvalidKindError } from '../errors.js';
import {
  TX_KINDS,
  UNCATEGORIZED,
  type Snapshot,
  type Transaction,
  type TransactionInput,
  type TxKind,
} from '../domain/types.js';

export interface StoreOptions {
  fs?: FileSystem;
  now?: () => Date;
}

export interface RestoreResult {
  inserted: number;
  skipped: number;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isTxKind(value: string): value is TxKind {
  const kinds: readonly string[] = TX_KINDS;
  return kinds.includes(value);
}

/** Blank means expense; anything else must be exactly one of the two kinds */
export function parseKind(raw: string | undefined): TxKind {
  const value = (raw ?? '').trim();
  if (value === '') return 'expense';
  if (!isTxKind(value)) throw new InvalidKindError(value);
  return value;
}

/** Blank means today (local calendar); otherwise a real YYYY-MM-DD date */
export function parseDate(raw: string | undefined, now: Date): string {
  const value = (raw ?? '').trim();
  if (value === '') return localDate(now);

  const match = DATE_PATTERN.exec(value);
  if (!match) throw new InvalidDateError(value);
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    throw new InvalidDateError(value);
  }
  return value;
}

export function normalizeCategory(raw: string | undefined): string {
  return (raw ?? '').trim() || UNCATEGORIZED;
}

export class RecordStore {
  private txns: Transaction[] = [];
  private lastId = 0;
  private readonly file: JsonFile;
  private readonly now: () => Date;

  constructor(filePath: string, options: StoreOptions = {}) {
    this.file = new JsonFile(filePath, options.fs);
    this.now = options.now ?? (() => new Date());
  }

  get filePath(): string {
    return this.file.filePath;
  }

  get size(): number {
    return this.txns.length;
  }

  /** Missing file starts empty; an unreadable one throws CorruptDataError */
  load(): void {
    const result = this.file.read();
    this.txns = result.found ? decodeTransactions(result.data, this.file.filePath) : [];
    this.lastId = this.txns.reduce((max, t) => Math.max(max, t.id), 0);
    console.log(`[store] Loaded ${this.txns.length} transactions from ${this.file.filePath}`);
  }

  add(input: TransactionInput): Transaction {
    const now = this.now();
    const amount = parseAmount(input.amount);
    const kind = parseKind(input.kind);
    const date = parseDate(input.date, now);

    const txn: Transaction = {
      id: Math.max(now.getTime(), this.lastId + 1),
      date,
      kind,
      amount,
      category: normalizeCategory(input.category),
      note: (input.note ?? '').trim(),
      createdAt: now.toISOString(),
    };

    this.commit([...this.txns, txn]);
    this.lastId = txn.id;
    return txn;
  }

  /** Remove the given ids; unknown ids are ignored. Returns how many were removed. */
  delete(ids: Iterable<number>): number {
    const targets = new Set(ids);
    const next = this.txns.filter((t) => !targets.has(t.id));
    const removed = this.txns.length - next.length;
    if (removed > 0) {
      this.commit(next);
    }
    return removed;
  }

  /** Remove the most recently created record, whatever its position or date */
  undoLast(): Transaction {
    if (this.txns.length === 0) {
      throw new EmptyStoreError();
    }

    const latest = this.txns.reduce((best, t) => (compareCreated(t, best) > 0 ? t : best));

    this.commit(this.txns.filter((t) => t.id !== latest.id));
    return latest;
  }

  /** Clears every record. Irreversible; callers confirm with the user first. */
  resetAll(): number {
    const removed = this.txns.length;
    this.commit([]);
    return removed;
  }

  /**
   * Merge complete records (e.g. from a CSV export) keeping their ids.
   * Ids already present, or repeated within the batch, are skipped.
   */
  restore(records: readonly Transaction[]): RestoreResult {
    const ids = new Set(this.txns.map((t) => t.id));
    const incoming: Transaction[] = [];
    for (const record of records) {
      if (ids.has(record.id)) continue;
      ids.add(record.id);
      incoming.push({ ...record });
    }

    if (incoming.length > 0) {
      const lastId = incoming.reduce((max, t) => Math.max(max, t.id), this.lastId);
      this.commit([...this.txns, ...incoming]);
      this.lastId = lastId;
    }
    return { inserted: incoming.length, skipped: records.length - incoming.length };
  }

  /** Frozen copy for aggregation; never the live list */
  snapshot(): Snapshot {
    return Object.freeze(this.txns.map((t) => Object.freeze({ ...t })));
  }

  /**
   * Move a corrupt transactions file aside and continue with an empty list.
   * Returns where the old file went, or null if there was none.
   */
  quarantine(): string | null {
    const movedTo = this.file.quarantine(this.now());
    this.txns = [];
    if (movedTo) {
      console.warn(`[store] Moved unreadable ${this.file.filePath} to ${movedTo}; starting empty`);
    }
    return movedTo;
  }

  private commit(next: Transaction[]): void {
    this.file.write(next.map(encodeTransaction));
    this.txns = next;
  }
}
