/**
 * On-disk shapes for transactions.json and settings.json.
 *
 * Field names stay as earlier versions wrote them (`type`, `created_at`,
 * `pin_hash`) and amounts stay decimal, so older readers keep working.
 * Optional fields that are missing or malformed fall back to defaults;
 * anything required that fails raises CorruptDataError.
 */
import { z } from 'zod';
import { CorruptDataError } from '../errors.js';
import { fromDecimal, toDecimal } from '../domain/money.js';
import { UNCATEGORIZED, type Budgets, type Transaction } from '../domain/types.js';

export const StoredTransaction = z.object({
  id: z.number().int().nonnegative(),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  type: z.enum(['income', 'expense']),
  amount: z.number().finite().nonnegative(),
  category: z.string().catch(UNCATEGORIZED),
  note: z.string().catch(''),
  created_at: z
    .string()
    .refine((value) => !Number.isNaN(Date.parse(value)), 'expected a timestamp')
    .optional()
    .catch(undefined),
});
export type StoredTransaction = z.infer<typeof StoredTransaction>;

export const StoredTransactions = z.array(StoredTransaction);

export const StoredSettings = z.object({
  pin_hash: z.string().nullable().default(null),
  budgets: z.record(z.string(), z.number().finite().nonnegative()).default({}),
});
export type StoredSettings = z.infer<typeof StoredSettings>;

export interface Settings {
  pinHash: string | null;
  budgets: Budgets;
}

export function defaultSettings(): Settings {
  return { pinHash: null, budgets: {} };
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'unexpected structure';
  const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
  return `${where}: ${issue.message}`;
}

export function decodeTransactions(data: unknown, file: string): Transaction[] {
  const parsed = StoredTransactions.safeParse(data);
  if (!parsed.success) {
    throw new CorruptDataError(file, describeIssue(parsed.error));
  }

  const seen = new Set<number>();
  return parsed.data.map((row) => {
    if (seen.has(row.id)) {
      throw new CorruptDataError(file, `duplicate id ${row.id}`);
    }
    seen.add(row.id);
    return {
      id: row.id,
      date: row.date,
      kind: row.type,
      amount: fromDecimal(row.amount),
      category: row.category.trim() || UNCATEGORIZED,
      note: row.note,
      // Records written before created_at existed: the id is the creation time in ms
      createdAt: row.created_at ?? new Date(row.id).toISOString(),
    };
  });
}

export function encodeTransaction(txn: Readonly<Transaction>): StoredTransaction {
  return {
    id: txn.id,
    date: txn.date,
    type: txn.kind,
    amount: toDecimal(txn.amount),
    category: txn.category,
    note: txn.note,
    created_at: txn.createdAt,
  };
}

export function decodeSettings(data: unknown, file: string): Settings {
  const parsed = StoredSettings.safeParse(data);
  if (!parsed.success) {
    throw new CorruptDataError(file, describeIssue(parsed.error));
  }

  const budgets: Budgets = {};
  for (const [category, amount] of Object.entries(parsed.data.budgets)) {
    budgets[category] = fromDecimal(amount);
  }
  return { pinHash: parsed.data.pin_hash, budgets };
}

export function encodeSettings(settings: Settings): StoredSettings {
  const budgets: Record<string, number> = {};
  for (const [category, amount] of Object.entries(settings.budgets)) {
    budgets[category] = toDecimal(amount);
  }
  return { pin_hash: settings.pinHash, budgets };
}
