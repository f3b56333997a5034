/**
 * Domain types for the ledger.
 * Pure data, no IO. All money is integer cents.
 */

export type TxKind = 'income' | 'expense';

export const TX_KINDS: readonly TxKind[] = ['income', 'expense'];

/** Canonical transaction as held in memory */
export interface Transaction {
  id: number;                  // ms epoch at creation, unique
  date: string;                // YYYY-MM-DD
  kind: TxKind;
  amount: number;              // cents, >= 0
  category: string;
  note: string;
  createdAt: string;           // ISO timestamp
}

/** Caller-supplied fields for a new transaction; everything is raw user input */
export interface TransactionInput {
  kind?: string;
  date?: string;
  amount: string | number;     // decimal units, e.g. "12.50" or 12.5
  category?: string;
  note?: string;
}

/** Read-only view handed to the aggregation functions */
export type Snapshot = readonly Readonly<Transaction>[];

/** category → monthly limit (cents) */
export type Budgets = Record<string, number>;

export interface Totals {
  income: number;
  expense: number;
  net: number;
}

export interface CategoryTotal {
  category: string;
  amount: number;
}

export interface MonthlyReport extends Totals {
  month: string;               // YYYY-MM
  count: number;
  topExpenseCategories: CategoryTotal[];
}

export interface MonthPoint extends Totals {
  month: string;               // YYYY-MM
}

export type BudgetStatus = 'NEAR' | 'OVER';

export interface BudgetWarning {
  category: string;
  status: BudgetStatus;
  spent: number;
  budget: number;
  percent: number;             // 85 means 85%
}

export interface RatingTier {
  min: number;                 // inclusive lower bound on net, cents
  label: string;
  message: string;
}

/** Uncategorized sentinel keeps aggregation keys stable */
export const UNCATEGORIZED = 'Uncategorized';
