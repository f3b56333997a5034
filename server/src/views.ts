/**
 * JSON shapes served to the UI. Amounts leave the core as cents and are
 * rendered here as two-decimal strings.
 */
import { formatAmount } from '../../src/domain/money.js';
import type {
  BudgetWarning,
  CategoryTotal,
  MonthPoint,
  MonthlyReport,
  RatingTier,
  Totals,
  Transaction,
} from '../../src/domain/types.js';

export interface TransactionView {
  id: number;
  date: string;
  type: string;
  amount: string;
  category: string;
  note: string;
  created_at: string;
}

export interface TotalsView {
  income: string;
  expense: string;
  net: string;
}

export function transactionView(t: Readonly<Transaction>): TransactionView {
  return {
    id: t.id,
    date: t.date,
    type: t.kind,
    amount: formatAmount(t.amount),
    category: t.category,
    note: t.note,
    created_at: t.createdAt,
  };
}

export function totalsView(t: Totals): TotalsView {
  return {
    income: formatAmount(t.income),
    expense: formatAmount(t.expense),
    net: formatAmount(t.net),
  };
}

export function categoryView(c: CategoryTotal): { category: string; amount: string } {
  return { category: c.category, amount: formatAmount(c.amount) };
}

export function monthlyReportView(r: MonthlyReport) {
  return {
    month: r.month,
    count: r.count,
    ...totalsView(r),
    top_expense_categories: r.topExpenseCategories.map(categoryView),
  };
}

export function monthPointView(p: MonthPoint) {
  return { month: p.month, ...totalsView(p) };
}

export function warningView(w: BudgetWarning) {
  return {
    category: w.category,
    status: w.status,
    spent: formatAmount(w.spent),
    budget: formatAmount(w.budget),
    percent: w.percent,
  };
}

export function ratingView(tier: RatingTier) {
  return { label: tier.label, message: tier.message };
}
