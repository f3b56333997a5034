import express, { type Response } from 'express';
import cors from 'cors';
import path from 'path';
import { z, ZodError } from 'zod';
import {
  DEFAULT_NEAR_THRESHOLD,
  DEFAULT_RATING_TABLE,
  DEFAULT_TOP_CATEGORIES,
  budgetWarnings,
  categoryBreakdown,
  currentYearMonth,
  forMonth,
  history,
  monthlyReport,
  monthlySeries,
  rating,
  totals,
} from '../../src/domain/computations.js';
import { formatAmount } from '../../src/domain/money.js';
import { AuthExhaustedError, FinanceError, type FinanceErrorCode } from '../../src/errors.js';
import { verifyPin } from '../../src/auth/pinHash.js';
import { exportCsv, toCsv } from '../../src/api/csvExport.js';
import { decodeFileContent, parseTransactionsCsv } from '../../src/api/csvParser.js';
import type { CredentialGate } from '../../src/auth/credentialGate.js';
import type { RecordStore } from '../../src/store/recordStore.js';
import type { SettingsStore } from '../../src/store/settingsStore.js';
import type { RatingTier } from '../../src/domain/types.js';
import {
  categoryView,
  monthPointView,
  monthlyReportView,
  ratingView,
  totalsView,
  transactionView,
  warningView,
} from './views.js';

export interface AppDeps {
  records: RecordStore;
  settings: SettingsStore;
  gate: CredentialGate;
  nearThreshold?: number;
  topCategories?: number;
  ratingTable?: readonly RatingTier[];
  now?: () => Date;
  /** Browser origins allowed to call the API; requests from any other origin get 403 */
  allowedOrigins?: readonly string[];
  /** Called once the response reporting PIN exhaustion has been sent */
  onExhausted?: () => void;
}

const STATUS_BY_CODE: Record<FinanceErrorCode, number> = {
  CORRUPT_DATA: 500,
  INVALID_AMOUNT: 400,
  INVALID_KIND: 400,
  INVALID_DATE: 400,
  INVALID_CATEGORY: 400,
  INVALID_PIN: 400,
  EMPTY_STORE: 409,
  AUTH_EXHAUSTED: 403,
  IO_FAILURE: 500,
};

// --- Request schemas ---

const AmountField = z.union([z.string(), z.number()]);

const TransactionBody = z.object({
  type: z.string().optional(),
  date: z.string().optional(),
  amount: AmountField,
  category: z.string().optional(),
  note: z.string().optional(),
});

const DeleteBody = z.object({ ids: z.array(z.number().int()) });
const ResetBody = z.object({ confirm: z.literal(true) });
const BudgetBody = z.object({ amount: AmountField });
const UnlockBody = z.object({ pin: z.string() });
const SetPinBody = z.object({ current: z.string().optional(), pin: z.string() });
const RemovePinBody = z.object({ current: z.string() });
const ExportBody = z.object({ path: z.string().min(1) });

const MonthQuery = z.object({
  month: z
    .string()
    .regex(/^\d{4}-(0[1-9]|1[0-2])$/, 'expected YYYY-MM')
    .optional(),
});
const YearMonthQuery = z.object({
  year: z.coerce.number().int().min(1).max(9999).optional(),
  month: z.coerce.number().int().min(1).max(12).optional(),
});
const SeriesQuery = YearMonthQuery.extend({
  months: z.coerce.number().int().min(1).max(120).default(12),
});

function handleError(res: Response, error: unknown, context: string): void {
  if (error instanceof ZodError) {
    const issue = error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    res.status(400).json({ error: `${where}${issue?.message ?? 'Invalid request'}`, code: 'BAD_REQUEST' });
    return;
  }
  if (error instanceof FinanceError) {
    const status = STATUS_BY_CODE[error.code];
    if (status >= 500) {
      console.error(`Error ${context}:`, error);
    }
    res.status(status).json({ error: error.message, code: error.code });
    return;
  }
  console.error(`Error ${context}:`, error);
  res.status(500).json({ error: `Failed ${context}` });
}

function wrongPin(res: Response): void {
  res.status(403).json({ error: 'Wrong PIN', code: 'WRONG_PIN' });
}

export function createApp(deps: AppDeps): express.Express {
  const { records, settings, gate } = deps;
  const nearThreshold = deps.nearThreshold ?? DEFAULT_NEAR_THRESHOLD;
  const topCategories = deps.topCategories ?? DEFAULT_TOP_CATEGORIES;
  const ratingTable = deps.ratingTable ?? DEFAULT_RATING_TABLE;
  const now = deps.now ?? (() => new Date());
  const allowedOrigins = deps.allowedOrigins ?? [];

  const resolveMonth = (query: z.infer<typeof YearMonthQuery>) => {
    const current = currentYearMonth(now());
    return { year: query.year ?? current.year, month: query.month ?? current.month };
  };

  const app = express();

  // Callers without an Origin header (desktop shell, scripts) pass; browsers must be listed
  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (origin !== undefined && !allowedOrigins.includes(origin)) {
      res.status(403).json({ error: 'Origin not allowed', code: 'FORBIDDEN_ORIGIN' });
      return;
    }
    next();
  });
  app.use(cors({ origin: [...allowedOrigins] }));
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    if (gate.exhausted) {
      res.status(403).json({ error: 'Too many PIN attempts', code: 'AUTH_EXHAUSTED' });
      return;
    }
    res.json({ ok: true, locked: !gate.unlocked });
  });

  // POST /unlock - one PIN attempt
  app.post('/unlock', (req, res) => {
    try {
      const { pin } = UnlockBody.parse(req.body);
      const ok = gate.attempt(pin);
      if (ok) {
        if (settings.pinNeedsUpgrade()) {
          settings.setPin(pin);
          console.log('[server] Upgraded stored PIN hash');
        }
      }
      res.status(ok ? 200 : 401).json({ unlocked: ok, remaining: gate.remaining });
    } catch (error) {
      if (error instanceof AuthExhaustedError && deps.onExhausted) {
        res.once('finish', deps.onExhausted);
      }
      handleError(res, error, 'unlocking');
    }
  });

  // Everything below needs an unlocked session
  app.use((_req, res, next) => {
    if (gate.exhausted) {
      res.status(403).json({ error: 'Too many PIN attempts', code: 'AUTH_EXHAUSTED' });
      return;
    }
    if (!gate.unlocked) {
      res.status(423).json({ error: 'PIN required', code: 'LOCKED' });
      return;
    }
    next();
  });

  // --- Transactions ---

  // GET /transactions?month=YYYY-MM - newest first
  app.get('/transactions', (req, res) => {
    try {
      const { month } = MonthQuery.parse(req.query);
      let txns = records.snapshot();
      if (month) {
        const [year, m] = month.split('-').map(Number);
        txns = forMonth(txns, year, m);
      }
      res.json(history(txns).map(transactionView));
    } catch (error) {
      handleError(res, error, 'fetching transactions');
    }
  });

  // POST /transactions - add one transaction
  app.post('/transactions', (req, res) => {
    try {
      const body = TransactionBody.parse(req.body);
      const txn = records.add({
        kind: body.type,
        date: body.date,
        amount: body.amount,
        category: body.category,
        note: body.note,
      });
      res.status(201).json(transactionView(txn));
    } catch (error) {
      handleError(res, error, 'creating transaction');
    }
  });

  // DELETE /transactions - remove by id
  app.delete('/transactions', (req, res) => {
    try {
      const { ids } = DeleteBody.parse(req.body);
      res.json({ removed: records.delete(ids) });
    } catch (error) {
      handleError(res, error, 'deleting transactions');
    }
  });

  // POST /transactions/undo - remove the most recently created transaction
  app.post('/transactions/undo', (_req, res) => {
    try {
      res.json(transactionView(records.undoLast()));
    } catch (error) {
      handleError(res, error, 'undoing last transaction');
    }
  });

  // POST /transactions/reset - delete everything; the UI must send confirm: true
  app.post('/transactions/reset', (req, res) => {
    try {
      ResetBody.parse(req.body);
      res.json({ removed: records.resetAll() });
    } catch (error) {
      handleError(res, error, 'resetting transactions');
    }
  });

  // --- Reports ---

  // GET /summary - all-time totals, rating and category breakdowns
  app.get('/summary', (_req, res) => {
    try {
      const snapshot = records.snapshot();
      const t = totals(snapshot);
      res.json({
        ...totalsView(t),
        rating: ratingView(rating(t.net, ratingTable)),
        expense_by_category: categoryBreakdown(snapshot, 'expense').map(categoryView),
        income_by_category: categoryBreakdown(snapshot, 'income').map(categoryView),
      });
    } catch (error) {
      handleError(res, error, 'computing summary');
    }
  });

  // GET /reports/monthly?year=YYYY&month=M
  app.get('/reports/monthly', (req, res) => {
    try {
      const { year, month } = resolveMonth(YearMonthQuery.parse(req.query));
      res.json(monthlyReportView(monthlyReport(records.snapshot(), year, month, topCategories)));
    } catch (error) {
      handleError(res, error, 'computing monthly report');
    }
  });

  // GET /reports/series?months=12 - trend ending at the given (or current) month
  app.get('/reports/series', (req, res) => {
    try {
      const query = SeriesQuery.parse(req.query);
      const { year, month } = resolveMonth(query);
      res.json(monthlySeries(records.snapshot(), year, month, query.months).map(monthPointView));
    } catch (error) {
      handleError(res, error, 'computing monthly series');
    }
  });

  // --- Budgets ---

  app.get('/budgets', (_req, res) => {
    try {
      const budgets = Object.entries(settings.listBudgets())
        .sort(([a], [b]) => a.toLowerCase().localeCompare(b.toLowerCase()))
        .map(([category, amount]) => ({ category, amount: formatAmount(amount) }));
      res.json(budgets);
    } catch (error) {
      handleError(res, error, 'fetching budgets');
    }
  });

  // GET /budgets/warnings?year=YYYY&month=M - NEAR/OVER budgets for the month
  app.get('/budgets/warnings', (req, res) => {
    try {
      const { year, month } = resolveMonth(YearMonthQuery.parse(req.query));
      const warnings = budgetWarnings(records.snapshot(), settings.listBudgets(), year, month, nearThreshold);
      res.json(warnings.map(warningView));
    } catch (error) {
      handleError(res, error, 'computing budget warnings');
    }
  });

  app.put('/budgets/:category', (req, res) => {
    try {
      const { amount } = BudgetBody.parse(req.body);
      const cents = settings.setBudget(req.params.category, amount);
      res.json({ category: req.params.category.trim(), amount: formatAmount(cents) });
    } catch (error) {
      handleError(res, error, 'saving budget');
    }
  });

  app.delete('/budgets/:category', (req, res) => {
    try {
      res.json({ removed: settings.removeBudget(req.params.category) });
    } catch (error) {
      handleError(res, error, 'deleting budget');
    }
  });

  // --- PIN ---

  app.get('/settings/pin', (_req, res) => {
    res.json({ enabled: settings.hasPin() });
  });

  // PUT /settings/pin - set or change; changing needs the current PIN
  app.put('/settings/pin', (req, res) => {
    try {
      const { current, pin } = SetPinBody.parse(req.body);
      const stored = settings.pinHash();
      if (stored !== null && (current === undefined || !verifyPin(current, stored))) {
        wrongPin(res);
        return;
      }
      settings.setPin(pin);
      res.json({ enabled: true });
    } catch (error) {
      handleError(res, error, 'setting PIN');
    }
  });

  app.delete('/settings/pin', (req, res) => {
    try {
      const stored = settings.pinHash();
      if (stored === null) {
        res.json({ enabled: false });
        return;
      }
      const { current } = RemovePinBody.parse(req.body);
      if (!verifyPin(current, stored)) {
        wrongPin(res);
        return;
      }
      settings.removePin();
      res.json({ enabled: false });
    } catch (error) {
      handleError(res, error, 'removing PIN');
    }
  });

  // --- CSV ---

  app.get('/export.csv', (_req, res) => {
    try {
      res.type('text/csv').attachment('export.csv').send(toCsv(records.snapshot()));
    } catch (error) {
      handleError(res, error, 'exporting CSV');
    }
  });

  // POST /export - write the CSV to a local path chosen in the UI
  app.post('/export', (req, res) => {
    try {
      const target = path.resolve(ExportBody.parse(req.body).path);
      const exported = exportCsv(records.snapshot(), target);
      res.json({ exported, path: target });
    } catch (error) {
      handleError(res, error, 'exporting CSV');
    }
  });

  // POST /import - CSV in the export layout (UTF-8 or Shift_JIS bytes)
  app.post(
    '/import',
    express.raw({ type: ['text/csv', 'text/plain', 'application/octet-stream'], limit: '10mb' }),
    (req, res) => {
      try {
        if (!Buffer.isBuffer(req.body)) {
          res.status(415).json({ error: 'Send the CSV as text/csv', code: 'BAD_REQUEST' });
          return;
        }
        const parsed = parseTransactionsCsv(decodeFileContent(req.body));
        if (parsed.error) {
          res.status(400).json({ error: parsed.error, code: 'BAD_REQUEST' });
          return;
        }
        const { inserted, skipped } = records.restore(parsed.records);
        res.json({ inserted, skipped, errors: parsed.errors });
      } catch (error) {
        handleError(res, error, 'importing CSV');
      }
    },
  );

  return app;
}
