/**
 * Runtime configuration from environment variables.
 */
import path from 'path';
import { z } from 'zod';
import { DEFAULT_PIN_ATTEMPTS } from './auth/credentialGate.js';
import { DEFAULT_NEAR_THRESHOLD, DEFAULT_TOP_CATEGORIES } from './domain/computations.js';

const EnvSchema = z.object({
  LEDGER_DATA_DIR: z.string().min(1).default('data'),
  LEDGER_HOST: z.string().min(1).default('127.0.0.1'),
  LEDGER_PORT: z.coerce.number().int().min(0).max(65535).default(8787),
  LEDGER_ON_CORRUPT: z.enum(['abort', 'start-empty']).default('abort'),
  LEDGER_NEAR_THRESHOLD: z.coerce.number().gt(0).max(1).default(DEFAULT_NEAR_THRESHOLD),
  LEDGER_TOP_CATEGORIES: z.coerce.number().int().min(1).default(DEFAULT_TOP_CATEGORIES),
  LEDGER_PIN_ATTEMPTS: z.coerce.number().int().min(1).default(DEFAULT_PIN_ATTEMPTS),
  // Comma-separated browser origins allowed to call the API, e.g. http://localhost:5173
  LEDGER_UI_ORIGINS: z
    .string()
    .default('')
    .transform((value) => value.split(',').map((origin) => origin.trim()).filter((origin) => origin !== ''))
    .pipe(z.array(z.string().url())),
});

export type CorruptPolicy = 'abort' | 'start-empty';

export interface AppConfig {
  dataDir: string;
  transactionsFile: string;
  settingsFile: string;
  host: string;
  port: number;
  onCorrupt: CorruptPolicy;
  nearThreshold: number;
  topCategories: number;
  pinAttempts: number;
  allowedOrigins: string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const dataDir = path.resolve(cwd, values.LEDGER_DATA_DIR);
  return {
    dataDir,
    transactionsFile: path.join(dataDir, 'transactions.json'),
    settingsFile: path.join(dataDir, 'settings.json'),
    host: values.LEDGER_HOST,
    port: values.LEDGER_PORT,
    onCorrupt: values.LEDGER_ON_CORRUPT,
    nearThreshold: values.LEDGER_NEAR_THRESHOLD,
    topCategories: values.LEDGER_TOP_CATEGORIES,
    pinAttempts: values.LEDGER_PIN_ATTEMPTS,
    allowedOrigins: values.LEDGER_UI_ORIGINS,
  };
}
