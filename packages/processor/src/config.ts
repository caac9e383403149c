import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';

export const DEFAULT_DIR = join(homedir(), '.statement-ledger');
export const DEFAULT_DB_PATH = join(DEFAULT_DIR, 'ledger.db');

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

export const ConfigSchema = z.object({
  dbPath: z.string().min(1),
  baseCurrency: z.string().regex(/^[A-Z]{3}$/, 'must be a three-letter currency code'),
  forexTolerance: z.coerce.number().nonnegative(),
  consolidateAccounts: booleanFlag,
  optionMultiplier: z.coerce.number().positive(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
});

export type ProcessorConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: ProcessorConfig = {
  dbPath: DEFAULT_DB_PATH,
  baseCurrency: 'USD',
  forexTolerance: 0.01,
  consolidateAccounts: false,
  optionMultiplier: 100,
  logLevel: 'info',
};

const ENV_KEYS: Record<keyof ProcessorConfig, string> = {
  dbPath: 'STATEMENT_DB_PATH',
  baseCurrency: 'STATEMENT_BASE_CURRENCY',
  forexTolerance: 'STATEMENT_FOREX_TOLERANCE',
  consolidateAccounts: 'STATEMENT_CONSOLIDATE_ACCOUNTS',
  optionMultiplier: 'STATEMENT_OPTION_MULTIPLIER',
  logLevel: 'STATEMENT_LOG_LEVEL',
};

/**
 * Resolve configuration from defaults, then environment variables, then
 * explicit overrides. Throws with every invalid key listed.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ProcessorConfig> = {},
): ProcessorConfig {
  const fromEnv: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') fromEnv[key] = value.trim();
  }

  const result = ConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...fromEnv, ...overrides });
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return result.data;
}
