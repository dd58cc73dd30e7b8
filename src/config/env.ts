/**
 * ENVIRONMENT CONFIG
 *
 * All settings come from process.env (loaded by `dotenv/config` at the entry
 * point) and are validated once with zod. Every setting has a default except
 * the FX API key, whose absence is reported when rates are first requested.
 */

import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8001),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
    CORS_ORIGINS: z.string().default('*'),

    // Panel file
    PANEL_CSV_PATH: z.string().min(1).default('data/imf_dataset.csv'),
    PANEL_COUNTRY_COLUMN: z.string().min(1).default('COUNTRY'),
    PANEL_INDICATOR_COLUMN: z.string().min(1).default('INDICATOR'),
    PANEL_FIRST_YEAR: z.coerce.number().int().min(1900).default(2020),
    PANEL_LAST_YEAR: z.coerce.number().int().max(2200).default(2026),

    // Allocation
    HEALTH_PROFILE: z.enum(['strict', 'relaxed']).default('relaxed'),
    FX_HISTORICAL_ENABLED: booleanFlag.default('true'),
    SUMMARY_TOP_N: z.coerce.number().int().min(1).max(50).default(10),

    // Upstream services
    FREECURRENCY_API_KEY: z.string().default(''),
    FX_API_BASE: z.string().url().default('https://api.freecurrencyapi.com/v1'),
    COUNTRY_API_BASE: z.string().url().default('https://restcountries.com/v3.1'),
    HTTPS_PROXY_URL: z.string().url().optional(),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    HTTP_RETRY_ATTEMPTS: z.coerce.number().int().min(0).max(10).default(3),
    HTTP_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
    HTTP_RETRY_MAX_BACKOFF_MS: z.coerce.number().int().min(0).default(8000),

    // Refresh
    SNAPSHOT_MAX_AGE_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
    REFRESH_ENABLED: booleanFlag.default('true'),
    REFRESH_CRON: z.string().default('0 * * * *'),
  })
  .refine(e => e.PANEL_FIRST_YEAR <= e.PANEL_LAST_YEAR, {
    message: 'PANEL_FIRST_YEAR must not be after PANEL_LAST_YEAR',
    path: ['PANEL_FIRST_YEAR'],
  });

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  // Empty strings count as unset so defaults apply
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(i => `${i.path.join('.') || 'env'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

export function hasFxApiKey(env: Env): boolean {
  return env.FREECURRENCY_API_KEY.trim().length > 0;
}
