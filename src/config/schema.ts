/**
 * Zod schemas for process environment and JSON configuration files.
 */
import { z } from 'zod';
import { isTimeZone } from '@/core/types.js';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const optionalNonEmpty = z
  .string()
  .optional()
  .transform((value) => (value === '' ? undefined : value));

// ─── Environment ────────────────────────────────────────────────

/**
 * Schema for the variables read by every process (API, worker, beat, CLIs).
 * Connection strings are validated separately in the loader because their
 * two accepted shapes need cross-field checks.
 */
export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  API_V1_STR: z
    .string()
    .regex(/^\/[A-Za-z0-9_\-/]*$/, 'API prefix must start with "/"')
    .default('/api_v1'),
  BACKEND_CORS_ORIGINS: optionalNonEmpty,

  DATABASE_DSN: optionalNonEmpty,
  DB_PORT: z.coerce.number().int().min(1).max(65_535).optional(),
  STORE_CONNECT_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(30),
  MIGRATE_ON_START: booleanFromEnv.default('true'),
  MIGRATIONS_DIR: z.string().min(1).default('migrations'),

  REDIS_URL: z.string().url().default('redis://redis:6379'),
  REDIS_EXPIRATION_TIME: z.coerce.number().int().min(1).default(24 * 60 * 60),

  SPIMEX_BULLETIN_URL: z
    .string()
    .url()
    .default('https://spimex.com/upload/reports/oil_xls/oil_xls_'),
  SPIMEX_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30_000),
  /** Zone whose calendar decides what "today" is for imports and date windows. */
  TRADING_TIMEZONE: z
    .string()
    .refine(isTimeZone, { message: 'Expected an IANA time zone name' })
    .default('Europe/Moscow'),

  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(50).default(2),

  BEAT_SCHEDULE_FILE: z.string().min(1).default('config/beat-schedule.json'),
  BEAT_TICK_MS: z.coerce.number().int().min(1000).default(15_000),
  BEAT_LOCK_TTL_MS: z.coerce.number().int().min(5000).default(60_000),
});

export type EnvInput = z.input<typeof envSchema>;

// ─── Beat Schedule File ─────────────────────────────────────────

/** Schema for one recurring task in the beat schedule. */
export const beatEntrySchema = z.object({
  name: z
    .string()
    .min(1)
    .max(100)
    .regex(/^[a-z0-9][a-z0-9-]*$/, 'Entry names are lowercase kebab-case'),
  cron: z.string().min(9).max(100),
  task: z.string().min(1),
  payload: z.record(z.unknown()).default({}),
  timezone: z.string().min(1).optional(),
  enabled: z.boolean().default(true),
});

/** Schema for `config/beat-schedule.json`. */
export const beatScheduleFileSchema = z
  .object({
    entries: z.array(beatEntrySchema),
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.entries.forEach((entry, index) => {
      if (seen.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['entries', index, 'name'],
          message: `Duplicate entry name "${entry.name}"`,
        });
      }
      seen.add(entry.name);
    });
  });
