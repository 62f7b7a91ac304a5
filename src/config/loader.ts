/**
 * Configuration loader: validates the process environment with Zod,
 * reconciles the two database connection shapes, and reads JSON config
 * files with environment variable placeholders.
 */
import { readFile } from 'node:fs/promises';

import type { z } from 'zod';

import { ConfigError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';

import {
  buildDatabaseDsn,
  diffConnections,
  parseDatabaseDsn,
  readDiscreteConnection,
} from './connection.js';
import { envSchema } from './schema.js';
import type { AppConfig } from './types.js';

type Env = Record<string, string | undefined>;

const DEFAULT_CORS_ORIGINS = ['http://localhost', 'http://127.0.0.1'];

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively resolves environment variable placeholders in an object.
 * Replaces strings matching the pattern `${VAR_NAME}` with the value
 * of the corresponding environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown, env: Env = process.env): unknown {
  if (typeof obj === 'string') {
    const match = ENV_VAR_PATTERN.exec(obj);
    const varName = match?.[1];
    if (varName !== undefined) {
      const value = env[varName];
      if (value === undefined) {
        throw new ConfigError(`Environment variable "${varName}" is not defined`, {
          variableName: varName,
          pattern: obj,
        });
      }
      return value;
    }
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVars(value, env);
    }
    return result;
  }

  return obj;
}

// ─── CORS Origins ───────────────────────────────────────────────

/**
 * Parse `BACKEND_CORS_ORIGINS`. Accepts a JSON array
 * (`["http://localhost:3000"]`) or a comma-separated list.
 * Every origin must be an http(s) URL.
 */
export function parseCorsOrigins(raw: string | undefined): Result<string[], ConfigError> {
  if (raw === undefined) return ok(DEFAULT_CORS_ORIGINS);

  let candidates: unknown[];
  const trimmed = raw.trim();
  if (trimmed.startsWith('[')) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (!Array.isArray(parsed)) {
        return err(new ConfigError('BACKEND_CORS_ORIGINS must be a JSON array'));
      }
      candidates = parsed;
    } catch {
      return err(new ConfigError('BACKEND_CORS_ORIGINS is not valid JSON', { value: raw }));
    }
  } else {
    candidates = trimmed.split(',').map((origin) => origin.trim()).filter(Boolean);
  }

  const origins: string[] = [];
  for (const candidate of candidates) {
    if (typeof candidate !== 'string' || !isHttpUrl(candidate)) {
      return err(new ConfigError('BACKEND_CORS_ORIGINS contains an invalid origin', {
        origin: candidate,
      }));
    }
    origins.push(candidate.replace(/\/$/, ''));
  }
  return ok(origins);
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

// ─── Database DSN ───────────────────────────────────────────────

/**
 * Resolve the single canonical DSN from either `DATABASE_DSN` or the
 * discrete `DB_HOST`/`DB_NAME`/`DB_USER`/`DB_PASSWORD` fields.
 * Both shapes may be present only when they describe the same connection.
 */
export function resolveDatabaseDsn(env: Env): Result<string, ConfigError> {
  const rawDsn = env['DATABASE_DSN'] ? env['DATABASE_DSN'] : undefined;
  const discrete = readDiscreteConnection(env);

  if (discrete && 'missing' in discrete) {
    return err(new ConfigError('Incomplete discrete database settings', {
      missing: discrete.missing,
    }));
  }

  const fromDsn = rawDsn !== undefined ? parseDatabaseDsn(rawDsn) : undefined;
  if (fromDsn === null) {
    return err(new ConfigError('DATABASE_DSN is not a valid postgres DSN'));
  }

  if (fromDsn && discrete) {
    const fields = diffConnections(fromDsn, discrete.parts);
    if (fields.length > 0) {
      return err(new ConfigError(
        'DATABASE_DSN and DB_* settings describe different connections',
        { fields },
        'CONNECTION_SHAPE_CONFLICT',
      ));
    }
  }

  if (fromDsn) return ok(buildDatabaseDsn(fromDsn));
  if (discrete) return ok(buildDatabaseDsn(discrete.parts));

  return err(new ConfigError(
    'Database connection is not configured: set DATABASE_DSN or DB_HOST/DB_NAME/DB_USER/DB_PASSWORD',
  ));
}

// ─── Application Config ─────────────────────────────────────────

/**
 * Validate the environment and build the runtime configuration.
 * All problems are reported through a ConfigError; nothing is thrown.
 */
export function loadConfig(env: Env = process.env): Result<AppConfig, ConfigError> {
  const validation = envSchema.safeParse(env);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { issues }));
  }
  const parsed = validation.data;

  const dsn = resolveDatabaseDsn(env);
  if (!dsn.ok) return dsn;

  const corsOrigins = parseCorsOrigins(parsed.BACKEND_CORS_ORIGINS);
  if (!corsOrigins.ok) return corsOrigins;

  return ok({
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    server: {
      host: parsed.HOST,
      port: parsed.PORT,
      apiPrefix: parsed.API_V1_STR.replace(/\/$/, ''),
      corsOrigins: corsOrigins.value,
    },
    database: {
      dsn: dsn.value,
      connectMaxAttempts: parsed.STORE_CONNECT_MAX_ATTEMPTS,
      migrateOnStart: parsed.MIGRATE_ON_START,
      migrationsDir: parsed.MIGRATIONS_DIR,
    },
    redis: {
      url: parsed.REDIS_URL,
      cacheTtlSeconds: parsed.REDIS_EXPIRATION_TIME,
    },
    spimex: {
      bulletinUrl: parsed.SPIMEX_BULLETIN_URL,
      timeoutMs: parsed.SPIMEX_TIMEOUT_MS,
      timeZone: parsed.TRADING_TIMEZONE,
    },
    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
    },
    beat: {
      scheduleFile: parsed.BEAT_SCHEDULE_FILE,
      tickMs: parsed.BEAT_TICK_MS,
      lockTtlMs: parsed.BEAT_LOCK_TTL_MS,
    },
  });
}

// ─── JSON Config Files ──────────────────────────────────────────

/**
 * Loads and validates a JSON configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadJsonConfigFile<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  env: Env = process.env,
): Promise<Result<T, ConfigError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    if (code === 'ENOENT') {
      return err(new ConfigError(`Configuration file not found: ${filePath}`, {
        filePath,
        errorCode: 'ENOENT',
      }));
    }
    return err(new ConfigError(`Failed to read configuration file: ${filePath}`, {
      filePath,
      errorCode: code,
    }));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvVars(parsed, env);
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    throw error;
  }

  const validation = schema.safeParse(resolved);
  if (!validation.success) {
    const issues = validation.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return err(new ConfigError('Configuration validation failed', { filePath, issues }));
  }

  return ok(validation.data);
}
