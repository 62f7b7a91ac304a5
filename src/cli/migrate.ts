/**
 * Migration command.
 *
 * Waits for the store, applies pending migrations and exits 0, or exits 1
 * when the store stays unreachable or a migration fails. Deployments run it
 * before the API and only start the API when it succeeds.
 *
 * Usage: npm run migrate -- [--dir <path>]
 */
import 'dotenv/config';
import { fileURLToPath } from 'node:url';
import type { Pool } from 'pg';
import { loadConfig } from '@/config/loader.js';
import type { AppError } from '@/core/errors.js';
import { toError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { createLogger } from '@/observability/logger.js';
import type { Logger } from '@/observability/logger.js';
import type { Database } from '@/infrastructure/database.js';
import { createDatabase, waitForStore } from '@/infrastructure/database.js';
import type { MigrationReport } from '@/infrastructure/migrations/index.js';
import { applyMigrations } from '@/infrastructure/migrations/index.js';

// ─── CLI Arg Parsing ────────────────────────────────────────────

interface CliArgs {
  dir?: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '--dir' || arg === '-d') && next) {
      args.dir = next;
      i++;
    }
  }

  return args;
}

// ─── Run ────────────────────────────────────────────────────────

export interface MigrateCommandDeps {
  db: Pick<Database, 'ping' | 'pool'>;
  dir: string;
  maxAttempts: number;
  logger: Logger;
  migrate?: (params: { pool: Pool; dir: string; logger: Logger }) => Promise<Result<MigrationReport, AppError>>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Wait for the store, then migrate. Resolves with the process exit code. */
export async function runMigrateCommand(deps: MigrateCommandDeps): Promise<number> {
  const { db, dir, maxAttempts, logger, sleep } = deps;
  const migrate = deps.migrate ?? applyMigrations;

  const store = await waitForStore(db, { maxAttempts, logger, sleep });
  if (!store.ok) {
    logger.fatal('Migrations not applied: store unreachable', {
      component: 'migrate',
      attempts: store.error.context?.['attempts'],
    });
    return 1;
  }

  const result = await migrate({ pool: db.pool, dir, logger });
  if (!result.ok) {
    logger.fatal('Migration failed', {
      component: 'migrate',
      code: result.error.code,
      error: result.error.message,
      context: result.error.context,
    });
    return 1;
  }

  logger.info('Migrations up to date', {
    component: 'migrate',
    applied: result.value.applied,
    skipped: result.value.skipped.length,
  });
  return 0;
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  const configResult = loadConfig();
  if (!configResult.ok) {
    createLogger().fatal('Invalid configuration', {
      component: 'migrate',
      error: configResult.error.message,
      context: configResult.error.context,
    });
    process.exit(1);
  }
  const config = configResult.value;
  const logger = createLogger({ level: config.logLevel, name: 'migrate' });

  const db = createDatabase({ dsn: config.database.dsn, maxConnections: 2 });
  const exitCode = await runMigrateCommand({
    db,
    dir: args.dir ?? config.database.migrationsDir,
    maxAttempts: config.database.connectMaxAttempts,
    logger,
  });
  await db.disconnect();
  process.exit(exitCode);
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((e: unknown) => {
    createLogger().fatal('Migration command crashed', {
      component: 'migrate',
      error: toError(e).message,
    });
    process.exit(1);
  });
}
