/**
 * Forward-only migration runner.
 *
 * A session-level advisory lock serialises concurrent starters (several API
 * replicas booting at once). Each pending migration runs in its own
 * transaction together with its ledger row, so an interrupted run leaves
 * either the whole migration or none of it and the next run resumes.
 */
import type { Pool, PoolClient } from 'pg';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { MigrationError, toError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { Migration, MigrationReport } from './types.js';

/** Advisory lock key reserved for schema migrations. */
export const MIGRATION_LOCK_KEY = 72_180_215;

const CREATE_LEDGER = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    id          TEXT PRIMARY KEY,
    checksum    TEXT NOT NULL,
    applied_at  TIMESTAMPTZ NOT NULL DEFAULT now()
  )`;

interface LedgerRow {
  id: string;
  checksum: string;
}

export interface RunMigrationsOptions {
  logger: Logger;
}

/** Apply every migration not yet recorded in `schema_migrations`. */
export async function runMigrations(
  pool: Pool,
  migrations: Migration[],
  options: RunMigrationsOptions,
): Promise<Result<MigrationReport, MigrationError>> {
  const { logger } = options;

  let client: PoolClient;
  try {
    client = await pool.connect();
  } catch (error) {
    return err(
      new MigrationError('Cannot acquire a database connection for migrations', {
        code: 'MIGRATION_CONNECTION_FAILED',
        cause: toError(error),
      }),
    );
  }

  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      return await applyPending(client, migrations, logger);
    } finally {
      await client
        .query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY])
        .catch((error: unknown) => {
          logger.warn('Failed to release migration lock', {
            component: 'migrations',
            error: toError(error).message,
          });
        });
    }
  } catch (error) {
    return err(
      new MigrationError('Migration run failed', {
        code: 'MIGRATION_FAILED',
        cause: toError(error),
      }),
    );
  } finally {
    client.release();
  }
}

async function applyPending(
  client: PoolClient,
  migrations: Migration[],
  logger: Logger,
): Promise<Result<MigrationReport, MigrationError>> {
  await client.query(CREATE_LEDGER);
  const { rows } = await client.query<LedgerRow>('SELECT id, checksum FROM schema_migrations');
  const recorded = new Map(rows.map((row) => [row.id, row.checksum]));

  for (const migration of migrations) {
    const checksum = recorded.get(migration.id);
    if (checksum !== undefined && checksum !== migration.checksum) {
      return err(
        new MigrationError(`Applied migration ${migration.id} has been modified`, {
          code: 'MIGRATION_CHECKSUM_MISMATCH',
          migrationId: migration.id,
        }),
      );
    }
  }

  const known = new Set(migrations.map((migration) => migration.id));
  const unknown = [...recorded.keys()].filter((id) => !known.has(id));
  if (unknown.length > 0) {
    logger.warn('Database has migrations this build does not know about', {
      component: 'migrations',
      migrationIds: unknown,
    });
  }

  const report: MigrationReport = { applied: [], skipped: [] };

  for (const migration of migrations) {
    if (recorded.has(migration.id)) {
      report.skipped.push(migration.id);
      continue;
    }

    await client.query('BEGIN');
    try {
      await client.query(migration.sql);
      await client.query('INSERT INTO schema_migrations (id, checksum) VALUES ($1, $2)', [
        migration.id,
        migration.checksum,
      ]);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.error('Rollback after failed migration also failed', {
          component: 'migrations',
          migrationId: migration.id,
          error: toError(rollbackError).message,
        });
      });
      logger.error('Migration failed', {
        component: 'migrations',
        migrationId: migration.id,
        error: toError(error).message,
      });
      return err(
        new MigrationError(`Migration ${migration.id} failed`, {
          migrationId: migration.id,
          cause: toError(error),
        }),
      );
    }

    report.applied.push(migration.id);
    logger.info('Migration applied', { component: 'migrations', migrationId: migration.id });
  }

  return ok(report);
}
