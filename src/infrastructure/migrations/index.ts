import type { Pool } from 'pg';
import type { Result } from '@/core/result.js';
import type { MigrationError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import { loadMigrations } from './loader.js';
import { runMigrations } from './runner.js';
import type { MigrationReport } from './types.js';

export { loadMigrations, checksumOf } from './loader.js';
export { runMigrations, MIGRATION_LOCK_KEY } from './runner.js';
export type { Migration, MigrationReport } from './types.js';

/** Load the migrations in `dir` and apply the pending ones. */
export async function applyMigrations(params: {
  pool: Pool;
  dir: string;
  logger: Logger;
}): Promise<Result<MigrationReport, MigrationError>> {
  const migrations = await loadMigrations(params.dir);
  if (!migrations.ok) return migrations;
  return runMigrations(params.pool, migrations.value, { logger: params.logger });
}
