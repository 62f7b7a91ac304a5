/**
 * Reads `NNNN_name.sql` files from the migrations directory.
 */
import { createHash } from 'node:crypto';
import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { MigrationError, toError } from '@/core/errors.js';
import type { Migration } from './types.js';

const MIGRATION_FILE = /^(\d{4})_[a-z0-9_]+\.sql$/;

export function checksumOf(sql: string): string {
  return createHash('sha256').update(sql).digest('hex');
}

/** Load every migration in `dir`, ordered by numeric prefix. Other files are ignored. */
export async function loadMigrations(dir: string): Promise<Result<Migration[], MigrationError>> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    return err(
      new MigrationError(`Cannot read migrations directory "${dir}"`, {
        code: 'MIGRATIONS_DIR_UNREADABLE',
        cause: toError(error),
      }),
    );
  }

  const files = entries.filter((name) => MIGRATION_FILE.test(name)).sort();

  const seen = new Set<string>();
  for (const file of files) {
    const prefix = file.slice(0, 4);
    if (seen.has(prefix)) {
      return err(
        new MigrationError(`Duplicate migration number ${prefix}`, {
          code: 'MIGRATION_DUPLICATE',
          migrationId: file.replace(/\.sql$/, ''),
        }),
      );
    }
    seen.add(prefix);
  }

  const migrations: Migration[] = [];
  for (const file of files) {
    const sql = await readFile(path.join(dir, file), 'utf-8');
    migrations.push({
      id: file.replace(/\.sql$/, ''),
      sql,
      checksum: checksumOf(sql),
    });
  }

  return ok(migrations);
}
