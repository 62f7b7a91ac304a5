/**
 * API startup sequence: store reachable, then migrations, then listen.
 * A failure in either of the first two steps stops the sequence before
 * the server binds its port.
 */
import type { AppError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import type { MigrationReport } from '@/infrastructure/migrations/types.js';
import type { Logger } from '@/observability/logger.js';

export interface ApiStartupSteps {
  waitForStore(): Promise<Result<void, AppError>>;
  /** Absent when migrations run as a separate step before the API starts. */
  migrate?: () => Promise<Result<MigrationReport, AppError>>;
  /** Bind the server; resolves with the listening address. */
  listen(): Promise<string>;
  logger: Logger;
}

export type StartupStage = 'store' | 'migrations' | 'listen';

export interface StartupFailure {
  stage: StartupStage;
  error: AppError;
}

export async function startApiService(
  steps: ApiStartupSteps,
): Promise<Result<{ address: string }, StartupFailure>> {
  const { logger } = steps;

  const store = await steps.waitForStore();
  if (!store.ok) {
    return err<StartupFailure>({ stage: 'store', error: store.error });
  }

  if (steps.migrate) {
    const migrated = await steps.migrate();
    if (!migrated.ok) {
      return err<StartupFailure>({ stage: 'migrations', error: migrated.error });
    }
    logger.info('Migrations up to date', {
      component: 'bootstrap',
      applied: migrated.value.applied,
      skipped: migrated.value.skipped.length,
    });
  } else {
    logger.info('Skipping migrations on start', { component: 'bootstrap' });
  }

  const address = await steps.listen();
  logger.info(`Server listening on ${address}`, { component: 'bootstrap' });
  return ok({ address });
}
