/**
 * Task handlers wiring the catalogue to the trading service and the cache.
 */
import { UnrecoverableError } from 'bullmq';
import { ValidationError, toError } from '@/core/errors.js';
import type { ResponseCache } from '@/cache/response-cache.js';
import type { TradingService } from '@/trading/trading-service.js';
import type { ImportReport } from '@/trading/types.js';
import { resolveImportTargetDate } from './definitions.js';
import type { TaskHandlers } from './types.js';

export interface TaskHandlerDependencies {
  tradingService: TradingService;
  responseCache: ResponseCache;
  /** Zone of the trading calendar used to resolve lookbacks. */
  timeZone?: string;
}

export function createTaskHandlers(deps: TaskHandlerDependencies): TaskHandlers {
  const { tradingService, responseCache, timeZone } = deps;

  return {
    async 'import-bulletins'(payload, context): Promise<ImportReport> {
      const targetDate = resolveImportTargetDate(
        payload,
        context.scheduledFor ?? context.enqueuedAt,
        timeZone,
      );

      const result = await tradingService.importBulletins(targetDate);
      if (!result.ok) {
        // A rejected target date stays rejected on retry.
        if (result.error instanceof ValidationError) {
          throw new UnrecoverableError(result.error.message);
        }
        throw result.error;
      }

      if (result.value.insertedRows > 0) {
        try {
          await responseCache.invalidate();
        } catch (error) {
          // Cached reads expire on their TTL; the import itself succeeded.
          context.logger.warn('Cache invalidation after import failed', {
            component: 'task-handlers',
            error: toError(error).message,
          });
        }
      }

      return result.value;
    },

    async 'invalidate-cache'(): Promise<{ invalidated: true }> {
      await responseCache.invalidate();
      return { invalidated: true };
    },
  };
}
