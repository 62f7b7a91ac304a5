/**
 * Trading results routes: bulletin imports through the task queue and
 * cached reads over the stored results.
 */
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { AppError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { ok } from '@/core/result.js';
import type { IsoDate } from '@/core/types.js';
import { parseIsoDate, systemClock, toIsoDate } from '@/core/types.js';
import { buildCacheKey } from '@/cache/response-cache.js';
import type { TradingResultFilters } from '@/trading/types.js';
import type { RouteDependencies } from '../types.js';
import { sendSuccess, sendError, sendAppError, sendNotFound } from '../error-handler.js';

// ─── Schemas ────────────────────────────────────────────────────

const isoDateSchema = z.string().transform((value, ctx): IsoDate => {
  const date = parseIsoDate(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a date in YYYY-MM-DD form' });
    return z.NEVER;
  }
  return date;
});

const filterValueSchema = z.string().trim().min(1).max(32).optional();

const filtersQuerySchema = z.object({
  oil_id: filterValueSchema,
  delivery_type_id: filterValueSchema,
  delivery_basis_id: filterValueSchema,
});

const importQuerySchema = z.object({ target_date: isoDateSchema });

const lastTradingDatesQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365),
});

const periodQuerySchema = filtersQuerySchema.extend({
  start_date: isoDateSchema,
  end_date: isoDateSchema,
});

type FiltersQuery = z.infer<typeof filtersQuerySchema>;

function toFilters(query: FiltersQuery): TradingResultFilters {
  return {
    oilId: query.oil_id,
    deliveryTypeId: query.delivery_type_id,
    deliveryBasisId: query.delivery_basis_id,
  };
}

// ─── Routes ─────────────────────────────────────────────────────

/** Register trading results routes on a Fastify instance. */
export function tradingResultsRoutes(
  fastify: FastifyInstance,
  opts: RouteDependencies,
): void {
  const { tradingService, taskQueue, responseCache, tradingTimeZone } = opts;
  const clock = opts.clock ?? systemClock;

  // GET /trading_results?target_date=YYYY-MM-DD
  // A target date is in the future when it is after today on the trading calendar.
  fastify.get('/trading_results', async (request: FastifyRequest, reply: FastifyReply) => {
    const { target_date: targetDate } = importQuerySchema.parse(request.query);
    const today = toIsoDate(clock(), tradingTimeZone);
    if (targetDate > today) {
      await sendError(reply, 'VALIDATION_ERROR', 'target_date is in the future', 400, {
        targetDate,
        today,
      });
      return;
    }

    const task = await taskQueue.enqueue('import-bulletins', { targetDate });
    await sendSuccess(reply, { ...task, targetDate, status: 'queued' }, 202);
  });

  // GET /trading_results/imports/:jobId
  fastify.get(
    '/trading_results/imports/:jobId',
    async (
      request: FastifyRequest<{ Params: { jobId: string } }>,
      reply: FastifyReply,
    ) => {
      const status = await taskQueue.getStatus(request.params.jobId);
      if (!status) {
        await sendNotFound(reply, 'Import task', request.params.jobId);
        return;
      }
      await sendSuccess(reply, status);
    },
  );

  // GET /trading_results/last_trading_dates?days=N
  fastify.get(
    '/trading_results/last_trading_dates',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { days } = lastTradingDatesQuerySchema.parse(request.query);
      // The window ends today, so the key changes with the day.
      const key = buildCacheKey('last_trading_dates', { days, today: toIsoDate(clock(), tradingTimeZone) });

      const result = await responseCache.wrap(key, async () =>
        ok({ dates: await tradingService.getLastTradingDates(days) }),
      );
      if (!result.ok) throw result.error;
      await sendSuccess(reply, result.value);
    },
  );

  // GET /trading_results/trading_results_in_period?start_date&end_date[&filters]
  fastify.get(
    '/trading_results/trading_results_in_period',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const query = periodQuerySchema.parse(request.query);
      const key = buildCacheKey('trading_results_in_period', query);

      const result = await responseCache.wrap(key, async (): Promise<Result<unknown, AppError>> => {
        const found = await tradingService.getTradingResultsInPeriod(
          query.start_date,
          query.end_date,
          toFilters(query),
        );
        return found.ok ? ok({ results: found.value }) : found;
      });
      if (!result.ok) {
        await sendAppError(reply, result.error);
        return;
      }
      await sendSuccess(reply, result.value);
    },
  );

  // GET /trading_results/last_trading_results[?filters]
  fastify.get(
    '/trading_results/last_trading_results',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const query = filtersQuerySchema.parse(request.query);
      const key = buildCacheKey('last_trading_results', query);

      const result = await responseCache.wrap(key, async (): Promise<Result<unknown, AppError>> => {
        const found = await tradingService.getLastTradingResults(toFilters(query));
        return found.ok ? ok({ results: found.value }) : found;
      });
      if (!result.ok) {
        await sendAppError(reply, result.error);
        return;
      }
      await sendSuccess(reply, result.value);
    },
  );
}
