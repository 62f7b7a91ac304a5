import { describe, it, expect, beforeEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { NotFoundError, ValidationError } from '@/core/errors.js';
import { tradingResultsRoutes } from './trading-results.js';
import { registerErrorHandler } from '../error-handler.js';
import { createMockDeps } from '@/testing/fixtures/routes.js';
import { createSampleTradingResult } from '@/testing/fixtures/trading.js';
import type { RouteDependencies } from '../types.js';

interface ErrorBody {
  success: false;
  error: { code: string; message: string; details?: Record<string, unknown> };
}

// ─── Setup ──────────────────────────────────────────────────────

let app: FastifyInstance;
let deps: ReturnType<typeof createMockDeps>;

async function buildApp(routeDeps: RouteDependencies): Promise<FastifyInstance> {
  const instance = Fastify();
  registerErrorHandler(instance, routeDeps.logger);
  await instance.register(
    (scope, opts: RouteDependencies, done) => {
      tradingResultsRoutes(scope, opts);
      done();
    },
    routeDeps,
  );
  await instance.ready();
  return instance;
}

beforeEach(async () => {
  deps = createMockDeps();
  app = await buildApp(deps);
});

// ─── Imports ────────────────────────────────────────────────────

describe('GET /trading_results', () => {
  it('enqueues an import from the target date', async () => {
    deps.taskQueue.enqueue.mockResolvedValue({ jobId: 'job-1', task: 'import-bulletins' });

    const response = await app.inject({
      method: 'GET',
      url: '/trading_results?target_date=2024-05-15',
    });

    expect(response.statusCode).toBe(202);
    expect(response.json()).toEqual({
      success: true,
      data: {
        jobId: 'job-1',
        task: 'import-bulletins',
        targetDate: '2024-05-15',
        status: 'queued',
      },
    });
    expect(deps.taskQueue.enqueue).toHaveBeenCalledWith('import-bulletins', {
      targetDate: '2024-05-15',
    });
  });

  it('rejects a target date after today', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/trading_results?target_date=2024-05-18',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorBody>().error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'target_date is in the future',
      details: { targetDate: '2024-05-18', today: '2024-05-17' },
    });
    expect(deps.taskQueue.enqueue).not.toHaveBeenCalled();
  });

  it('rejects impossible dates', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/trading_results?target_date=2024-02-30',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorBody>().error.details).toEqual({
      issues: [{ path: 'target_date', message: 'Expected a date in YYYY-MM-DD form' }],
    });
  });

  it('requires target_date', async () => {
    const response = await app.inject({ method: 'GET', url: '/trading_results' });

    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorBody>().error.code).toBe('VALIDATION_ERROR');
  });

  describe('with a trading time zone ahead of UTC', () => {
    // 01:30 on 2024-05-17 in Moscow, still 2024-05-16 in UTC.
    const afterMoscowMidnight = new Date('2024-05-16T22:30:00Z');
    let zonedApp: FastifyInstance;

    beforeEach(async () => {
      zonedApp = await buildApp({
        ...deps,
        clock: () => afterMoscowMidnight,
        tradingTimeZone: 'Europe/Moscow',
      });
    });

    it('accepts today on the trading calendar', async () => {
      deps.taskQueue.enqueue.mockResolvedValue({ jobId: 'job-2', task: 'import-bulletins' });

      const response = await zonedApp.inject({
        method: 'GET',
        url: '/trading_results?target_date=2024-05-17',
      });

      expect(response.statusCode).toBe(202);
      expect(deps.taskQueue.enqueue).toHaveBeenCalledWith('import-bulletins', {
        targetDate: '2024-05-17',
      });
    });

    it('still rejects the next trading day', async () => {
      const response = await zonedApp.inject({
        method: 'GET',
        url: '/trading_results?target_date=2024-05-18',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<ErrorBody>().error.details).toEqual({
        targetDate: '2024-05-18',
        today: '2024-05-17',
      });
    });

    it('keys the last trading dates cache by the trading day', async () => {
      await zonedApp.inject({ method: 'GET', url: '/trading_results/last_trading_dates?days=3' });

      expect(deps.responseCache.wrap).toHaveBeenCalledWith(
        'last_trading_dates?days=3&today=2024-05-17',
        expect.any(Function),
      );
    });
  });
});

describe('GET /trading_results/imports/:jobId', () => {
  it('returns the task status', async () => {
    const status = {
      jobId: 'job-1',
      task: 'import-bulletins',
      state: 'completed',
      attemptsMade: 1,
      result: { insertedRows: 12 },
    };
    deps.taskQueue.getStatus.mockResolvedValue(status);

    const response = await app.inject({ method: 'GET', url: '/trading_results/imports/job-1' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ success: true, data: status });
    expect(deps.taskQueue.getStatus).toHaveBeenCalledWith('job-1');
  });

  it('returns 404 for an unknown job', async () => {
    deps.taskQueue.getStatus.mockResolvedValue(null);

    const response = await app.inject({ method: 'GET', url: '/trading_results/imports/job-9' });

    expect(response.statusCode).toBe(404);
    expect(response.json<ErrorBody>().error.message).toBe('Import task "job-9" not found');
  });
});

// ─── Reads ──────────────────────────────────────────────────────

describe('GET /trading_results/last_trading_dates', () => {
  it('returns the dates through the cache', async () => {
    deps.tradingService.getLastTradingDates.mockResolvedValue(['2024-05-17', '2024-05-16']);

    const response = await app.inject({
      method: 'GET',
      url: '/trading_results/last_trading_dates?days=3',
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({
      success: true,
      data: { dates: ['2024-05-17', '2024-05-16'] },
    });
    expect(deps.tradingService.getLastTradingDates).toHaveBeenCalledWith(3);
    expect(deps.responseCache.wrap).toHaveBeenCalledWith(
      'last_trading_dates?days=3&today=2024-05-17',
      expect.any(Function),
    );
  });

  it('serves a cached value without calling the service', async () => {
    deps.responseCache.wrap.mockResolvedValueOnce({ ok: true, value: { dates: ['2024-05-16'] } });

    const response = await app.inject({
      method: 'GET',
      url: '/trading_results/last_trading_dates?days=3',
    });

    expect(response.json()).toEqual({ success: true, data: { dates: ['2024-05-16'] } });
    expect(deps.tradingService.getLastTradingDates).not.toHaveBeenCalled();
  });

  it('rejects days outside 1–365', async () => {
    const zero = await app.inject({ method: 'GET', url: '/trading_results/last_trading_dates?days=0' });
    const text = await app.inject({ method: 'GET', url: '/trading_results/last_trading_dates?days=abc' });

    expect(zero.statusCode).toBe(400);
    expect(text.statusCode).toBe(400);
  });
});

describe('GET /trading_results/trading_results_in_period', () => {
  it('returns results in the range with filters', async () => {
    deps.tradingService.getTradingResultsInPeriod.mockResolvedValue({
      ok: true,
      value: [createSampleTradingResult()],
    });

    const response = await app.inject({
      method: 'GET',
      url: '/trading_results/trading_results_in_period?start_date=2024-05-01&end_date=2024-05-17&oil_id=A100',
    });

    expect(response.statusCode).toBe(200);
    const body = response.json<{ data: { results: { exchangeProductId: string; createdOn: string }[] } }>();
    expect(body.data.results).toHaveLength(1);
    expect(body.data.results[0]?.exchangeProductId).toBe('A100ANK060F');
    expect(body.data.results[0]?.createdOn).toBe('2024-05-16T18:30:00.000Z');
    expect(deps.tradingService.getTradingResultsInPeriod).toHaveBeenCalledWith(
      '2024-05-01',
      '2024-05-17',
      { oilId: 'A100', deliveryTypeId: undefined, deliveryBasisId: undefined },
    );
    expect(deps.responseCache.wrap).toHaveBeenCalledWith(
      'trading_results_in_period?end_date=2024-05-17&oil_id=A100&start_date=2024-05-01',
      expect.any(Function),
    );
  });

  it('passes service validation errors through', async () => {
    deps.tradingService.getTradingResultsInPeriod.mockResolvedValue({
      ok: false,
      error: new ValidationError('start_date must not be after end_date', {
        startDate: '2024-05-17',
        endDate: '2024-05-01',
      }),
    });

    const response = await app.inject({
      method: 'GET',
      url: '/trading_results/trading_results_in_period?start_date=2024-05-17&end_date=2024-05-01',
    });

    expect(response.statusCode).toBe(400);
    expect(response.json<ErrorBody>().error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'start_date must not be after end_date',
      details: { startDate: '2024-05-17', endDate: '2024-05-01' },
    });
  });

  it('requires both dates', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/trading_results/trading_results_in_period?start_date=2024-05-01',
    });

    expect(response.statusCode).toBe(400);
    expect(deps.tradingService.getTradingResultsInPeriod).not.toHaveBeenCalled();
  });
});

describe('GET /trading_results/last_trading_results', () => {
  it('returns the latest results with filters', async () => {
    deps.tradingService.getLastTradingResults.mockResolvedValue({
      ok: true,
      value: [createSampleTradingResult()],
    });

    const response = await app.inject({
      method: 'GET',
      url: '/trading_results/last_trading_results?delivery_type_id=F&delivery_basis_id=ANK',
    });

    expect(response.statusCode).toBe(200);
    expect(deps.tradingService.getLastTradingResults).toHaveBeenCalledWith({
      oilId: undefined,
      deliveryTypeId: 'F',
      deliveryBasisId: 'ANK',
    });
    expect(deps.responseCache.wrap).toHaveBeenCalledWith(
      'last_trading_results?delivery_basis_id=ANK&delivery_type_id=F',
      expect.any(Function),
    );
  });

  it('returns 404 when the store is empty', async () => {
    deps.tradingService.getLastTradingResults.mockResolvedValue({
      ok: false,
      error: new NotFoundError('Database is empty'),
    });

    const response = await app.inject({
      method: 'GET',
      url: '/trading_results/last_trading_results',
    });

    expect(response.statusCode).toBe(404);
    expect(response.json<ErrorBody>().error).toEqual({
      code: 'NOT_FOUND',
      message: 'Database is empty',
    });
  });
});
