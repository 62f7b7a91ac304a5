import { describe, it, expect, vi } from 'vitest';
import { UnrecoverableError } from 'bullmq';
import { BulletinDownloadError, ValidationError } from '@/core/errors.js';
import { ok, err } from '@/core/result.js';
import type { IsoDate } from '@/core/types.js';
import {
  createMockLogger,
  createMockResponseCache,
  createMockTradingService,
} from '@/testing/fixtures/routes.js';
import type { ImportReport } from '@/trading/types.js';
import { createTaskHandlers } from './handlers.js';
import type { TaskContext } from './types.js';

function createContext(overrides: Partial<TaskContext> = {}): TaskContext {
  return {
    jobId: 'job-1',
    attempt: 1,
    enqueuedAt: new Date('2024-05-17T12:00:00Z'),
    logger: createMockLogger(),
    ...overrides,
  };
}

function report(insertedRows: number): ImportReport {
  return {
    requestedDates: ['2024-05-17' as IsoDate, '2024-05-16' as IsoDate],
    importedDates: insertedRows > 0 ? ['2024-05-16' as IsoDate] : [],
    skippedDates: [],
    missingDates: ['2024-05-17' as IsoDate],
    unparsedDates: [],
    insertedRows,
  };
}

function setup(timeZone?: string) {
  const tradingService = createMockTradingService();
  const responseCache = createMockResponseCache();
  const handlers = createTaskHandlers({
    tradingService: tradingService as never,
    responseCache: responseCache as never,
    timeZone,
  });
  return { tradingService, responseCache, handlers };
}

describe('import-bulletins handler', () => {
  it('imports from the target date and invalidates the cache when rows were added', async () => {
    const { tradingService, responseCache, handlers } = setup();
    tradingService.importBulletins.mockResolvedValue(ok(report(12)));

    const result = await handlers['import-bulletins']({ targetDate: '2024-05-16' }, createContext());

    expect(tradingService.importBulletins).toHaveBeenCalledWith('2024-05-16');
    expect(responseCache.invalidate).toHaveBeenCalledTimes(1);
    expect(result).toEqual(report(12));
  });

  it('leaves the cache alone when nothing new was stored', async () => {
    const { tradingService, responseCache, handlers } = setup();
    tradingService.importBulletins.mockResolvedValue(ok(report(0)));

    await handlers['import-bulletins']({ targetDate: '2024-05-16' }, createContext());

    expect(responseCache.invalidate).not.toHaveBeenCalled();
  });

  it('resolves a lookback against the scheduled fire time', async () => {
    const { tradingService, handlers } = setup();
    tradingService.importBulletins.mockResolvedValue(ok(report(0)));

    await handlers['import-bulletins'](
      { lookbackDays: 3 },
      createContext({ scheduledFor: new Date('2024-05-20T15:30:00Z') }),
    );

    expect(tradingService.importBulletins).toHaveBeenCalledWith('2024-05-17');
  });

  it('resolves a lookback on the trading calendar day', async () => {
    const { tradingService, handlers } = setup('Europe/Moscow');
    tradingService.importBulletins.mockResolvedValue(ok(report(0)));

    // 00:30 on 2024-05-20 in Moscow.
    await handlers['import-bulletins'](
      { lookbackDays: 3 },
      createContext({ scheduledFor: new Date('2024-05-19T21:30:00Z') }),
    );

    expect(tradingService.importBulletins).toHaveBeenCalledWith('2024-05-17');
  });

  it('falls back to the enqueue time without a fire time', async () => {
    const { tradingService, handlers } = setup();
    tradingService.importBulletins.mockResolvedValue(ok(report(0)));

    await handlers['import-bulletins']({ lookbackDays: 1 }, createContext());

    expect(tradingService.importBulletins).toHaveBeenCalledWith('2024-05-16');
  });

  it('does not retry a rejected target date', async () => {
    const { tradingService, handlers } = setup();
    tradingService.importBulletins.mockResolvedValue(
      err(new ValidationError('target_date is in the future')),
    );

    await expect(
      handlers['import-bulletins']({ targetDate: '2024-05-16' }, createContext()),
    ).rejects.toBeInstanceOf(UnrecoverableError);
  });

  it('rethrows download failures so the job is retried', async () => {
    const { tradingService, handlers } = setup();
    const failure = new BulletinDownloadError('https://spimex.test/bulletin.xls', 'HTTP 502');
    tradingService.importBulletins.mockResolvedValue(err(failure));

    await expect(
      handlers['import-bulletins']({ targetDate: '2024-05-16' }, createContext()),
    ).rejects.toBe(failure);
  });

  it('still succeeds when invalidating the cache fails', async () => {
    const { tradingService, responseCache, handlers } = setup();
    tradingService.importBulletins.mockResolvedValue(ok(report(5)));
    responseCache.invalidate.mockRejectedValue(new Error('READONLY'));
    const context = createContext();

    const result = await handlers['import-bulletins']({ targetDate: '2024-05-16' }, context);

    expect(result).toEqual(report(5));
    expect(context.logger.warn).toHaveBeenCalledWith('Cache invalidation after import failed', {
      component: 'task-handlers',
      error: 'READONLY',
    });
  });
});

describe('invalidate-cache handler', () => {
  it('invalidates the response cache', async () => {
    const { responseCache, handlers } = setup();

    const result = await handlers['invalidate-cache']({}, createContext());

    expect(responseCache.invalidate).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ invalidated: true });
  });
});
