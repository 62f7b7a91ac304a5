import { describe, it, expect, vi } from 'vitest';
import { UnrecoverableError } from 'bullmq';
import { createMockLogger } from '@/testing/fixtures/routes.js';
import type { TaskHandlers } from './types.js';
import { processTaskJob } from './worker.js';
import type { DispatchableJob } from './worker.js';

function createHandlers() {
  return {
    'import-bulletins': vi.fn().mockResolvedValue({ insertedRows: 4 }),
    'invalidate-cache': vi.fn().mockResolvedValue({ invalidated: true }),
  } satisfies TaskHandlers;
}

function createJob(overrides: Partial<DispatchableJob> = {}): DispatchableJob {
  return {
    id: 'job-1',
    name: 'import-bulletins',
    data: {
      payload: { targetDate: '2024-05-16' },
      enqueuedAt: '2024-05-17T12:00:00.000Z',
    },
    attemptsMade: 0,
    ...overrides,
  };
}

describe('processTaskJob', () => {
  it('dispatches the parsed payload with the job context', async () => {
    const handlers = createHandlers();

    const result = await processTaskJob(createJob(), handlers, createMockLogger());

    expect(result).toEqual({ insertedRows: 4 });
    expect(handlers['import-bulletins']).toHaveBeenCalledWith(
      { targetDate: '2024-05-16' },
      expect.objectContaining({
        jobId: 'job-1',
        attempt: 1,
        enqueuedAt: new Date('2024-05-17T12:00:00.000Z'),
        scheduledFor: undefined,
      }),
    );
  });

  it('counts retries into the attempt number and keeps the fire time', async () => {
    const handlers = createHandlers();
    const job = createJob({
      attemptsMade: 2,
      data: {
        payload: { lookbackDays: 3 },
        enqueuedAt: '2024-05-17T15:30:01.000Z',
        scheduledFor: '2024-05-17T15:30:00.000Z',
      },
    });

    await processTaskJob(job, handlers, createMockLogger());

    expect(handlers['import-bulletins']).toHaveBeenCalledWith(
      { lookbackDays: 3 },
      expect.objectContaining({
        attempt: 3,
        scheduledFor: new Date('2024-05-17T15:30:00.000Z'),
      }),
    );
  });

  it('dispatches invalidate-cache', async () => {
    const handlers = createHandlers();

    const result = await processTaskJob(
      createJob({ name: 'invalidate-cache', data: { payload: {}, enqueuedAt: '2024-05-17T12:00:00.000Z' } }),
      handlers,
      createMockLogger(),
    );

    expect(result).toEqual({ invalidated: true });
    expect(handlers['import-bulletins']).not.toHaveBeenCalled();
  });

  it('fails unknown tasks without retry', async () => {
    const handlers = createHandlers();

    await expect(
      processTaskJob(createJob({ name: 'send-report' }), handlers, createMockLogger()),
    ).rejects.toThrow(new UnrecoverableError('Unknown task "send-report"'));
  });

  it('fails invalid payloads without retry and never calls the handler', async () => {
    const handlers = createHandlers();
    const job = createJob({ data: { payload: { targetDate: 'soon' }, enqueuedAt: '2024-05-17T12:00:00.000Z' } });

    await expect(processTaskJob(job, handlers, createMockLogger())).rejects.toBeInstanceOf(
      UnrecoverableError,
    );
    expect(handlers['import-bulletins']).not.toHaveBeenCalled();
  });
});
