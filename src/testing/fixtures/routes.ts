/**
 * Factory for creating mock RouteDependencies used in route tests.
 * Every service method is a vi.fn() so tests can stub specific behaviors.
 */
import { vi } from 'vitest';
import type { RouteDependencies } from '@/api/types.js';
import type { ResponseCache } from '@/cache/response-cache.js';
import type { Result } from '@/core/result.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskQueue } from '@/tasks/queue.js';
import type { TradingService } from '@/trading/trading-service.js';

// ─── Mock Factories ─────────────────────────────────────────────

/** Create a mock TradingService with all methods as vi.fn(). */
export function createMockTradingService(): {
  [K in keyof TradingService]: ReturnType<typeof vi.fn>;
} {
  return {
    importBulletins: vi.fn(),
    getLastTradingDates: vi.fn(),
    getLastTradingResults: vi.fn(),
    getTradingResultsInPeriod: vi.fn(),
  };
}

/** Create a mock task producer with all methods as vi.fn(). */
export function createMockTaskQueue(): {
  [K in keyof Pick<TaskQueue, 'enqueue' | 'getStatus'>]: ReturnType<typeof vi.fn>;
} {
  return {
    enqueue: vi.fn(),
    getStatus: vi.fn(),
  };
}

/** Create a response cache whose `wrap` always computes, so routes see their service calls. */
export function createMockResponseCache(): {
  [K in keyof ResponseCache]: ReturnType<typeof vi.fn>;
} {
  return {
    wrap: vi
      .fn()
      .mockImplementation((_key: string, compute: () => Promise<Result<unknown, unknown>>) =>
        compute(),
      ),
    invalidate: vi.fn().mockResolvedValue(undefined),
  };
}

/** Create a mock Logger that records calls. */
export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}

/** Assemble a complete RouteDependencies with all mocks. */
export function createMockDeps(): RouteDependencies & {
  tradingService: ReturnType<typeof createMockTradingService>;
  taskQueue: ReturnType<typeof createMockTaskQueue>;
  responseCache: ReturnType<typeof createMockResponseCache>;
  healthProbes: {
    store: ReturnType<typeof vi.fn>;
    broker: ReturnType<typeof vi.fn>;
  };
} {
  return {
    tradingService: createMockTradingService(),
    taskQueue: createMockTaskQueue(),
    responseCache: createMockResponseCache(),
    healthProbes: {
      store: vi.fn().mockResolvedValue(1),
      broker: vi.fn().mockResolvedValue('PONG'),
    },
    logger: createMockLogger(),
    clock: () => new Date('2024-05-17T12:00:00Z'),
  };
}
