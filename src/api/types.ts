import type { Clock } from '@/core/types.js';
import type { ResponseCache } from '@/cache/response-cache.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskQueue } from '@/tasks/queue.js';
import type { TradingService } from '@/trading/trading-service.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Health ─────────────────────────────────────────────────────

/** Resolves when the dependency answers; rejects otherwise. */
export type HealthProbe = () => Promise<unknown>;

export interface HealthProbes {
  store: HealthProbe;
  broker: HealthProbe;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins via Fastify register options. */
export interface RouteDependencies {
  tradingService: TradingService;
  /** Producer side of the broker; only enqueue and status lookups are used. */
  taskQueue: Pick<TaskQueue, 'enqueue' | 'getStatus'>;
  responseCache: ResponseCache;
  healthProbes: HealthProbes;
  logger: Logger;
  clock?: Clock;
  /** Zone of the trading calendar; "today" is taken there, or in UTC when omitted. */
  tradingTimeZone?: string;
}
