/**
 * Redis connection helpers shared by the response cache, the task queue,
 * the worker and the beat.
 */
import Redis from 'ioredis';
import type { RedisOptions } from 'ioredis';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { BrokerUnavailableError, ConfigError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { BackoffOptions } from './retry.js';
import { computeBackoffDelay, retryWithBackoff } from './retry.js';

export interface RedisConnectionParts {
  host: string;
  port: number;
  username?: string;
  password?: string;
  db?: number;
  tls: boolean;
}

/** Parse a `redis://[user:pass@]host[:port][/db]` URL. */
export function parseRedisUrl(url: string): Result<RedisConnectionParts, ConfigError> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return err(new ConfigError(`Invalid Redis URL "${url}"`, { field: 'REDIS_URL' }));
  }

  if (parsed.protocol !== 'redis:' && parsed.protocol !== 'rediss:') {
    return err(
      new ConfigError(`Unsupported Redis URL protocol "${parsed.protocol}"`, { field: 'REDIS_URL' }),
    );
  }
  if (!parsed.hostname) {
    return err(new ConfigError('Redis URL has no host', { field: 'REDIS_URL' }));
  }

  const dbSegment = parsed.pathname.replace(/^\//, '');
  let db: number | undefined;
  if (dbSegment) {
    db = Number(dbSegment);
    if (!Number.isInteger(db) || db < 0) {
      return err(new ConfigError(`Invalid Redis database "${dbSegment}"`, { field: 'REDIS_URL' }));
    }
  }

  return ok({
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db,
    tls: parsed.protocol === 'rediss:',
  });
}

/**
 * ioredis options for a BullMQ-compatible connection.
 * `maxRetriesPerRequest: null` is required by BullMQ workers; reconnects back off up to 10s.
 */
export function createRedisConnectionOptions(url: string): Result<RedisOptions, ConfigError> {
  const parts = parseRedisUrl(url);
  if (!parts.ok) return parts;

  const { host, port, username, password, db, tls } = parts.value;
  return ok({
    host,
    port,
    username,
    password,
    db,
    tls: tls ? {} : undefined,
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    retryStrategy: (times: number) => computeBackoffDelay(times, { initialDelayMs: 200 }),
  });
}

/** Create a lazily-connecting ioredis client. */
export function createRedisClient(options: RedisOptions): Redis {
  return new Redis({ ...options, lazyConnect: true });
}

// ─── Probe ──────────────────────────────────────────────────────

export interface BrokerProbe {
  /** One round-trip; rejects as soon as the broker cannot be reached. */
  ping(): Promise<unknown>;
  close(): void;
}

/**
 * A ping client for readiness checks. Unlike the shared clients it never
 * queues commands behind reconnect attempts: each ping connects on demand.
 */
export function createBrokerProbe(options: RedisOptions, logger: Logger): BrokerProbe {
  const client = new Redis({
    ...options,
    lazyConnect: true,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 0,
    retryStrategy: () => null,
  });

  client.on('error', (error: Error) => {
    logger.debug('Broker probe connection error', {
      component: 'broker-probe',
      error: error.message,
    });
  });

  return {
    async ping(): Promise<unknown> {
      if (client.status === 'wait' || client.status === 'end') {
        await client.connect();
      }
      return client.ping();
    },

    close(): void {
      client.disconnect();
    },
  };
}

// ─── Readiness ──────────────────────────────────────────────────

export interface WaitForBrokerOptions extends BackoffOptions {
  logger: Logger;
  /** Component name used in log context (`worker`, `beat`). */
  component: string;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Block until the broker answers `ping`, retrying without limit.
 * Only returns an error when `signal` aborts the wait.
 */
export async function waitForBroker(
  ping: () => Promise<unknown>,
  options: WaitForBrokerOptions,
): Promise<Result<void, BrokerUnavailableError>> {
  const { logger, component, ...retry } = options;

  const result = await retryWithBackoff(() => ping(), {
    ...retry,
    maxAttempts: Infinity,
    onRetry: ({ attempt, delayMs, error }) => {
      logger.warn('Broker not reachable yet, retrying', {
        component,
        attempt,
        delayMs,
        error: error.message,
      });
    },
  });

  if (!result.ok) {
    return err(new BrokerUnavailableError(result.error.attempts, result.error.lastError));
  }

  logger.info('Broker reachable', { component });
  return ok(undefined);
}
