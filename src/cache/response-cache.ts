/**
 * Response cache for the read endpoints, backed by Redis.
 *
 * Keys are namespaced by a generation counter: `invalidate()` bumps the
 * counter and every key written under an older generation becomes
 * unreachable, leaving it to expire on its TTL. Store failures never fail
 * a request; the value is computed instead.
 */
import type { Result } from '@/core/result.js';
import { toError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';

// ─── Types ──────────────────────────────────────────────────────

/** The subset of the ioredis client the cache needs. */
export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  incr(key: string): Promise<number>;
}

export interface ResponseCache {
  /**
   * Return the cached value for `key`, or compute, cache and return it.
   * Only successful results are cached.
   */
  wrap<E>(key: string, compute: () => Promise<Result<unknown, E>>): Promise<Result<unknown, E>>;
  /** Make every cached value unreachable. */
  invalidate(): Promise<void>;
}

export interface ResponseCacheOptions {
  store: CacheStore;
  ttlSeconds: number;
  namespace?: string;
  logger: Logger;
}

// ─── Keys ───────────────────────────────────────────────────────

/** Stable key for a route and its query parameters; unset parameters are dropped. */
export function buildCacheKey(
  route: string,
  params: Record<string, string | number | undefined> = {},
): string {
  const query = Object.entries(params)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, value]) => `${name}=${String(value)}`)
    .join('&');
  return query ? `${route}?${query}` : route;
}

// ─── Factory ────────────────────────────────────────────────────

export function createResponseCache(options: ResponseCacheOptions): ResponseCache {
  const { store, ttlSeconds, logger } = options;
  const namespace = options.namespace ?? 'trading-results';
  const generationKey = `${namespace}:generation`;

  function warn(msg: string, key: string, error: unknown): void {
    logger.warn(msg, { component: 'response-cache', key, error: toError(error).message });
  }

  return {
    async wrap<E>(
      key: string,
      compute: () => Promise<Result<unknown, E>>,
    ): Promise<Result<unknown, E>> {
      let dataKey: string | undefined;
      try {
        const generation = (await store.get(generationKey)) ?? '0';
        dataKey = `${namespace}:g${generation}:${key}`;
        const cached = await store.get(dataKey);
        if (cached !== null) {
          logger.debug('Cache hit', { component: 'response-cache', key });
          const value: unknown = JSON.parse(cached);
          return { ok: true, value };
        }
      } catch (error) {
        warn('Cache read failed, computing value', key, error);
      }

      const result = await compute();
      if (result.ok && dataKey !== undefined) {
        try {
          await store.set(dataKey, JSON.stringify(result.value), 'EX', ttlSeconds);
        } catch (error) {
          warn('Cache write failed', key, error);
        }
      }
      return result;
    },

    async invalidate(): Promise<void> {
      const generation = await store.incr(generationKey);
      logger.info('Response cache invalidated', { component: 'response-cache', generation });
    },
  };
}
