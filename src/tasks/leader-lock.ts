/**
 * Redis leader lease for the beat.
 *
 * Only the lease holder enqueues recurring tasks. The lease is a key with a
 * millisecond TTL set with NX; the holder renews it on every tick and only
 * the owning token may renew or release it.
 */
import { nanoid } from 'nanoid';

/** The subset of the ioredis client the lease needs. */
export interface LockStore {
  set(key: string, value: string, px: 'PX', ttlMs: number, nx: 'NX'): Promise<string | null>;
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
}

export interface LeaderLock {
  /** Take or renew the lease. Resolves true while this instance is the leader. */
  acquire(): Promise<boolean>;
  /** Give up the lease if held. */
  release(): Promise<void>;
  /** Token identifying this instance. */
  readonly token: string;
}

export interface RedisLeaderLockOptions {
  store: LockStore;
  key: string;
  ttlMs: number;
  token?: string;
}

const RENEW_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('pexpire', KEYS[1], ARGV[2])
end
return 0`;

const RELEASE_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
end
return 0`;

export function createRedisLeaderLock(options: RedisLeaderLockOptions): LeaderLock {
  const { store, key, ttlMs } = options;
  const token = options.token ?? nanoid();

  return {
    token,

    async acquire(): Promise<boolean> {
      const set = await store.set(key, token, 'PX', ttlMs, 'NX');
      if (set === 'OK') return true;

      const renewed = await store.eval(RENEW_SCRIPT, 1, key, token, ttlMs);
      return renewed === 1;
    },

    async release(): Promise<void> {
      await store.eval(RELEASE_SCRIPT, 1, key, token);
    },
  };
}
