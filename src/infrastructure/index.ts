// Database pool and store readiness
export {
  createDatabase,
  getDatabase,
  resetDatabaseSingleton,
  waitForStore,
} from './database.js';
export type { Database, DatabaseOptions, WaitForStoreOptions } from './database.js';

// Redis connections and broker readiness
export {
  createBrokerProbe,
  createRedisClient,
  createRedisConnectionOptions,
  parseRedisUrl,
  waitForBroker,
} from './redis.js';
export type { BrokerProbe, RedisConnectionParts, WaitForBrokerOptions } from './redis.js';

// Retry
export { computeBackoffDelay, retryWithBackoff } from './retry.js';
export type { BackoffOptions, RetryFailure, RetryOptions } from './retry.js';

// Migrations
export { applyMigrations, loadMigrations, runMigrations } from './migrations/index.js';
export type { Migration, MigrationReport } from './migrations/index.js';

// Repositories
export { createTradingResultsRepository } from './repositories/index.js';
export type { TradingResultsRepository } from './repositories/index.js';
