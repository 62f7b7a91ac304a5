import 'dotenv/config';
import { loadConfig } from '@/config/index.js';
import { toError } from '@/core/index.js';
import { createLogger } from '@/observability/index.js';
import {
  applyMigrations,
  createBrokerProbe,
  createDatabase,
  createRedisClient,
  createRedisConnectionOptions,
  createTradingResultsRepository,
  waitForStore,
} from '@/infrastructure/index.js';
import { createResponseCache } from '@/cache/index.js';
import { createSpimexClient, createTradingService } from '@/trading/index.js';
import { createTaskQueue } from '@/tasks/index.js';
import { buildServer, startApiService } from '@/api/index.js';
import type { RouteDependencies } from '@/api/index.js';

async function start(): Promise<void> {
  const configResult = loadConfig();
  if (!configResult.ok) {
    createLogger().fatal('Invalid configuration', {
      component: 'main',
      error: configResult.error.message,
      context: configResult.error.context,
    });
    process.exit(1);
  }
  const config = configResult.value;
  const logger = createLogger({ level: config.logLevel, name: 'api' });

  const redisOptions = createRedisConnectionOptions(config.redis.url);
  if (!redisOptions.ok) {
    logger.fatal('Invalid Redis configuration', { component: 'main', error: redisOptions.error.message });
    process.exit(1);
  }

  const db = createDatabase({ dsn: config.database.dsn });
  // Cache lookups fail fast so requests fall back to the store while Redis is down.
  const cacheClient = createRedisClient({ ...redisOptions.value, maxRetriesPerRequest: 1 });
  const brokerProbe = createBrokerProbe(redisOptions.value, logger);
  const taskQueue = createTaskQueue({ connection: redisOptions.value, logger });

  const responseCache = createResponseCache({
    store: cacheClient,
    ttlSeconds: config.redis.cacheTtlSeconds,
    logger,
  });
  const tradingService = createTradingService({
    repository: createTradingResultsRepository(db.pool, logger),
    client: createSpimexClient({
      baseUrl: config.spimex.bulletinUrl,
      timeoutMs: config.spimex.timeoutMs,
      logger,
    }),
    logger,
    timeZone: config.spimex.timeZone,
  });

  const deps: RouteDependencies = {
    tradingService,
    taskQueue,
    responseCache,
    healthProbes: {
      store: () => db.ping(),
      broker: () => brokerProbe.ping(),
    },
    logger,
    tradingTimeZone: config.spimex.timeZone,
  };

  const server = await buildServer(deps, {
    apiPrefix: config.server.apiPrefix,
    corsOrigins: config.server.corsOrigins,
  });

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...', { component: 'main' });
    await server.close();
    await taskQueue.close();
    cacheClient.disconnect();
    brokerProbe.close();
    await db.disconnect();
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  const started = await startApiService({
    waitForStore: () =>
      waitForStore(db, { maxAttempts: config.database.connectMaxAttempts, logger }),
    migrate: config.database.migrateOnStart
      ? () => applyMigrations({ pool: db.pool, dir: config.database.migrationsDir, logger })
      : undefined,
    listen: () => server.listen({ host: config.server.host, port: config.server.port }),
    logger,
  });

  if (!started.ok) {
    logger.fatal('API failed to start', {
      component: 'main',
      stage: started.error.stage,
      code: started.error.error.code,
      error: started.error.error.message,
    });
    await shutdown();
    process.exit(1);
  }
}

start().catch((error: unknown) => {
  createLogger().fatal('Failed to start server', {
    component: 'main',
    error: toError(error).message,
  });
  process.exit(1);
});
