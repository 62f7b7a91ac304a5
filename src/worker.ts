import 'dotenv/config';
import { loadConfig } from '@/config/index.js';
import { toError } from '@/core/index.js';
import { createLogger } from '@/observability/index.js';
import {
  createBrokerProbe,
  createDatabase,
  createRedisClient,
  createRedisConnectionOptions,
  createTradingResultsRepository,
} from '@/infrastructure/index.js';
import { createResponseCache } from '@/cache/index.js';
import { createSpimexClient, createTradingService } from '@/trading/index.js';
import { createTaskHandlers, createTaskWorker } from '@/tasks/index.js';

async function start(): Promise<void> {
  const configResult = loadConfig();
  if (!configResult.ok) {
    createLogger().fatal('Invalid configuration', {
      component: 'worker',
      error: configResult.error.message,
      context: configResult.error.context,
    });
    process.exit(1);
  }
  const config = configResult.value;
  const logger = createLogger({ level: config.logLevel, name: 'worker' });

  const redisOptions = createRedisConnectionOptions(config.redis.url);
  if (!redisOptions.ok) {
    logger.fatal('Invalid Redis configuration', { component: 'worker', error: redisOptions.error.message });
    process.exit(1);
  }

  // The store is not awaited here: imports that hit an unreachable store fail and are retried.
  const db = createDatabase({ dsn: config.database.dsn, maxConnections: config.worker.concurrency + 1 });
  const cacheClient = createRedisClient(redisOptions.value);
  const brokerProbe = createBrokerProbe(redisOptions.value, logger);

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
  const responseCache = createResponseCache({
    store: cacheClient,
    ttlSeconds: config.redis.cacheTtlSeconds,
    logger,
  });

  const worker = createTaskWorker({
    connection: redisOptions.value,
    handlers: createTaskHandlers({
      tradingService,
      responseCache,
      timeZone: config.spimex.timeZone,
    }),
    logger,
    concurrency: config.worker.concurrency,
    brokerPing: () => brokerProbe.ping(),
  });

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...', { component: 'worker' });
    await worker.stop();
    brokerProbe.close();
    cacheClient.disconnect();
    await db.disconnect();
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  await worker.start();
}

start().catch((error: unknown) => {
  createLogger().fatal('Failed to start worker', {
    component: 'worker',
    error: toError(error).message,
  });
  process.exit(1);
});
