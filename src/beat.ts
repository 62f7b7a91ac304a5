import 'dotenv/config';
import { beatScheduleFileSchema, loadConfig, loadJsonConfigFile } from '@/config/index.js';
import { toError } from '@/core/index.js';
import { createLogger } from '@/observability/index.js';
import {
  createBrokerProbe,
  createRedisClient,
  createRedisConnectionOptions,
} from '@/infrastructure/index.js';
import {
  createBeat,
  createRedisLeaderLock,
  createTaskQueue,
  validateBeatEntries,
} from '@/tasks/index.js';

const LEADER_LOCK_KEY = 'trading-results:beat:leader';

async function start(): Promise<void> {
  const configResult = loadConfig();
  if (!configResult.ok) {
    createLogger().fatal('Invalid configuration', {
      component: 'beat',
      error: configResult.error.message,
      context: configResult.error.context,
    });
    process.exit(1);
  }
  const config = configResult.value;
  const logger = createLogger({ level: config.logLevel, name: 'beat' });

  const schedule = await loadJsonConfigFile(config.beat.scheduleFile, beatScheduleFileSchema);
  if (!schedule.ok) {
    logger.fatal('Invalid beat schedule', {
      component: 'beat',
      error: schedule.error.message,
      context: schedule.error.context,
    });
    process.exit(1);
  }

  const entries = validateBeatEntries(schedule.value.entries);
  if (!entries.ok) {
    logger.fatal('Invalid beat schedule', {
      component: 'beat',
      error: entries.error.message,
      context: entries.error.context,
    });
    process.exit(1);
  }

  const redisOptions = createRedisConnectionOptions(config.redis.url);
  if (!redisOptions.ok) {
    logger.fatal('Invalid Redis configuration', { component: 'beat', error: redisOptions.error.message });
    process.exit(1);
  }

  const lockClient = createRedisClient(redisOptions.value);
  const brokerProbe = createBrokerProbe(redisOptions.value, logger);
  const taskQueue = createTaskQueue({ connection: redisOptions.value, logger });

  const beat = createBeat({
    entries: entries.value,
    producer: taskQueue,
    lock: createRedisLeaderLock({
      store: lockClient,
      key: LEADER_LOCK_KEY,
      ttlMs: config.beat.lockTtlMs,
    }),
    logger,
    tickMs: config.beat.tickMs,
    brokerPing: () => brokerProbe.ping(),
  });

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...', { component: 'beat' });
    await beat.stop();
    await taskQueue.close();
    brokerProbe.close();
    lockClient.disconnect();
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());

  logger.info('Beat schedule loaded', {
    component: 'beat',
    entries: entries.value.map((entry) => entry.name),
  });
  await beat.start();
}

start().catch((error: unknown) => {
  createLogger().fatal('Failed to start beat', {
    component: 'beat',
    error: toError(error).message,
  });
  process.exit(1);
});
