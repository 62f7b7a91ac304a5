/**
 * Task worker: consumes the task queue and dispatches jobs to handlers.
 *
 * The broker may come up after the worker: `start()` waits for it with
 * unbounded retry before consuming. Unknown tasks and invalid payloads are
 * failed without retry; any other error is retried by BullMQ.
 */
import { UnrecoverableError, Worker } from 'bullmq';
import type { ConnectionOptions, Job } from 'bullmq';
import type { z } from 'zod';
import { toError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import { waitForBroker } from '@/infrastructure/redis.js';
import type { TaskName } from './definitions.js';
import {
  importBulletinsPayloadSchema,
  invalidateCachePayloadSchema,
  isTaskName,
} from './definitions.js';
import { DEFAULT_JOB_OPTIONS, QUEUE_NAME } from './queue.js';
import type { TaskContext, TaskHandlers, TaskJobData } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface TaskWorkerOptions {
  connection: ConnectionOptions;
  handlers: TaskHandlers;
  logger: Logger;
  /** Jobs processed in parallel. */
  concurrency: number;
  /** Round-trip to the broker, used to gate startup. */
  brokerPing: () => Promise<unknown>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface TaskWorker {
  /** Wait for the broker, then start consuming. */
  start(): Promise<void>;
  /** Stop consuming; in-flight jobs finish first. */
  stop(): Promise<void>;
}

/** The job fields dispatching reads. */
export type DispatchableJob = Pick<Job<TaskJobData>, 'id' | 'name' | 'data' | 'attemptsMade'>;

// ─── Dispatch ───────────────────────────────────────────────────

function parsePayload<T extends z.ZodTypeAny>(task: TaskName, schema: T, payload: unknown): z.infer<T> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new UnrecoverableError(`Invalid payload for task "${task}": ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Validate a job and run its handler. Returns the handler's result. */
export async function processTaskJob(
  job: DispatchableJob,
  handlers: TaskHandlers,
  logger: Logger,
): Promise<unknown> {
  const { name, data } = job;
  if (!isTaskName(name)) {
    throw new UnrecoverableError(`Unknown task "${name}"`);
  }

  const context: TaskContext = {
    jobId: job.id ?? 'unknown',
    attempt: job.attemptsMade + 1,
    enqueuedAt: new Date(data.enqueuedAt),
    scheduledFor: data.scheduledFor ? new Date(data.scheduledFor) : undefined,
    logger: logger.child({ jobId: job.id, task: name }),
  };

  logger.info('Processing task', {
    component: 'task-worker',
    jobId: context.jobId,
    task: name,
    attempt: context.attempt,
  });

  switch (name) {
    case 'import-bulletins':
      return handlers[name](parsePayload(name, importBulletinsPayloadSchema, data.payload), context);
    case 'invalidate-cache':
      return handlers[name](parsePayload(name, invalidateCachePayloadSchema, data.payload), context);
  }
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a TaskWorker backed by BullMQ. */
export function createTaskWorker(options: TaskWorkerOptions): TaskWorker {
  const { connection, handlers, logger, concurrency, brokerPing, sleep } = options;
  const maxAttempts = DEFAULT_JOB_OPTIONS.attempts ?? 1;

  let worker: Worker<TaskJobData, unknown> | null = null;
  const abort = new AbortController();

  return {
    async start(): Promise<void> {
      const ready = await waitForBroker(brokerPing, {
        logger,
        component: 'task-worker',
        signal: abort.signal,
        sleep,
      });
      if (!ready.ok) return;

      worker = new Worker<TaskJobData, unknown>(
        QUEUE_NAME,
        (job) => processTaskJob(job, handlers, logger),
        { connection, concurrency },
      );

      worker.on('completed', (job) => {
        logger.info('Task completed', {
          component: 'task-worker',
          jobId: job.id,
          task: job.name,
          attempt: job.attemptsMade,
        });
      });

      worker.on('failed', (job, error) => {
        const permanent =
          error instanceof UnrecoverableError || (job?.attemptsMade ?? 0) >= maxAttempts;
        const context = {
          component: 'task-worker',
          jobId: job?.id,
          task: job?.name,
          attempt: job?.attemptsMade,
          error: error.message,
        };
        if (permanent) {
          logger.error('Task failed permanently', context);
        } else {
          logger.warn('Task failed, will retry', context);
        }
      });

      worker.on('error', (error) => {
        logger.error('Task worker error', { component: 'task-worker', error: toError(error).message });
      });

      logger.info('Task worker started', {
        component: 'task-worker',
        queueName: QUEUE_NAME,
        concurrency,
      });
    },

    async stop(): Promise<void> {
      abort.abort();
      if (worker) {
        await worker.close();
        worker = null;
      }
      logger.info('Task worker stopped', { component: 'task-worker' });
    },
  };
}
