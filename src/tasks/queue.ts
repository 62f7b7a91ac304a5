/**
 * Task queue: BullMQ producer shared by the API and the beat.
 *
 * Jobs retry 3 times with exponential backoff (2s, 4s, 8s); only the last
 * 100 completed and failed jobs are kept on the broker.
 */
import { Queue } from 'bullmq';
import type { ConnectionOptions, JobsOptions } from 'bullmq';
import { nanoid } from 'nanoid';
import type { z } from 'zod';
import { ValidationError } from '@/core/errors.js';
import type { Clock, JobId } from '@/core/types.js';
import { systemClock } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskName, TaskPayloads } from './definitions.js';
import { taskPayloadSchemas } from './definitions.js';
import type {
  EnqueueOptions,
  EnqueuedTask,
  TaskJobData,
  TaskProducer,
  TaskState,
  TaskStatus,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface TaskQueueOptions {
  connection: ConnectionOptions;
  logger: Logger;
  clock?: Clock;
}

export interface TaskQueue extends TaskProducer {
  /** Look up a job; null when the broker has no such job (never existed or pruned). */
  getStatus(jobId: string): Promise<TaskStatus | null>;
  /** Close the broker connection. */
  close(): Promise<void>;
}

// ─── Constants ──────────────────────────────────────────────────

export const QUEUE_NAME = 'trading-tasks';

export const DEFAULT_JOB_OPTIONS: JobsOptions = {
  attempts: 3,
  backoff: {
    type: 'exponential',
    delay: 2000,
  },
  removeOnComplete: 100,
  removeOnFail: 100,
};

// ─── Helpers ────────────────────────────────────────────────────

function toTaskState(state: string): TaskState {
  switch (state) {
    case 'waiting':
    case 'prioritized':
    case 'waiting-children':
      return 'waiting';
    case 'active':
    case 'completed':
    case 'failed':
    case 'delayed':
      return state;
    default:
      return 'unknown';
  }
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a TaskQueue backed by BullMQ. */
export function createTaskQueue(options: TaskQueueOptions): TaskQueue {
  const { connection, logger } = options;
  const clock = options.clock ?? systemClock;

  const queue = new Queue<TaskJobData, unknown, TaskName>(QUEUE_NAME, {
    connection,
    defaultJobOptions: DEFAULT_JOB_OPTIONS,
  });

  queue.on('error', (error) => {
    logger.error('Task queue error', { component: 'task-queue', error: error.message });
  });

  return {
    async enqueue<K extends TaskName>(
      task: K,
      payload: TaskPayloads[K],
      enqueueOptions: EnqueueOptions = {},
    ): Promise<EnqueuedTask> {
      const schema: z.ZodTypeAny = taskPayloadSchemas[task];
      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        throw new ValidationError(`Invalid payload for task "${task}"`, {
          task,
          issues: parsed.error.issues,
        });
      }

      const data: TaskJobData = {
        payload: parsed.data,
        enqueuedAt: clock().toISOString(),
        scheduledFor: enqueueOptions.scheduledFor?.toISOString(),
      };

      const job = await queue.add(task, data, {
        jobId: enqueueOptions.jobId ?? nanoid(),
      });

      const jobId = (job.id ?? enqueueOptions.jobId ?? '') as JobId;
      logger.debug('Task enqueued', { component: 'task-queue', task, jobId });
      return { jobId, task };
    },

    async getStatus(jobId: string): Promise<TaskStatus | null> {
      const job = await queue.getJob(jobId);
      if (!job) return null;

      const state = toTaskState(await job.getState());
      return {
        jobId: jobId as JobId,
        task: job.name,
        state,
        attemptsMade: job.attemptsMade,
        enqueuedAt: job.data.enqueuedAt,
        result: state === 'completed' ? job.returnvalue : undefined,
        failedReason: state === 'failed' ? job.failedReason : undefined,
      };
    },

    async close(): Promise<void> {
      await queue.close();
    },
  };
}
