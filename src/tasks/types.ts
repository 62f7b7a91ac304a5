import type { JobId } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { TaskName, TaskPayloads } from './definitions.js';

// ─── Jobs ───────────────────────────────────────────────────────

/** Data stored on every broker job; the job name is the task name. */
export interface TaskJobData {
  payload: unknown;
  /** ISO timestamp of when the producer enqueued the job. */
  enqueuedAt: string;
  /** ISO timestamp of the fire time, for jobs produced by the beat. */
  scheduledFor?: string;
}

export interface EnqueueOptions {
  /** Caller-chosen id; enqueueing the same id twice yields one job. */
  jobId?: string;
  scheduledFor?: Date;
}

export interface EnqueuedTask {
  jobId: JobId;
  task: TaskName;
}

export type TaskState = 'waiting' | 'active' | 'completed' | 'failed' | 'delayed' | 'unknown';

export interface TaskStatus {
  jobId: JobId;
  task: string;
  state: TaskState;
  attemptsMade: number;
  enqueuedAt?: string;
  result?: unknown;
  failedReason?: string;
}

// ─── Producer ───────────────────────────────────────────────────

export interface TaskProducer {
  /** Validate the payload and put a task on the broker. */
  enqueue<K extends TaskName>(
    task: K,
    payload: TaskPayloads[K],
    options?: EnqueueOptions,
  ): Promise<EnqueuedTask>;
}

// ─── Handlers ───────────────────────────────────────────────────

export interface TaskContext {
  jobId: string;
  /** 1 on the first delivery. */
  attempt: number;
  enqueuedAt: Date;
  scheduledFor?: Date;
  logger: Logger;
}

export type TaskHandler<K extends TaskName> = (
  payload: TaskPayloads[K],
  context: TaskContext,
) => Promise<unknown>;

/** One handler per known task; adding a task without a handler does not compile. */
export type TaskHandlers = { [K in TaskName]: TaskHandler<K> };
