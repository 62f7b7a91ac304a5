// Background tasks: catalogue, queue, worker, beat
export { TASK_NAMES, isTaskName, resolveImportTargetDate, taskPayloadSchemas } from './definitions.js';
export type { ImportBulletinsPayload, TaskName, TaskPayloads } from './definitions.js';

export { createTaskQueue, DEFAULT_JOB_OPTIONS, QUEUE_NAME } from './queue.js';
export type { TaskQueue, TaskQueueOptions } from './queue.js';

export { createTaskWorker, processTaskJob } from './worker.js';
export type { TaskWorker, TaskWorkerOptions } from './worker.js';

export { createTaskHandlers } from './handlers.js';
export type { TaskHandlerDependencies } from './handlers.js';

export { beatJobId, computeNextFireTime, createBeat, validateBeatEntries } from './beat.js';
export type { Beat, BeatEntry, BeatOptions, TickReport } from './beat.js';

export { createRedisLeaderLock } from './leader-lock.js';
export type { LeaderLock, LockStore } from './leader-lock.js';

export type {
  EnqueueOptions,
  EnqueuedTask,
  TaskContext,
  TaskHandler,
  TaskHandlers,
  TaskJobData,
  TaskProducer,
  TaskState,
  TaskStatus,
} from './types.js';
