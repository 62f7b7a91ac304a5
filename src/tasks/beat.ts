/**
 * Beat: enqueues recurring tasks from the schedule file.
 *
 * Several beat processes may run (a duplicated deployment, a rolling
 * restart); only the holder of the leader lease enqueues. Job ids are
 * derived from the entry and its fire time, so even two leaders in the same
 * instant produce a single job per fire time.
 */
import { CronExpressionParser } from 'cron-parser';
import type { z } from 'zod';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { ValidationError, toError } from '@/core/errors.js';
import type { Clock } from '@/core/types.js';
import { systemClock } from '@/core/types.js';
import type { BeatEntryConfig } from '@/config/types.js';
import type { Logger } from '@/observability/logger.js';
import { waitForBroker } from '@/infrastructure/redis.js';
import type { TaskName, TaskPayloads } from './definitions.js';
import { isTaskName, taskPayloadSchemas } from './definitions.js';
import type { LeaderLock } from './leader-lock.js';
import type { TaskProducer } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

/** A validated schedule entry. */
export interface BeatEntry {
  name: string;
  cron: string;
  timezone?: string;
  task: TaskName;
  payload: TaskPayloads[TaskName];
}

export interface BeatOptions {
  entries: BeatEntry[];
  producer: TaskProducer;
  lock: LeaderLock;
  logger: Logger;
  /** Tick interval in milliseconds. */
  tickMs: number;
  /** Round-trip to the broker, used to gate startup. */
  brokerPing: () => Promise<unknown>;
  clock?: Clock;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface TickReport {
  leader: boolean;
  /** Job ids enqueued on this tick. */
  enqueued: string[];
}

export interface Beat {
  /** Run one scheduling pass. Never throws. */
  tick(): Promise<TickReport>;
  /** Next fire time per entry name. */
  nextFireTimes(): ReadonlyMap<string, Date>;
  /** Wait for the broker, then tick again `tickMs` after each pass settles. */
  start(): Promise<void>;
  /** Stop ticking and release the lease. */
  stop(): Promise<void>;
}

// ─── Helpers ────────────────────────────────────────────────────

/** Next fire time strictly after `from`. */
export function computeNextFireTime(entry: Pick<BeatEntry, 'cron' | 'timezone'>, from: Date): Date {
  const interval = CronExpressionParser.parse(entry.cron, {
    currentDate: from,
    tz: entry.timezone,
  });
  return interval.next().toDate();
}

/** Job id for one firing of an entry. */
export function beatJobId(entryName: string, fireTime: Date): string {
  return `beat-${entryName}-${fireTime.getTime()}`;
}

/**
 * Validate schedule entries against the task catalogue.
 * Disabled entries are dropped.
 */
export function validateBeatEntries(
  entries: BeatEntryConfig[],
): Result<BeatEntry[], ValidationError> {
  const valid: BeatEntry[] = [];

  for (const entry of entries) {
    if (!entry.enabled) continue;

    if (!isTaskName(entry.task)) {
      return err(new ValidationError(`Beat entry "${entry.name}" names unknown task "${entry.task}"`, {
        entry: entry.name,
      }));
    }

    try {
      CronExpressionParser.parse(entry.cron, { tz: entry.timezone });
    } catch (error) {
      return err(new ValidationError(`Beat entry "${entry.name}" has an invalid cron expression`, {
        entry: entry.name,
        cron: entry.cron,
        reason: toError(error).message,
      }));
    }

    const schema: z.ZodTypeAny = taskPayloadSchemas[entry.task];
    const parsed = schema.safeParse(entry.payload);
    if (!parsed.success) {
      return err(new ValidationError(`Beat entry "${entry.name}" has an invalid payload`, {
        entry: entry.name,
        issues: parsed.error.issues,
      }));
    }

    valid.push({
      name: entry.name,
      cron: entry.cron,
      timezone: entry.timezone,
      task: entry.task,
      payload: parsed.data,
    });
  }

  return ok(valid);
}

// ─── Factory ────────────────────────────────────────────────────

export function createBeat(options: BeatOptions): Beat {
  const { entries, producer, lock, logger, tickMs, brokerPing, sleep } = options;
  const clock = options.clock ?? systemClock;

  const schedule = new Map<string, Date>();
  const now = clock();
  for (const entry of entries) {
    schedule.set(entry.name, computeNextFireTime(entry, now));
  }

  let timer: ReturnType<typeof setTimeout> | null = null;
  const abort = new AbortController();

  async function isLeader(): Promise<boolean> {
    try {
      return await lock.acquire();
    } catch (error) {
      logger.error('Leader lease check failed', {
        component: 'beat',
        error: toError(error).message,
      });
      return false;
    }
  }

  async function tick(): Promise<TickReport> {
    const current = clock();
    const leader = await isLeader();
    const enqueued: string[] = [];

    for (const entry of entries) {
      const due = schedule.get(entry.name);
      if (!due || due > current) continue;

      if (!leader) {
        // Fire times passed while not leading are not replayed.
        schedule.set(entry.name, computeNextFireTime(entry, current));
        continue;
      }

      const jobId = beatJobId(entry.name, due);
      try {
        await producer.enqueue(entry.task, entry.payload, { jobId, scheduledFor: due });
      } catch (error) {
        // Keep the fire time; the next tick retries with the same job id.
        logger.error('Failed to enqueue scheduled task', {
          component: 'beat',
          entry: entry.name,
          jobId,
          error: toError(error).message,
        });
        continue;
      }

      enqueued.push(jobId);
      const next = computeNextFireTime(entry, current);
      schedule.set(entry.name, next);
      logger.info('Scheduled task enqueued', {
        component: 'beat',
        entry: entry.name,
        task: entry.task,
        jobId,
        nextFireTime: next.toISOString(),
      });
    }

    return { leader, enqueued };
  }

  // Armed only after the current tick settles; ticks never overlap.
  function scheduleNextTick(): void {
    if (abort.signal.aborted) return;
    timer = setTimeout(() => {
      timer = null;
      void runTick();
    }, tickMs);
  }

  async function runTick(): Promise<void> {
    try {
      await tick();
    } catch (error) {
      logger.error('Beat tick failed', { component: 'beat', error: toError(error).message });
    }
    scheduleNextTick();
  }

  return {
    tick,

    nextFireTimes: () => schedule,

    async start(): Promise<void> {
      const ready = await waitForBroker(brokerPing, {
        logger,
        component: 'beat',
        signal: abort.signal,
        sleep,
      });
      if (!ready.ok) return;

      await runTick();

      logger.info('Beat started', {
        component: 'beat',
        entries: entries.map((entry) => entry.name),
        tickMs,
      });
    },

    async stop(): Promise<void> {
      abort.abort();
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }

      try {
        await lock.release();
      } catch (error) {
        logger.warn('Failed to release leader lease', {
          component: 'beat',
          error: toError(error).message,
        });
      }

      logger.info('Beat stopped', { component: 'beat' });
    },
  };
}
