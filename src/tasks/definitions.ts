/**
 * Task catalogue: every task the worker knows, with its payload schema.
 */
import { z } from 'zod';
import type { IsoDate } from '@/core/types.js';
import { addDays, parseIsoDate, toIsoDate } from '@/core/types.js';

export const TASK_NAMES = ['import-bulletins', 'invalidate-cache'] as const;

export type TaskName = (typeof TASK_NAMES)[number];

export function isTaskName(value: string): value is TaskName {
  return TASK_NAMES.some((name) => name === value);
}

// ─── Payload Schemas ────────────────────────────────────────────

const isoDateSchema = z
  .string()
  .refine((value) => parseIsoDate(value) !== null, { message: 'Expected a YYYY-MM-DD date' });

/**
 * `targetDate` imports from that day through today; `lookbackDays` is
 * relative to the job's fire time, which suits recurring beat entries.
 */
export const importBulletinsPayloadSchema = z.union([
  z.object({ targetDate: isoDateSchema }).strict(),
  z.object({ lookbackDays: z.number().int().min(0).max(365) }).strict(),
]);

export const invalidateCachePayloadSchema = z.object({}).strict();

export const taskPayloadSchemas = {
  'import-bulletins': importBulletinsPayloadSchema,
  'invalidate-cache': invalidateCachePayloadSchema,
} satisfies Record<TaskName, z.ZodTypeAny>;

export type TaskPayloads = { [K in TaskName]: z.infer<(typeof taskPayloadSchemas)[K]> };

export type ImportBulletinsPayload = TaskPayloads['import-bulletins'];

// ─── Helpers ────────────────────────────────────────────────────

/**
 * First day an import-bulletins job covers, given the moment it refers to.
 * Lookbacks count back from that moment's day in `timeZone` (UTC when omitted).
 */
export function resolveImportTargetDate(
  payload: ImportBulletinsPayload,
  reference: Date,
  timeZone?: string,
): IsoDate {
  const referenceDay = toIsoDate(reference, timeZone);
  if ('targetDate' in payload) {
    return parseIsoDate(payload.targetDate) ?? referenceDay;
  }
  return addDays(referenceDay, -payload.lookbackDays);
}
