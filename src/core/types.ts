// ─── Branded Types ───────────────────────────────────────────────
// Branded types keep plain strings from flowing where a checked value is expected.

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = Brand<string, 'IsoDate'>;
/** Identifier of a job on the broker. */
export type JobId = Brand<string, 'JobId'>;

// ─── Clock ──────────────────────────────────────────────────────

/** Injectable time source; tests pass a fixed clock. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// ─── IsoDate helpers ────────────────────────────────────────────

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Format the calendar day of a Date as seen in `timeZone`, or in UTC when none is given. */
export function toIsoDate(date: Date, timeZone?: string): IsoDate {
  if (!timeZone) return date.toISOString().slice(0, 10) as IsoDate;

  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';
  return `${part('year')}-${part('month')}-${part('day')}` as IsoDate;
}

/** Whether `value` names an IANA time zone the runtime knows. */
export function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

/** Parse `YYYY-MM-DD`, rejecting impossible days such as 2024-02-30. */
export function parseIsoDate(value: string): IsoDate | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return null;
  const parsed = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(parsed.getTime())) return null;
  return toIsoDate(parsed) === value ? (value as IsoDate) : null;
}

/** Shift a date by a whole number of days. */
export function addDays(date: IsoDate, days: number): IsoDate {
  const base = new Date(`${date}T00:00:00.000Z`).getTime();
  return toIsoDate(new Date(base + days * DAY_MS));
}

/** Days from `from` to `to` inclusive, newest first. Empty when `from > to`. */
export function listDaysDescending(from: IsoDate, to: IsoDate): IsoDate[] {
  const days: IsoDate[] = [];
  for (let day = to; day >= from; day = addDays(day, -1)) {
    days.push(day);
  }
  return days;
}

/** `YYYYMMDD` token used in bulletin file names. */
export function compactDate(date: IsoDate): string {
  return date.replaceAll('-', '');
}
