import { describe, it, expect } from 'vitest';
import {
  addDays,
  compactDate,
  isTimeZone,
  listDaysDescending,
  parseIsoDate,
  toIsoDate,
} from './types.js';
import type { IsoDate } from './types.js';

describe('parseIsoDate', () => {
  it('accepts a valid calendar day', () => {
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29');
  });

  it('rejects impossible days', () => {
    expect(parseIsoDate('2023-02-29')).toBeNull();
    expect(parseIsoDate('2024-13-01')).toBeNull();
  });

  it('rejects other formats', () => {
    expect(parseIsoDate('20240229')).toBeNull();
    expect(parseIsoDate('2024-2-9')).toBeNull();
  });
});

describe('date helpers', () => {
  const day = '2024-03-01' as IsoDate;

  it('formats the UTC day of a Date', () => {
    expect(toIsoDate(new Date('2024-05-03T23:59:59.000Z'))).toBe('2024-05-03');
  });

  it('formats the day of a Date in a given time zone', () => {
    const lateUtcEvening = new Date('2024-05-16T22:30:00.000Z');

    expect(toIsoDate(lateUtcEvening, 'Europe/Moscow')).toBe('2024-05-17');
    expect(toIsoDate(lateUtcEvening, 'UTC')).toBe('2024-05-16');
    expect(toIsoDate(new Date('2024-01-01T02:00:00.000Z'), 'America/New_York')).toBe('2023-12-31');
  });

  it('recognises IANA time zone names', () => {
    expect(isTimeZone('Europe/Moscow')).toBe(true);
    expect(isTimeZone('Mars/Olympus_Mons')).toBe(false);
  });

  it('shifts across month boundaries', () => {
    expect(addDays(day, -1)).toBe('2024-02-29');
    expect(addDays(day, 31)).toBe('2024-04-01');
  });

  it('lists days newest first, inclusive on both ends', () => {
    expect(listDaysDescending('2024-02-28' as IsoDate, day)).toEqual([
      '2024-03-01',
      '2024-02-29',
      '2024-02-28',
    ]);
  });

  it('returns an empty list when from is after to', () => {
    expect(listDaysDescending(day, '2024-02-28' as IsoDate)).toEqual([]);
  });

  it('builds the compact bulletin token', () => {
    expect(compactDate(day)).toBe('20240301');
  });
});
