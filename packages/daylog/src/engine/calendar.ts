/**
 * Calendar helpers: ISO date parsing, inclusive day ranges, and the
 * domestic-era encoding the journal form expects (year − 1911, `yyymmdd`).
 */

import { InvalidDateError } from './errors';

export const ERA_OFFSET = 1911;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 86_400_000;

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export function parseIsoDate(value: string): CalendarDate {
  const match = ISO_DATE.exec(value);
  if (!match) throw new InvalidDateError(value, 'expected YYYY-MM-DD');

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // Date.UTC rolls 2024-02-30 over into March; a mismatch means an impossible date.
  const utc = new Date(Date.UTC(year, month - 1, day));
  if (
    utc.getUTCFullYear() !== year ||
    utc.getUTCMonth() !== month - 1 ||
    utc.getUTCDate() !== day
  ) {
    throw new InvalidDateError(value, 'no such calendar day');
  }

  return { year, month, day };
}

export function formatIsoDate(date: CalendarDate): string {
  const y = String(date.year).padStart(4, '0');
  const m = String(date.month).padStart(2, '0');
  const d = String(date.day).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

/**
 * Encode a Gregorian date as the seven-digit domestic-era string,
 * e.g. 2024-03-05 → "1130305". Only years after 1911 are representable.
 */
export function toDomesticEra(date: string | CalendarDate): string {
  const parsed = typeof date === 'string' ? parseIsoDate(date) : date;
  const label = typeof date === 'string' ? date : formatIsoDate(date);

  const eraYear = parsed.year - ERA_OFFSET;
  if (eraYear < 1) {
    throw new InvalidDateError(label, `year must be after ${ERA_OFFSET}`);
  }
  if (eraYear > 999) {
    throw new InvalidDateError(label, 'era year does not fit in three digits');
  }

  return (
    String(eraYear).padStart(3, '0') +
    String(parsed.month).padStart(2, '0') +
    String(parsed.day).padStart(2, '0')
  );
}

/** Every ISO date from `start` through `end` inclusive; empty when start > end. */
export function generateDates(start: string, end: string): string[] {
  const from = parseIsoDate(start);
  const to = parseIsoDate(end);

  const endMs = Date.UTC(to.year, to.month - 1, to.day);
  const dates: string[] = [];

  for (let ms = Date.UTC(from.year, from.month - 1, from.day); ms <= endMs; ms += DAY_MS) {
    const d = new Date(ms);
    dates.push(formatIsoDate({ year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate() }));
  }

  return dates;
}
