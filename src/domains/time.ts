/**
 * Calendar days in a configured time zone, expressed as UTC instants for
 * WHERE clauses.
 */

import type { TimeRange } from '../types/index.js';

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, formatter);
  }
  return formatter;
}

function wallClock(instant: Date, timeZone: string): WallClock {
  const parts = new Map(
    formatterFor(timeZone)
      .formatToParts(instant)
      .map(part => [part.type, Number(part.value)])
  );
  const read = (type: Intl.DateTimeFormatPartTypes) => parts.get(type) ?? 0;
  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
  };
}

/**
 * Milliseconds the zone is ahead of UTC at `instant`
 */
function zoneOffset(instant: Date, timeZone: string): number {
  const c = wallClock(instant, timeZone);
  const asUtc = Date.UTC(c.year, c.month - 1, c.day, c.hour, c.minute, c.second);
  return asUtc - Math.floor(instant.getTime() / 1000) * 1000;
}

/**
 * Local midnight `daysBack` days before the local date of `instant`.
 * A negative `daysBack` moves forward.
 */
export function startOfLocalDay(instant: Date, timeZone: string, daysBack = 0): Date {
  const today = wallClock(instant, timeZone);
  const midnightAsUtc = Date.UTC(today.year, today.month - 1, today.day - daysBack);

  let start = midnightAsUtc - zoneOffset(new Date(midnightAsUtc), timeZone);
  // The offset at midnight itself differs when a DST switch falls in between
  const corrected = midnightAsUtc - zoneOffset(new Date(start), timeZone);
  if (corrected !== start) start = corrected;
  return new Date(start);
}

/**
 * The local calendar day containing `instant`
 */
export function localDayRange(instant: Date, timeZone: string): TimeRange {
  return { since: startOfLocalDay(instant, timeZone), until: startOfLocalDay(instant, timeZone, -1) };
}

/**
 * From local midnight `days` days ago to the end of today
 */
export function recentDaysRange(instant: Date, timeZone: string, days: number): TimeRange {
  return { since: startOfLocalDay(instant, timeZone, days), until: startOfLocalDay(instant, timeZone, -1) };
}

export function localDate(instant: Date, timeZone: string): string {
  const c = wallClock(instant, timeZone);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${c.year}-${pad(c.month)}-${pad(c.day)}`;
}

