// Rollcall Clock - time-of-day arithmetic in an explicit IANA time zone

import { Cron } from 'croner';

const DAY_MS = 24 * 60 * 60 * 1000;

function dailyPattern(hour: number, minute: number, timeZone: string): Cron {
  if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
    throw new RangeError(`Invalid hour: ${hour}`);
  }
  if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
    throw new RangeError(`Invalid minute: ${minute}`);
  }
  // No callback: croner only evaluates the pattern, nothing is scheduled.
  return new Cron(`0 ${minute} ${hour} * * *`, { timezone: timeZone });
}

/**
 * Instant of the next `hour:minute` strictly after `now` in `timeZone`.
 */
export function nextOccurrence(
  hour: number,
  minute: number,
  timeZone: string,
  now: Date = new Date(),
): Date {
  const next = dailyPattern(hour, minute, timeZone).nextRun(now);
  if (!next) {
    throw new Error(`No upcoming ${hour}:${minute} in ${timeZone}`);
  }
  return next;
}

/**
 * Milliseconds from `now` until the next `hour:minute` in `timeZone`.
 * Always positive: at exactly the target instant it returns a full day.
 */
export function durationUntil(
  hour: number,
  minute: number,
  timeZone: string,
  now: Date = new Date(),
): number {
  return nextOccurrence(hour, minute, timeZone, now).getTime() - now.getTime();
}

/**
 * Latest instant at or before `now` whose local time in `timeZone` is
 * `hour:minute`.
 */
export function mostRecentOccurrence(
  hour: number,
  minute: number,
  timeZone: string,
  now: Date = new Date(),
): Date {
  const pattern = dailyPattern(hour, minute, timeZone);
  // Two days back always contains at least one occurrence, DST included.
  let cursor = new Date(now.getTime() - 2 * DAY_MS);
  let latest: Date | null = null;

  for (;;) {
    const next = pattern.nextRun(cursor);
    if (!next || next.getTime() > now.getTime()) break;
    latest = next;
    cursor = next;
  }

  if (!latest) {
    throw new Error(`No past ${hour}:${minute} in ${timeZone}`);
  }
  return latest;
}

/**
 * Seconds since local midnight for an `HH:MM:SS[.fraction]` string, or
 * null when it does not match. The fraction is dropped.
 */
export function parseTimeOfDay(value: string): number | null {
  const match = /^(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?$/.exec(value.trim());
  if (!match) return null;

  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;

  return hours * 3600 + minutes * 60 + seconds;
}

/** `YYYY-MM-DD` of `now` in `timeZone`. */
export function localDate(now: Date, timeZone: string): string {
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
}

/** Report title date, e.g. `October 09, 2026`. */
export function formatReportDate(now: Date, timeZone: string): string {
  return new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'long',
    day: '2-digit',
  }).format(now);
}
