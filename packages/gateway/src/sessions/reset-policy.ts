/**
 * Session freshness: idle timeout and daily reset boundary
 */

import cronParser from 'cron-parser';
import type { SessionRecord } from './types.js';

export interface ResetPolicy {
  /** Reset when the gap since the last update exceeds this many minutes */
  idleMinutes?: number;
  /** Local hour (0-23) at which sessions roll over */
  dailyResetHour?: number;
  /** IANA timezone for the daily boundary (default: process local) */
  timezone?: string;
}

export type Freshness = { fresh: true } | { fresh: false; reason: 'idle' | 'daily' };

/**
 * Cron expression for the daily reset sweep
 */
export function dailyResetCron(hour: number): string {
  return `0 ${hour} * * *`;
}

/**
 * Most recent daily boundary at or before `now`
 */
export function lastDailyBoundary(now: number, hour: number, timezone?: string): Date {
  const interval = cronParser.parseExpression(dailyResetCron(hour), {
    currentDate: new Date(now),
    tz: timezone,
  });
  return interval.prev().toDate();
}

export function nextDailyReset(now: number, hour: number, timezone?: string): Date {
  const interval = cronParser.parseExpression(dailyResetCron(hour), {
    currentDate: new Date(now),
    tz: timezone,
  });
  return interval.next().toDate();
}

export function evaluateFreshness(
  record: Pick<SessionRecord, 'updatedAt'>,
  now: number,
  policy: ResetPolicy
): Freshness {
  if (policy.idleMinutes !== undefined && policy.idleMinutes > 0) {
    if (now - record.updatedAt > policy.idleMinutes * 60_000) {
      return { fresh: false, reason: 'idle' };
    }
  }

  if (policy.dailyResetHour !== undefined) {
    const boundary = lastDailyBoundary(now, policy.dailyResetHour, policy.timezone).getTime();
    if (record.updatedAt < boundary && boundary <= now) {
      return { fresh: false, reason: 'daily' };
    }
  }

  return { fresh: true };
}
