/**
 * Unit tests for session freshness rules
 */

import { describe, it, expect } from 'vitest';
import {
  dailyResetCron,
  evaluateFreshness,
  lastDailyBoundary,
  nextDailyReset,
} from '../../src/sessions/reset-policy.js';

const MINUTE = 60_000;

describe('dailyResetCron()', () => {
  it('should fire at the top of the hour', () => {
    expect(dailyResetCron(4)).toBe('0 4 * * *');
  });
});

describe('daily boundaries', () => {
  it('should find the last boundary on the same day', () => {
    const now = Date.UTC(2026, 0, 10, 12, 0);
    expect(lastDailyBoundary(now, 4, 'UTC').toISOString()).toBe('2026-01-10T04:00:00.000Z');
    expect(nextDailyReset(now, 4, 'UTC').toISOString()).toBe('2026-01-11T04:00:00.000Z');
  });

  it('should use the previous day before the reset hour', () => {
    const now = Date.UTC(2026, 0, 10, 2, 30);
    expect(lastDailyBoundary(now, 4, 'UTC').toISOString()).toBe('2026-01-09T04:00:00.000Z');
  });
});

describe('evaluateFreshness()', () => {
  const updatedAt = Date.UTC(2026, 0, 10, 10, 0);

  it('should reset after the idle timeout', () => {
    expect(evaluateFreshness({ updatedAt }, updatedAt + 121 * MINUTE, { idleMinutes: 120 })).toEqual({
      fresh: false,
      reason: 'idle',
    });
  });

  it('should reuse a session inside the idle window', () => {
    expect(evaluateFreshness({ updatedAt }, updatedAt + 60 * MINUTE, { idleMinutes: 120 })).toEqual({
      fresh: true,
    });
  });

  it('should reset once the daily boundary has passed', () => {
    const before = Date.UTC(2026, 0, 10, 3, 30);
    const after = Date.UTC(2026, 0, 10, 4, 30);
    expect(
      evaluateFreshness({ updatedAt: before }, after, { dailyResetHour: 4, timezone: 'UTC' })
    ).toEqual({ fresh: false, reason: 'daily' });
  });

  it('should keep sessions updated after the boundary', () => {
    const lastUpdate = Date.UTC(2026, 0, 10, 4, 10);
    const now = Date.UTC(2026, 0, 10, 23, 0);
    expect(
      evaluateFreshness({ updatedAt: lastUpdate }, now, { dailyResetHour: 4, timezone: 'UTC' })
    ).toEqual({ fresh: true });
  });

  it('should report idle before daily when both apply', () => {
    const lastUpdate = Date.UTC(2026, 0, 9, 20, 0);
    const now = Date.UTC(2026, 0, 10, 9, 0);
    expect(
      evaluateFreshness({ updatedAt: lastUpdate }, now, {
        idleMinutes: 60,
        dailyResetHour: 4,
        timezone: 'UTC',
      })
    ).toEqual({ fresh: false, reason: 'idle' });
  });

  it('should treat no policy as always fresh', () => {
    expect(evaluateFreshness({ updatedAt: 0 }, Date.UTC(2026, 0, 1), {})).toEqual({ fresh: true });
  });
});
