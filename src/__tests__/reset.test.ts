import { describe, it, expect } from 'vitest';
import {
  formatHoursMinutes,
  formatDaysHours,
  calculateTimeToReset,
  calculateTimeToWeeklyReset,
  getBlockTimerDisplay,
  selectReset,
} from '../metrics/reset.js';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

// 2026-01-07 is a Wednesday
const NOON_UTC = new Date('2026-01-07T12:00:00Z');

describe('formatHoursMinutes', () => {
  it('should omit hours under an hour', () => {
    expect(formatHoursMinutes(42 * MINUTE)).toBe('42m');
  });

  it('should show hours and minutes', () => {
    expect(formatHoursMinutes(2 * HOUR + 5 * MINUTE)).toBe('2h 5m');
  });

  it('should clamp negative durations', () => {
    expect(formatHoursMinutes(-HOUR)).toBe('0m');
  });
});

describe('formatDaysHours', () => {
  it('should show days and hours beyond a day', () => {
    expect(formatDaysHours(50 * HOUR + 30 * MINUTE)).toBe('2d 2h');
  });

  it('should show hours and minutes under a day', () => {
    expect(formatDaysHours(3 * HOUR + 15 * MINUTE)).toBe('3h 15m');
  });

  it('should show minutes under an hour', () => {
    expect(formatDaysHours(9 * MINUTE)).toBe('9m');
  });
});

// ---------------------------------------------------------------------------
// Rolling window
// ---------------------------------------------------------------------------

describe('calculateTimeToReset', () => {
  it('should count down the rest of the 5-hour window', () => {
    const start = new Date('2026-01-07T09:30:00Z');
    expect(calculateTimeToReset(NOON_UTC, start)).toEqual({ text: '2h 30m', label: '5hr' });
  });

  it('should omit hours near the end of the window', () => {
    const start = new Date(NOON_UTC.getTime() - (4 * HOUR + 50 * MINUTE));
    expect(calculateTimeToReset(NOON_UTC, start)).toEqual({ text: '10m', label: '5hr' });
  });

  it('should read 0m once the window has elapsed', () => {
    const start = new Date(NOON_UTC.getTime() - 6 * HOUR);
    expect(calculateTimeToReset(NOON_UTC, start)).toEqual({ text: '0m', label: '5hr' });
  });

  it('should treat exactly five hours as elapsed', () => {
    const start = new Date(NOON_UTC.getTime() - 5 * HOUR);
    expect(calculateTimeToReset(NOON_UTC, start).text).toBe('0m');
  });

  it('should count down to local midnight without a window start', () => {
    const now = new Date(2026, 0, 7, 22, 30, 0);
    expect(calculateTimeToReset(now)).toEqual({ text: '1h 30m', label: 'daily' });
  });

  it('should omit hours in the last hour of the day', () => {
    const now = new Date(2026, 0, 7, 23, 45, 0);
    expect(calculateTimeToReset(now)).toEqual({ text: '15m', label: 'daily' });
  });
});

// ---------------------------------------------------------------------------
// Weekly window
// ---------------------------------------------------------------------------

describe('calculateTimeToWeeklyReset', () => {
  it('should count down to the next Monday 00:00 UTC', () => {
    // Wednesday noon → Monday 2026-01-12 00:00
    expect(calculateTimeToWeeklyReset(NOON_UTC)).toEqual({ text: '4d 12h', label: 'weekly' });
  });

  it('should be a full week out on Monday midnight', () => {
    const monday = new Date('2026-01-05T00:00:00Z');
    expect(calculateTimeToWeeklyReset(monday).text).toBe('7d 0h');
  });

  it('should show hours and minutes late on Sunday', () => {
    const sunday = new Date('2026-01-11T21:15:00Z');
    expect(calculateTimeToWeeklyReset(sunday).text).toBe('2h 45m');
  });

  it('should show minutes right before the boundary', () => {
    const sunday = new Date('2026-01-11T23:30:00Z');
    expect(calculateTimeToWeeklyReset(sunday).text).toBe('30m');
  });
});

// ---------------------------------------------------------------------------
// Block timer
// ---------------------------------------------------------------------------

describe('getBlockTimerDisplay', () => {
  it('should measure from an active window start', () => {
    const start = new Date('2026-01-07T10:45:00Z');
    expect(getBlockTimerDisplay(NOON_UTC, start)).toBe('1h 15m');
  });

  it('should use the 5-hour slots of the local day without a window', () => {
    expect(getBlockTimerDisplay(new Date(2026, 0, 7, 12, 20))).toBe('2h 20m');
    expect(getBlockTimerDisplay(new Date(2026, 0, 7, 5, 7))).toBe('7m');
  });

  it('should ignore an expired window start', () => {
    const now = new Date(2026, 0, 7, 12, 20);
    const stale = new Date(now.getTime() - 8 * HOUR);
    expect(getBlockTimerDisplay(now, stale)).toBe('2h 20m');
  });
});

describe('selectReset', () => {
  const weekly = { text: '3d 4h', label: 'weekly' as const };

  it('should prefer an active 5-hour window', () => {
    const rolling = { text: '2h 0m', label: '5hr' as const };
    expect(selectReset(rolling, weekly)).toBe(rolling);
  });

  it('should fall back to weekly when the window reads 0m', () => {
    expect(selectReset({ text: '0m', label: '5hr' }, weekly)).toBe(weekly);
  });

  it('should fall back to weekly without a known window', () => {
    expect(selectReset({ text: '5h 0m', label: 'daily' }, weekly)).toBe(weekly);
  });
});
