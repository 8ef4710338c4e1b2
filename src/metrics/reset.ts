/**
 * Reset Timers
 *
 * Usage limits run on two clocks: a 5-hour rolling window that opens with
 * the first prompt, and a weekly window that rolls over on Monday 00:00 UTC.
 * All functions take `now` explicitly so callers (and tests) own the clock.
 */

import type { ResetInfo } from '../shared/types.js';

export const ROLLING_WINDOW_MS = 5 * 60 * 60 * 1000;

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/** `"{h}h {m}m"`, or `"{m}m"` under an hour. */
export function formatHoursMinutes(durationMs: number): string {
  const ms = Math.max(0, durationMs);
  const hours = Math.floor(ms / HOUR_MS);
  const minutes = Math.floor(ms / MINUTE_MS) % 60;
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

/** `"{d}d {h}h"`, `"{h}h {m}m"` or `"{m}m"` depending on magnitude. */
export function formatDaysHours(durationMs: number): string {
  const ms = Math.max(0, durationMs);
  const days = Math.floor(ms / DAY_MS);
  const hours = Math.floor(ms / HOUR_MS) % 24;
  const minutes = Math.floor(ms / MINUTE_MS) % 60;

  if (days > 0) return `${days}d ${hours}h`;
  if (hours > 0) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}

/**
 * Time left in the rolling 5-hour window.
 *
 * With no known window start this counts down to the next local midnight
 * and labels itself "daily". A window that has already elapsed reads "0m":
 * the next message opens a fresh one.
 */
export function calculateTimeToReset(now: Date, windowStart?: Date): ResetInfo {
  if (windowStart) {
    const elapsed = now.getTime() - windowStart.getTime();
    if (elapsed < ROLLING_WINDOW_MS) {
      return { text: formatHoursMinutes(ROLLING_WINDOW_MS - elapsed), label: '5hr' };
    }
    return { text: '0m', label: '5hr' };
  }

  const midnight = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
  return { text: formatHoursMinutes(midnight.getTime() - now.getTime()), label: 'daily' };
}

/**
 * Time until the next Monday 00:00 UTC. On a Monday the boundary is a full
 * week out, never zero.
 */
export function calculateTimeToWeeklyReset(now: Date): ResetInfo {
  let daysUntilMonday = (8 - now.getUTCDay()) % 7;
  if (daysUntilMonday === 0) daysUntilMonday = 7;

  const boundary = Date.UTC(
    now.getUTCFullYear(),
    now.getUTCMonth(),
    now.getUTCDate() + daysUntilMonday
  );
  return { text: formatDaysHours(boundary - now.getTime()), label: 'weekly' };
}

/**
 * Elapsed time in the current usage block.
 *
 * An active rolling window is measured from its start. Without one, blocks
 * are the fixed 5-hour slots of the local day (00:00, 05:00, 10:00, ...).
 */
export function getBlockTimerDisplay(now: Date, windowStart?: Date): string {
  if (windowStart) {
    const elapsed = now.getTime() - windowStart.getTime();
    if (elapsed >= 0 && elapsed < ROLLING_WINDOW_MS) {
      return formatHoursMinutes(elapsed);
    }
  }

  const blockHour = Math.floor(now.getHours() / 5) * 5;
  const blockStart = new Date(now.getFullYear(), now.getMonth(), now.getDate(), blockHour);
  return formatHoursMinutes(now.getTime() - blockStart.getTime());
}

/** The 5-hour label wins unless its window has run out. */
export function selectReset(rolling: ResetInfo, weekly: ResetInfo): ResetInfo {
  if (rolling.label === '5hr' && rolling.text !== '0m') return rolling;
  return weekly;
}
