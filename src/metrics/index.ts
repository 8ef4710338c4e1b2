/**
 * Metrics Module
 *
 * Re-exports the calculators and reset timers:
 *   import { calculateUsagePercentage, calculateTimeToReset } from './metrics/index.js';
 */

export {
  CONTEXT_LIMIT,
  DAILY_LIMIT,
  WEEKLY_LIMIT,
  MESSAGE_LIMIT,
  COMPACTION_RATIO,
  getPricing,
  clampPercent,
  calculateUsagePercentage,
  calculateWeeklyUsagePercentage,
  calculateDailyUsagePercentage,
  calculateCompactionPercentage,
  calculateContextEfficiency,
  formatTokensAdvanced,
  calculateCost,
  formatCost,
  formatEfficiency,
  formatLatency,
  truncatePath,
  normalizeModelName,
} from './calculators.js';

export {
  ROLLING_WINDOW_MS,
  formatHoursMinutes,
  formatDaysHours,
  calculateTimeToReset,
  calculateTimeToWeeklyReset,
  getBlockTimerDisplay,
  selectReset,
} from './reset.js';
