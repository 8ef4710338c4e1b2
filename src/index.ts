/**
 * ccstatus — Powerline status line for Claude Code
 *
 * Library surface: the render pipeline, its stages, themes and calculators.
 * The `ccstatus` binary lives in cli.ts.
 */

// Pipeline
export { renderStatusline, runStatusline, runCli, formatFailure } from './statusline.js';
export type { RenderOptions, CliResult } from './statusline.js';

// Config
export {
  loadConfig,
  loadJsoncFile,
  loadEnvConfig,
  getConfigPaths,
  deepMerge,
  DEFAULT_CONFIG,
} from './config/index.js';

// HUD
export {
  buildWidgets,
  renderWidgets,
  renderSegment,
  renderSeparator,
  collectSnapshot,
  bgToFg,
  trueColor,
  trueColorBg,
  FG,
  BG,
  RESET,
} from './hud/index.js';

// Themes
export { getTheme, listThemes, THEMES, DEFAULT_THEME } from './themes/index.js';

// Metrics
export {
  calculateUsagePercentage,
  calculateWeeklyUsagePercentage,
  calculateDailyUsagePercentage,
  calculateCompactionPercentage,
  calculateContextEfficiency,
  formatTokensAdvanced,
  calculateCost,
  formatCost,
  truncatePath,
  normalizeModelName,
  calculateTimeToReset,
  calculateTimeToWeeklyReset,
} from './metrics/index.js';

// Providers
export { UsageCliProvider, UsageScriptProvider, FieldLookup, getGitInfo } from './providers/index.js';

// Errors & input
export { StatuslineError, InputError } from './shared/errors.js';
export { parseStatuslineInput, statuslineInputSchema } from './shared/input.js';

// Types
export type {
  StatuslineInput,
  StatuslineConfig,
  StatusSnapshot,
  Theme,
  ThemeName,
  Widget,
  WidgetName,
  Color,
  ColorRule,
  ResetInfo,
  GitInfo,
  LatencyData,
} from './shared/types.js';
export type { MetricsProvider, CommandRunner } from './providers/index.js';
