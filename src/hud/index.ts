/**
 * HUD Entry Point
 *
 * The render pipeline for the status line:
 *   snapshot (collectSnapshot) → widgets (buildWidgets) → line (renderWidgets)
 */

export { RESET, FG, BG, PALETTE_NAMES, trueColor, trueColorBg, bgToFg, NEUTRAL_FG } from './colors.js';
export type { PaletteName } from './colors.js';
export { renderWidgets, renderSegment, renderSeparator, SYMBOLS } from './render.js';
export { buildWidgets, usageWidget, limitWidget, costWidget, ICONS } from './widgets.js';
export {
  collectSnapshot,
  resolveTokens,
  resolveWeeklyTokens,
  resolveMessages,
  formatWorkspacePath,
  getUsername,
  getHostname,
} from './snapshot.js';
export type { SnapshotDeps } from './snapshot.js';
