/**
 * Metric Calculators
 *
 * Pure functions that turn raw counters into bounded, display-ready values.
 * Every calculator is total: missing, negative or non-finite input degrades
 * to zero, and percentages always land in [0, 100].
 */

import type { ModelInfo } from '../shared/types.js';

// ---------------------------------------------------------------------------
// Plan limits (Max 5x)
// ---------------------------------------------------------------------------

export const CONTEXT_LIMIT = 200_000;
export const DAILY_LIMIT = 430_000;
export const WEEKLY_LIMIT = 3_000_000;
/** Messages per 5-hour window */
export const MESSAGE_LIMIT = 225;
/** Compaction kicks in at this share of the context window */
export const COMPACTION_RATIO = 0.9;

// ---------------------------------------------------------------------------
// Model pricing (USD per million tokens)
// ---------------------------------------------------------------------------

interface ModelPricing {
  input: number;
  output: number;
}

const MODEL_PRICING: Record<'opus' | 'sonnet' | 'haiku', ModelPricing> = {
  opus: { input: 15, output: 75 },
  sonnet: { input: 3, output: 15 },
  haiku: { input: 0.25, output: 1.25 },
};

export function getPricing(modelName: string): ModelPricing {
  const lower = modelName.toLowerCase();
  if (lower.includes('sonnet')) return MODEL_PRICING.sonnet;
  if (lower.includes('haiku')) return MODEL_PRICING.haiku;
  if (lower.includes('opus')) return MODEL_PRICING.opus;
  return MODEL_PRICING.sonnet; // default
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/** Round to an integer percentage and clamp to [0, 100]. */
export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) return value > 0 ? 100 : 0;
  return Math.min(100, Math.max(0, Math.round(value)));
}

function ratioPercent(value: number, limit: number): number {
  return clampPercent((nonNegative(value) / limit) * 100);
}

// ---------------------------------------------------------------------------
// Percentages
// ---------------------------------------------------------------------------

/**
 * Overall usage: the larger of context-window usage and daily usage.
 * When no context token count is known it is estimated from characters
 * at four characters per token.
 */
export function calculateUsagePercentage(
  dailyTokens: number,
  contextTokens: number,
  contextChars: number
): number {
  const tokens = nonNegative(contextTokens);
  const estimated = tokens > 0 ? tokens : Math.floor(nonNegative(contextChars) / 4);

  const contextPct = ratioPercent(estimated, CONTEXT_LIMIT);
  const dailyPct = ratioPercent(dailyTokens, DAILY_LIMIT);

  return Math.max(contextPct, dailyPct);
}

export function calculateWeeklyUsagePercentage(weeklyTokens: number): number {
  return ratioPercent(weeklyTokens, WEEKLY_LIMIT);
}

export function calculateDailyUsagePercentage(dailyTokens: number): number {
  return ratioPercent(dailyTokens, DAILY_LIMIT);
}

/**
 * How close the context is to compaction.
 *
 * Below the threshold (90% of the window) this is progress toward the
 * threshold. At or past it the scale restarts and tracks progress through
 * the remaining "danger zone" up to the full window.
 */
export function calculateCompactionPercentage(contextTokens: number): number {
  const tokens = nonNegative(contextTokens);
  if (tokens === 0) return 0;

  const threshold = Math.floor(CONTEXT_LIMIT * COMPACTION_RATIO);

  if (tokens < threshold) {
    return clampPercent((tokens / threshold) * 100);
  }

  const dangerZone = CONTEXT_LIMIT - threshold;
  const remaining = CONTEXT_LIMIT - tokens;
  return clampPercent(((dangerZone - remaining) / dangerZone) * 100);
}

/** Context window utilization as a float percentage. */
export function calculateContextEfficiency(contextTokens: number): number {
  const efficiency = (nonNegative(contextTokens) / CONTEXT_LIMIT) * 100;
  return Math.min(efficiency, 100);
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatTokensAdvanced(tokens: number): string {
  const count = Math.trunc(nonNegative(tokens));
  if (count > 1_000_000) return `${(count / 1_000_000).toFixed(1)}M`;
  if (count > 1_000) return `${(count / 1_000).toFixed(1)}k`;
  return `${count}`;
}

/**
 * Session and daily cost for the given model. Both figures are the same:
 * there is no separate daily accumulation.
 */
export function calculateCost(
  modelName: string,
  inputTokens: number,
  outputTokens: number
): { sessionCost: number; dailyCost: number } {
  const pricing = getPricing(modelName);
  const sessionCost =
    (nonNegative(inputTokens) * pricing.input + nonNegative(outputTokens) * pricing.output) /
    1_000_000;
  return { sessionCost, dailyCost: sessionCost };
}

/** Sub-cent and sub-dollar costs are shown in cents. */
export function formatCost(cost: number): string {
  const value = nonNegative(cost);
  if (value < 0.01) return `${(value * 100).toFixed(3)}¢`;
  if (value < 1) return `${(value * 100).toFixed(2)}¢`;
  return `$${value.toFixed(2)}`;
}

export function formatEfficiency(efficiency: number): string {
  return `${nonNegative(efficiency).toFixed(1)}%`;
}

export function formatLatency(latencyMs: number): string {
  const ms = nonNegative(latencyMs);
  if (ms < 1000) return `${ms.toFixed(0)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Shorten a path to `maxLength` bytes, keeping the tail (the most specific
 * directories) behind an ellipsis.
 */
export function truncatePath(path: string, maxLength: number): string {
  const bytes = Buffer.from(path, 'utf-8');
  if (bytes.length <= maxLength) return path;

  // Cut points move off UTF-8 continuation bytes so no character is split
  if (maxLength > 5) {
    let start = bytes.length - (maxLength - 1);
    while (start < bytes.length && isContinuationByte(bytes[start])) start++;
    return '…' + bytes.subarray(start).toString('utf-8');
  }

  let end = Math.max(0, maxLength);
  while (end > 0 && isContinuationByte(bytes[end])) end--;
  return bytes.subarray(0, end).toString('utf-8');
}

function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

// ---------------------------------------------------------------------------
// Model name
// ---------------------------------------------------------------------------

/**
 * Collapse a model name to its family label. Uses the display name, falling
 * back to the model id; unknown names pass through lower-cased.
 */
export function normalizeModelName(model: ModelInfo): string {
  const name = model.display_name || model.id || '';
  const lower = name.toLowerCase();

  if (lower.includes('opus')) return 'opus';
  if (lower.includes('sonnet')) return 'sonnet';
  if (lower.includes('haiku')) return 'haiku';
  return lower;
}
