/**
 * Shared types for ccstatus
 *
 * Every stage of the pipeline (input → snapshot → widgets → rendered line)
 * speaks in these types, so each module can be tested on its own.
 */

import type { z } from 'zod';
import type { statuslineInputSchema } from './input.js';

// ---------------------------------------------------------------------------
// Input Contract
// ---------------------------------------------------------------------------

/**
 * JSON that Claude Code pipes to the statusline command via stdin.
 * Derived from the zod schema so the type and the validation never drift.
 */
export type StatuslineInput = z.infer<typeof statuslineInputSchema>;

/** Model identity as reported by Claude Code. */
export interface ModelInfo {
  id?: string;
  display_name?: string;
}

// ---------------------------------------------------------------------------
// Colors & Themes
// ---------------------------------------------------------------------------

/**
 * An ANSI escape sequence. Empty string means "no color" (used for
 * backgrounds of plain segments).
 */
export type Color = string;

/** Maps an integer percentage (0–100) to a color. */
export type ColorRule = (percent: number) => Color;

/** Fixed foreground/background pair. */
export interface Style {
  readonly fg: Color;
  readonly bg: Color;
}

/** Foreground/background pair computed from a percentage. */
export interface RuleStyle {
  readonly fg: ColorRule;
  readonly bg: ColorRule;
}

/** Widget categories whose colors never depend on a metric. */
export type StaticCategory =
  | 'identity'
  | 'path'
  | 'git'
  | 'model'
  | 'tokens'
  | 'time'
  | 'cost'
  | 'messages'
  | 'efficiency'
  | 'latency';

/** Widget categories colored by a threshold rule. */
export type RuleCategory = 'usage' | 'compaction' | 'weekly';

export type ThemeName = 'powerline' | 'minimal' | 'gruvbox';

/**
 * Immutable bundle of style rules applied to every widget in one render.
 */
export interface Theme {
  readonly name: string;
  readonly styles: Readonly<Record<StaticCategory, Style>>;
  readonly rules: Readonly<Record<RuleCategory, RuleStyle>>;
  /** Color of the thin arrow or pipe divider between plain segments */
  readonly separator: Color;
  /** true → background-aware arrow separators, false → plain pipe divider */
  readonly powerline: boolean;
}

// ---------------------------------------------------------------------------
// Widgets
// ---------------------------------------------------------------------------

export type WidgetName =
  | 'identity'
  | 'path'
  | 'git'
  | 'model'
  | 'usage'
  | 'weekly'
  | 'daily'
  | 'tokens'
  | 'cost'
  | 'messages'
  | 'efficiency'
  | 'compaction'
  | 'latency'
  | 'timer'
  | 'reset';

/** One styled segment of the status line. */
export interface Widget {
  readonly name: WidgetName;
  /** Fully formatted text, icon included */
  readonly text: string;
  readonly fg: Color;
  /** '' → plain segment without background */
  readonly bg: Color;
}

/** A formatted duration plus the window it counts down. */
export interface ResetInfo {
  text: string;
  label: '5hr' | 'daily' | 'weekly';
}

/** Branch (or short detached hash) and count of changed paths. */
export interface GitInfo {
  branch: string;
  changes: number;
}

/** Request latency samples from the tracking directory. */
export interface LatencyData {
  averageMs: number;
  lastRequestMs: number;
  requestCount: number;
}

/**
 * Everything widget assembly needs, already resolved from input, providers
 * and tracking files. Assembly is a pure function of this plus a theme.
 */
export interface StatusSnapshot {
  /** user@host */
  identity: string;
  /** Home-relative workspace path, not yet truncated */
  workspacePath: string;
  pathMaxLength: number;
  /** null when the workspace is not inside a git repository */
  git: GitInfo | null;
  model: ModelInfo;
  dailyTokens: number;
  weeklyTokens: number;
  sessionInputTokens: number;
  sessionOutputTokens: number;
  messages: number;
  contextTokens: number;
  contextCharacters: number;
  /** Elapsed time in the current block, '' to hide */
  blockElapsed: string;
  rollingReset: ResetInfo;
  weeklyReset: ResetInfo;
  /** Present only when the latency widget is enabled and samples exist */
  latency?: LatencyData;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * ccstatus configuration.
 *
 * Every property is optional. Defaults live in config/loader.ts and the
 * merged result is built from: defaults → user config → project config → env vars.
 */
export interface StatuslineConfig {
  /** Theme name; unknown names fall back to powerline */
  theme?: string;
  /** Directory holding latency.txt, session_start, current_session, calculate-usage.sh */
  trackingDir?: string;
  /** Max byte length of the path widget (default: 30) */
  pathMaxLength?: number;
  /** Timeout for each external command in milliseconds (default: 2000) */
  commandTimeoutMs?: number;
  /** Toggles for external data sources */
  providers?: {
    /** Query the ccusage CLI (default: true) */
    usageCli?: boolean;
    /** Run calculate-usage.sh from the tracking dir (default: true) */
    usageScript?: boolean;
    /** Inspect the workspace git repository (default: true) */
    git?: boolean;
  };
  /** Optional widgets */
  display?: {
    /** Show average request latency (default: false) */
    latency?: boolean;
  };
  /** Trace provider failures to stderr (default: false) */
  debug?: boolean;
}

// ---------------------------------------------------------------------------
// Tracking File Types
// ---------------------------------------------------------------------------

/** Result of reading a tracking file. */
export interface TrackingReadResult<T> {
  /** Whether the file existed and parsed */
  exists: boolean;
  /** Parsed data (undefined if not found) */
  data?: T;
  /** Path that was read */
  foundAt?: string;
}
