/**
 * Snapshot Collection
 *
 * The only impure stage of a render: reads the usage providers, tracking
 * files and git, and resolves every figure widget assembly needs. Each
 * lookup is attempted once; whatever fails just leaves a zero behind.
 */

import { homedir, hostname, userInfo } from 'os';
import {
  calculateTimeToReset,
  calculateTimeToWeeklyReset,
  getBlockTimerDisplay,
} from '../metrics/index.js';
import {
  FieldLookup,
  UsageCliProvider,
  UsageScriptProvider,
  getGitInfo,
  runCommand,
} from '../providers/index.js';
import type { CommandRunner, MetricsProvider } from '../providers/index.js';
import {
  getContextCharacters,
  getContextTokens,
  getInputTokens,
  getOutputTokens,
  getTotalTokens,
  getWorkspacePath,
} from '../shared/input.js';
import { debug } from '../shared/debug.js';
import { parseRfc3339, readLatency, readSessionId, readSessionStart } from '../state/index.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import type { StatusSnapshot, StatuslineConfig, StatuslineInput } from '../shared/types.js';

// ---------------------------------------------------------------------------
// Identity & path
// ---------------------------------------------------------------------------

export function getUsername(): string {
  try {
    return userInfo().username || 'user';
  } catch {
    return 'user';
  }
}

/** Short host name (up to the first dot). */
export function getHostname(): string {
  try {
    const name = hostname();
    const dot = name.indexOf('.');
    if (dot > 0) return name.slice(0, dot);
    return name || 'localhost';
  } catch {
    return 'localhost';
  }
}

/** Replace the home directory prefix with `~`. */
export function formatWorkspacePath(path: string, home: string = homedir()): string {
  if (home && path.startsWith(home)) {
    return '~' + path.slice(home.length);
  }
  return path;
}

function expandHome(path: string, home: string): string {
  if (path === '~' || path.startsWith('~/')) return home + path.slice(1);
  return path;
}

// ---------------------------------------------------------------------------
// Token sources
// ---------------------------------------------------------------------------

interface TokenTotals {
  dailyTokens: number;
  sessionInputTokens: number;
  sessionOutputTokens: number;
}

/**
 * Pick the first source that knows the daily total:
 * usage script → ccusage → input totalTokens → input + output.
 * Session input/output come from the same source.
 */
export function resolveTokens(
  input: StatuslineInput,
  script: FieldLookup,
  cli: FieldLookup
): TokenTotals {
  for (const source of [script, cli]) {
    if (source.has('dailyTokens')) {
      return {
        dailyTokens: source.int('dailyTokens'),
        sessionInputTokens: source.int('inputTokens'),
        sessionOutputTokens: source.int('outputTokens'),
      };
    }
  }

  const inputTokens = getInputTokens(input);
  const outputTokens = getOutputTokens(input);
  const total = getTotalTokens(input);

  return {
    dailyTokens: total > 0 ? total : inputTokens + outputTokens,
    sessionInputTokens: inputTokens,
    sessionOutputTokens: outputTokens,
  };
}

/** Script weekly → ccusage weekly → ccusage daily. */
export function resolveWeeklyTokens(script: FieldLookup, cli: FieldLookup): number {
  if (script.has('weeklyTokens')) return script.int('weeklyTokens');
  if (cli.has('weeklyTokens')) return cli.int('weeklyTokens');
  return cli.int('dailyTokens');
}

export function resolveMessages(script: FieldLookup, cli: FieldLookup): number {
  if (script.has('messages')) return script.int('messages');
  return cli.int('messages');
}

// ---------------------------------------------------------------------------
// Collection
// ---------------------------------------------------------------------------

export interface SnapshotDeps {
  /** Clock for every timer in this render (default: now) */
  now?: Date;
  /** Runs every external command (default: execFileSync) */
  runner?: CommandRunner;
  /** Replaces the ccusage provider */
  usageCli?: MetricsProvider;
  /** Replaces the calculate-usage.sh provider */
  usageScript?: MetricsProvider;
  /** user@host label (default: from the OS) */
  identity?: string;
  homeDir?: string;
}

function collectFrom(provider: MetricsProvider): FieldLookup {
  const fields = provider.collect();
  debug(`provider ${provider.name} collected`, fields);
  return fields;
}

export function collectSnapshot(
  input: StatuslineInput,
  config: StatuslineConfig = DEFAULT_CONFIG,
  deps: SnapshotDeps = {}
): StatusSnapshot {
  const now = deps.now ?? new Date();
  const runner = deps.runner ?? runCommand;
  const home = deps.homeDir ?? homedir();
  const timeoutMs = config.commandTimeoutMs ?? DEFAULT_CONFIG.commandTimeoutMs;
  const providers = { ...DEFAULT_CONFIG.providers, ...config.providers };
  const trackingDir = config.trackingDir;

  const script =
    providers.usageScript !== false
      ? collectFrom(deps.usageScript ?? new UsageScriptProvider({ trackingDir, timeoutMs, runner }))
      : FieldLookup.empty();

  const cli =
    providers.usageCli !== false
      ? collectFrom(
          deps.usageCli ??
            new UsageCliProvider({
              sessionId: readSessionId(trackingDir),
              timeoutMs,
              runner,
              now: () => now,
            })
        )
      : FieldLookup.empty();

  const tokens = resolveTokens(input, script, cli);

  const blockStart = cli.text('windowStart');
  const windowStart =
    (blockStart ? parseRfc3339(blockStart) : undefined) ?? readSessionStart(trackingDir);

  const rawPath = getWorkspacePath(input);
  const git = providers.git !== false ? getGitInfo(expandHome(rawPath, home), runner, timeoutMs) : null;

  const latency = config.display?.latency ? readLatency(trackingDir) : undefined;

  return {
    identity: deps.identity ?? `${getUsername()}@${getHostname()}`,
    workspacePath: formatWorkspacePath(rawPath, home),
    pathMaxLength: config.pathMaxLength ?? 30,
    git,
    model: {
      id: input.model?.id ?? undefined,
      display_name: input.model?.display_name ?? undefined,
    },
    ...tokens,
    weeklyTokens: resolveWeeklyTokens(script, cli),
    messages: resolveMessages(script, cli),
    contextTokens: getContextTokens(input),
    contextCharacters: getContextCharacters(input),
    blockElapsed: getBlockTimerDisplay(now, windowStart),
    rollingReset: calculateTimeToReset(now, windowStart),
    weeklyReset: calculateTimeToWeeklyReset(now),
    latency,
  };
}
