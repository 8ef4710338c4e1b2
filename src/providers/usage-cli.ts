/**
 * ccusage provider
 *
 * Queries the ccusage CLI for token and message counts. Its output format
 * varies between releases (JSON or plain text), so figures are scraped
 * with patterns rather than parsed.
 *
 * Query order:
 *   1. `ccusage blocks --json`          — the active 5-hour block
 *   2. `ccusage session <id> --json`    — overrides with session figures
 *   3. `ccusage stats --json` / `stats` — daily and weekly totals
 */

import { ROLLING_WINDOW_MS } from '../metrics/index.js';
import { parseRfc3339 } from '../state/tracking.js';
import { FieldLookup, FieldLookupBuilder, extractTokenCount, runCommand } from './fields.js';
import type { CommandRunner, MetricsProvider } from './fields.js';

export const PATTERNS = {
  tokens: /"tokens"\s*:\s*(\d+)|"totalTokens"\s*:\s*(\d+)/,
  inputTokens: /"inputTokens"\s*:\s*(\d+)/,
  outputTokens: /"outputTokens"\s*:\s*(\d+)/,
  messages: /"messages"\s*:\s*(\d+)|"messageCount"\s*:\s*(\d+)/,
  statsTotal: /"totalTokens"\s*:\s*(\d+)|total.*tokens.*:\s*(\d+)/,
  statsWeekly: /"weeklyTokens"\s*:\s*(\d+)|weekly.*tokens.*:\s*(\d+)/,
  statsSession: /"sessionTokens"\s*:\s*(\d+)|session.*tokens.*:\s*(\d+)/,
  statsInput: /"inputTokens"\s*:\s*(\d+)|input.*tokens.*:\s*(\d+)/,
  statsOutput: /"outputTokens"\s*:\s*(\d+)|output.*tokens.*:\s*(\d+)/,
  statsMessages: /"messages"\s*:\s*(\d+)|message.*count.*:\s*(\d+)/,
  startTime: /"start_time"\s*:\s*"([^"]+)"/,
} as const;

export interface UsageCliOptions {
  /** Session to query with `ccusage session` */
  sessionId?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
  /** Clock used to decide whether the block start is still active */
  now?: () => Date;
  binary?: string;
}

/**
 * Start time of the active block, kept only while it is inside the
 * rolling window.
 */
export function extractBlockStart(output: string, now: Date): string | undefined {
  const match = PATTERNS.startTime.exec(output);
  if (!match) return undefined;

  const start = parseRfc3339(match[1]);
  if (!start) return undefined;

  const age = now.getTime() - start.getTime();
  return age < ROLLING_WINDOW_MS ? match[1] : undefined;
}

export class UsageCliProvider implements MetricsProvider {
  readonly name = 'ccusage';

  private readonly runner: CommandRunner;
  private readonly binary: string;

  constructor(private readonly options: UsageCliOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.binary = options.binary ?? 'ccusage';
  }

  private run(args: string[]): string | null {
    return this.runner(this.binary, args, { timeoutMs: this.options.timeoutMs });
  }

  collect(): FieldLookup {
    const fields = new FieldLookupBuilder();
    const now = (this.options.now ?? (() => new Date()))();

    const blocks = this.run(['blocks', '--json']);
    if (blocks === null) {
      // Not installed (or broken): skip the remaining queries
      return FieldLookup.empty();
    }

    fields
      .set('sessionTokens', extractTokenCount(blocks, PATTERNS.tokens))
      .set('inputTokens', extractTokenCount(blocks, PATTERNS.inputTokens))
      .set('outputTokens', extractTokenCount(blocks, PATTERNS.outputTokens))
      .set('messages', extractTokenCount(blocks, PATTERNS.messages))
      .setText('windowStart', extractBlockStart(blocks, now));

    const sessionId = this.options.sessionId;
    if (sessionId) {
      fields.setText('sessionId', sessionId);
      const session = this.run(['session', sessionId, '--json']);
      if (session !== null) {
        // set() ignores zeros, so only figures the session reports override
        fields
          .set('sessionTokens', extractTokenCount(session, PATTERNS.tokens))
          .set('inputTokens', extractTokenCount(session, PATTERNS.inputTokens))
          .set('outputTokens', extractTokenCount(session, PATTERNS.outputTokens))
          .set('messages', extractTokenCount(session, PATTERNS.messages));
      }
    }

    const stats = this.run(['stats', '--json']) ?? this.run(['stats']);
    if (stats === null) {
      return fields.build();
    }

    fields
      .set('dailyTokens', extractTokenCount(stats, PATTERNS.statsTotal))
      .set('weeklyTokens', extractTokenCount(stats, PATTERNS.statsWeekly))
      .fill('sessionTokens', extractTokenCount(stats, PATTERNS.statsSession))
      .fill('inputTokens', extractTokenCount(stats, PATTERNS.statsInput))
      .fill('outputTokens', extractTokenCount(stats, PATTERNS.statsOutput))
      .fill('messages', extractTokenCount(stats, PATTERNS.statsMessages));

    return fields.build();
  }
}
