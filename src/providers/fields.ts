/**
 * Provider contract
 *
 * Every external metrics source (a usage CLI, a user script, a file) is a
 * MetricsProvider: one best-effort call that returns a FieldLookup. The
 * calculators never learn where a number came from, and a source that
 * fails simply has no fields.
 */

import { execFileSync } from 'child_process';
import { debug } from '../shared/debug.js';

export type UsageField =
  | 'sessionTokens'
  | 'dailyTokens'
  | 'weeklyTokens'
  | 'messages'
  | 'inputTokens'
  | 'outputTokens';

export type TextField = 'sessionId' | 'windowStart';

/** Read-only key → integer/string map. */
export class FieldLookup {
  constructor(
    private readonly numbers: ReadonlyMap<UsageField, number> = new Map(),
    private readonly texts: ReadonlyMap<TextField, string> = new Map()
  ) {}

  static empty(): FieldLookup {
    return new FieldLookup();
  }

  /** Integer field, 0 when absent. */
  int(field: UsageField): number {
    return this.numbers.get(field) ?? 0;
  }

  text(field: TextField): string | undefined {
    return this.texts.get(field);
  }

  has(field: UsageField): boolean {
    return this.int(field) > 0;
  }
}

/** Mutable builder; only positive integers are kept. */
export class FieldLookupBuilder {
  private readonly numbers = new Map<UsageField, number>();
  private readonly texts = new Map<TextField, string>();

  set(field: UsageField, value: number): this {
    if (Number.isInteger(value) && value > 0) this.numbers.set(field, value);
    return this;
  }

  /** Set only when the field has no value yet. */
  fill(field: UsageField, value: number): this {
    if (!this.numbers.has(field)) this.set(field, value);
    return this;
  }

  setText(field: TextField, value: string | undefined): this {
    if (value) this.texts.set(field, value);
    return this;
  }

  get(field: UsageField): number {
    return this.numbers.get(field) ?? 0;
  }

  build(): FieldLookup {
    return new FieldLookup(new Map(this.numbers), new Map(this.texts));
  }
}

export interface MetricsProvider {
  readonly name: string;
  /** Best-effort fetch; never throws. */
  collect(): FieldLookup;
}

// ---------------------------------------------------------------------------
// Command execution
// ---------------------------------------------------------------------------

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
}

/**
 * Run a command and return its stdout, or null on any failure (missing
 * binary, non-zero exit, timeout).
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: CommandOptions
) => string | null;

/** Captured stdout limit; `ccusage blocks` listings grow past 1 MiB. */
export const MAX_COMMAND_OUTPUT = 64 * 1024 * 1024;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  try {
    return execFileSync(command, [...args], {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      maxBuffer: MAX_COMMAND_OUTPUT,
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'ignore'],
    });
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    debug(`${command} ${args.join(' ')} failed: ${message}`);
    return null;
  }
};

/**
 * First non-empty numeric capture group of `pattern` in `text`, else 0.
 * Patterns may offer alternatives, each with its own group.
 */
export function extractTokenCount(text: string, pattern: RegExp): number {
  const match = pattern.exec(text);
  if (!match) return 0;

  for (const group of match.slice(1)) {
    if (group) {
      const value = parseInt(group, 10);
      if (!isNaN(value)) return value;
    }
  }
  return 0;
}
