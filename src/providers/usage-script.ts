/**
 * calculate-usage.sh provider
 *
 * Users can drop an executable script into the tracking directory that
 * prints whitespace-separated integers:
 *
 *   <session> <daily> <messages> [<input> <output>]
 *
 * Fields that fail to parse are left out; fewer than three fields means
 * no data at all.
 */

import { existsSync } from 'fs';
import { TRACKING_FILES, getTrackingPath } from '../state/tracking.js';
import { FieldLookup, FieldLookupBuilder, runCommand } from './fields.js';
import type { CommandRunner, MetricsProvider, UsageField } from './fields.js';

const FIELD_ORDER: readonly UsageField[] = [
  'sessionTokens',
  'dailyTokens',
  'messages',
  'inputTokens',
  'outputTokens',
];

export function parseUsageScriptOutput(output: string): FieldLookup {
  const parts = output.trim().split(/\s+/).filter((part) => part.length > 0);
  if (parts.length < 3) return FieldLookup.empty();

  const count = parts.length >= 5 ? 5 : 3;
  const fields = new FieldLookupBuilder();
  FIELD_ORDER.slice(0, count).forEach((field, i) => {
    if (/^[+-]?\d+$/.test(parts[i])) {
      fields.set(field, parseInt(parts[i], 10));
    }
  });
  return fields.build();
}

export interface UsageScriptOptions {
  trackingDir?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export class UsageScriptProvider implements MetricsProvider {
  readonly name = 'calculate-usage';

  private readonly runner: CommandRunner;

  constructor(private readonly options: UsageScriptOptions = {}) {
    this.runner = options.runner ?? runCommand;
  }

  get scriptPath(): string {
    return getTrackingPath(TRACKING_FILES.usageScript, this.options.trackingDir);
  }

  collect(): FieldLookup {
    const script = this.scriptPath;
    if (!existsSync(script)) return FieldLookup.empty();

    const output = this.runner(script, [], { timeoutMs: this.options.timeoutMs });
    return output === null ? FieldLookup.empty() : parseUsageScriptOutput(output);
  }
}
