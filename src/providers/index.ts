/**
 * Providers Module
 *
 * External data sources behind one contract (MetricsProvider → FieldLookup),
 * plus git discovery.
 */

export {
  FieldLookup,
  FieldLookupBuilder,
  runCommand,
  extractTokenCount,
} from './fields.js';
export type {
  UsageField,
  TextField,
  MetricsProvider,
  CommandRunner,
  CommandOptions,
} from './fields.js';
export { UsageCliProvider, PATTERNS, extractBlockStart } from './usage-cli.js';
export type { UsageCliOptions } from './usage-cli.js';
export { UsageScriptProvider, parseUsageScriptOutput } from './usage-script.js';
export type { UsageScriptOptions } from './usage-script.js';
export { findGitDir, parseHead, countChanges, getGitInfo } from './git.js';
