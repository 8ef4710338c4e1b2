/**
 * Statusline pipeline
 *
 *   1. Parse stdin JSON into a StatuslineInput (the only fatal step)
 *   2. Load configuration for the workspace
 *   3. Collect a snapshot from providers, tracking files and git
 *   4. Build widgets with the configured theme and render one line
 *
 * The theme is resolved once from config and passed down explicitly.
 */

import { loadConfig } from './config/index.js';
import { buildWidgets, collectSnapshot, renderWidgets } from './hud/index.js';
import { getWorkspacePath, parseStatuslineInput } from './shared/input.js';
import { setDebug } from './shared/debug.js';
import { getTheme } from './themes/index.js';
import type { SnapshotDeps } from './hud/index.js';
import type { StatuslineConfig, StatuslineInput } from './shared/types.js';

export interface RenderOptions extends SnapshotDeps {
  /** Skip config file loading and use this config as is */
  config?: StatuslineConfig;
}

/** Render a validated input to one ANSI line (without the newline). */
export function renderStatusline(input: StatuslineInput, options: RenderOptions = {}): string {
  const workspace = getWorkspacePath(input);
  const config = options.config ?? loadConfig(workspace === '~' ? undefined : workspace);
  setDebug(config.debug === true);

  const theme = getTheme(config.theme);
  const snapshot = collectSnapshot(input, config, options);
  return renderWidgets(buildWidgets(snapshot, theme), theme);
}

/**
 * Raw stdin text → output line. Throws InputError on unparseable input.
 */
export function runStatusline(raw: string, options: RenderOptions = {}): string {
  const input = parseStatuslineInput(raw);
  return renderStatusline(input, options);
}

export interface CliResult {
  /** Process exit code: 0 on success, 1 on unreadable input */
  code: number;
  stdout: string;
  stderr: string;
}

/** One `ccstatus: <message>` line for stderr. */
export function formatFailure(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `ccstatus: ${message}\n`;
}

/**
 * Full command behaviour for one stdin payload: the newline-terminated
 * status line, or an error line and exit code 1.
 */
export function runCli(raw: string, options: RenderOptions = {}): CliResult {
  try {
    const line = runStatusline(raw, options);
    return { code: 0, stdout: `${line}\n`, stderr: '' };
  } catch (error) {
    // stderr only: stdout is the status line
    return { code: 1, stdout: '', stderr: formatFailure(error) };
  }
}
