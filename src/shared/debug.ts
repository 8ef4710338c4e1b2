/**
 * Opt-in tracing to stderr.
 *
 * stdout belongs to the status line, so diagnostics only ever go to stderr,
 * and only when CCSTATUS_DEBUG is set or the config enables `debug`.
 * Degraded lookups are traced here, never reported as errors.
 */

let enabled = false;

export function setDebug(on: boolean): void {
  enabled = on;
}

export function isDebugEnabled(): boolean {
  return enabled || process.env.CCSTATUS_DEBUG === '1' || process.env.CCSTATUS_DEBUG === 'true';
}

export function debug(message: string, detail?: unknown): void {
  if (!isDebugEnabled()) return;
  if (detail === undefined) {
    console.error(`[ccstatus] ${message}`);
  } else {
    console.error(`[ccstatus] ${message}`, detail);
  }
}
