/**
 * Tracking Files
 *
 * Small plain-text files that other tooling keeps in a per-user directory
 * (default ~/.claude):
 *   - latency.txt      three lines: average ms, last request ms, request count
 *   - session_start    RFC3339 timestamp of the current rolling window start
 *   - current_session  session identifier
 *
 * Reads are best-effort and synchronous: a missing or malformed file yields
 * { exists: false } and callers fall back to zero values.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import type { LatencyData, TrackingReadResult } from '../shared/types.js';

export const TRACKING_FILES = {
  latency: 'latency.txt',
  sessionStart: 'session_start',
  sessionId: 'current_session',
  usageScript: 'calculate-usage.sh',
} as const;

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

export function getTrackingDir(override?: string): string {
  return override ?? join(homedir(), '.claude');
}

export function getTrackingPath(name: string, dir?: string): string {
  return join(getTrackingDir(dir), name);
}

// ---------------------------------------------------------------------------
// Raw read
// ---------------------------------------------------------------------------

/**
 * Read a tracking file as trimmed text. Empty files count as missing.
 */
export function readTrackingFile(name: string, dir?: string): TrackingReadResult<string> {
  const path = getTrackingPath(name, dir);
  try {
    if (!existsSync(path)) {
      return { exists: false };
    }
    const data = readFileSync(path, 'utf-8').trim();
    if (data.length === 0) return { exists: false };
    return { exists: true, data, foundAt: path };
  } catch {
    return { exists: false };
  }
}

// ---------------------------------------------------------------------------
// Typed readers
// ---------------------------------------------------------------------------

const RFC3339 =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

/** Parse an RFC3339 timestamp; anything else is undefined. */
export function parseRfc3339(value: string): Date | undefined {
  if (!RFC3339.test(value)) return undefined;
  const date = new Date(value);
  return isNaN(date.getTime()) ? undefined : date;
}

export function readSessionStart(dir?: string): Date | undefined {
  const { data } = readTrackingFile(TRACKING_FILES.sessionStart, dir);
  return data ? parseRfc3339(data) : undefined;
}

/**
 * Session id: CLAUDE_SESSION_ID wins over the tracking file.
 */
export function readSessionId(dir?: string): string | undefined {
  const fromEnv = process.env.CLAUDE_SESSION_ID;
  if (fromEnv) return fromEnv;
  return readTrackingFile(TRACKING_FILES.sessionId, dir).data;
}

/**
 * Parse the three-line latency sample file. Each line is parsed on its
 * own; an unparseable line leaves its field at zero.
 */
export function parseLatency(content: string): LatencyData {
  const latency: LatencyData = { averageMs: 0, lastRequestMs: 0, requestCount: 0 };
  const lines = content.trim().split('\n').map((line) => line.trim());
  if (lines.length < 3) return latency;

  const average = Number(lines[0]);
  if (lines[0] !== '' && Number.isFinite(average)) latency.averageMs = average;

  const last = Number(lines[1]);
  if (lines[1] !== '' && Number.isFinite(last)) latency.lastRequestMs = last;

  if (/^-?\d+$/.test(lines[2])) latency.requestCount = parseInt(lines[2], 10);

  return latency;
}

export function readLatency(dir?: string): LatencyData {
  const { data } = readTrackingFile(TRACKING_FILES.latency, dir);
  return parseLatency(data ?? '');
}
