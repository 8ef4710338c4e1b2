import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  getTrackingDir,
  getTrackingPath,
  readTrackingFile,
  parseRfc3339,
  readSessionStart,
  readSessionId,
  parseLatency,
  readLatency,
} from '../state/tracking.js';

// ---------------------------------------------------------------------------
// Test fixture: use a temp directory for all file I/O
// ---------------------------------------------------------------------------

let tmpDir: string;
const originalSessionId = process.env.CLAUDE_SESSION_ID;

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'ccstatus-tracking-'));
  delete process.env.CLAUDE_SESSION_ID;
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
  if (originalSessionId) {
    process.env.CLAUDE_SESSION_ID = originalSessionId;
  } else {
    delete process.env.CLAUDE_SESSION_ID;
  }
});

// ---------------------------------------------------------------------------
// Path resolution
// ---------------------------------------------------------------------------

describe('getTrackingDir', () => {
  it('should default to ~/.claude', () => {
    expect(getTrackingDir()).toMatch(/\.claude$/);
  });

  it('should use an override', () => {
    expect(getTrackingDir('/data/tracking')).toBe('/data/tracking');
  });
});

describe('getTrackingPath', () => {
  it('should join the file name onto the directory', () => {
    expect(getTrackingPath('latency.txt', tmpDir)).toBe(join(tmpDir, 'latency.txt'));
  });
});

// ---------------------------------------------------------------------------
// Raw read
// ---------------------------------------------------------------------------

describe('readTrackingFile', () => {
  it('should report a missing file', () => {
    expect(readTrackingFile('nope', tmpDir)).toEqual({ exists: false });
  });

  it('should return trimmed contents', () => {
    writeFileSync(join(tmpDir, 'current_session'), '  session-1 \n');

    const result = readTrackingFile('current_session', tmpDir);
    expect(result.exists).toBe(true);
    expect(result.data).toBe('session-1');
    expect(result.foundAt).toBe(join(tmpDir, 'current_session'));
  });

  it('should treat a blank file as missing', () => {
    writeFileSync(join(tmpDir, 'current_session'), '\n\n');
    expect(readTrackingFile('current_session', tmpDir).exists).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Session files
// ---------------------------------------------------------------------------

describe('parseRfc3339', () => {
  it('should parse UTC and offset timestamps', () => {
    expect(parseRfc3339('2026-01-07T10:00:00Z')?.getTime()).toBe(Date.UTC(2026, 0, 7, 10));
    expect(parseRfc3339('2026-01-07T12:00:00+02:00')?.getTime()).toBe(Date.UTC(2026, 0, 7, 10));
  });

  it('should accept fractional seconds', () => {
    expect(parseRfc3339('2026-01-07T10:00:00.500Z')?.getTime()).toBe(
      Date.UTC(2026, 0, 7, 10, 0, 0, 500)
    );
  });

  it('should reject other date formats', () => {
    expect(parseRfc3339('2026-01-07')).toBeUndefined();
    expect(parseRfc3339('yesterday')).toBeUndefined();
  });
});

describe('readSessionStart', () => {
  it('should read the window start', () => {
    writeFileSync(join(tmpDir, 'session_start'), '2026-01-07T10:00:00Z\n');
    expect(readSessionStart(tmpDir)?.getTime()).toBe(Date.UTC(2026, 0, 7, 10));
  });

  it('should ignore a malformed timestamp', () => {
    writeFileSync(join(tmpDir, 'session_start'), 'not a date');
    expect(readSessionStart(tmpDir)).toBeUndefined();
  });

  it('should return undefined without a file', () => {
    expect(readSessionStart(tmpDir)).toBeUndefined();
  });
});

describe('readSessionId', () => {
  it('should read the session file', () => {
    writeFileSync(join(tmpDir, 'current_session'), 'file-session\n');
    expect(readSessionId(tmpDir)).toBe('file-session');
  });

  it('should prefer CLAUDE_SESSION_ID', () => {
    writeFileSync(join(tmpDir, 'current_session'), 'file-session\n');
    process.env.CLAUDE_SESSION_ID = 'env-session';
    expect(readSessionId(tmpDir)).toBe('env-session');
  });

  it('should return undefined when neither is set', () => {
    expect(readSessionId(tmpDir)).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Latency
// ---------------------------------------------------------------------------

describe('parseLatency', () => {
  it('should read average, last and count', () => {
    expect(parseLatency('850.5\n1200\n42\n')).toEqual({
      averageMs: 850.5,
      lastRequestMs: 1200,
      requestCount: 42,
    });
  });

  it('should need three lines', () => {
    expect(parseLatency('850\n1200')).toEqual({
      averageMs: 0,
      lastRequestMs: 0,
      requestCount: 0,
    });
  });

  it('should parse each line independently', () => {
    expect(parseLatency('slow\n100\n3')).toEqual({
      averageMs: 0,
      lastRequestMs: 100,
      requestCount: 3,
    });
  });
});

describe('readLatency', () => {
  it('should read the latency file', () => {
    writeFileSync(join(tmpDir, 'latency.txt'), '250\n300\n8\n');
    expect(readLatency(tmpDir)).toEqual({ averageMs: 250, lastRequestMs: 300, requestCount: 8 });
  });

  it('should return zeros without a file', () => {
    expect(readLatency(tmpDir)).toEqual({ averageMs: 0, lastRequestMs: 0, requestCount: 0 });
  });
});
