import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { runCli, runStatusline } from '../statusline.js';
import { DEFAULT_CONFIG } from '../config/loader.js';
import { BG, FG, RESET } from '../hud/colors.js';
import { InputError } from '../shared/errors.js';
import type { RenderOptions } from '../statusline.js';
import type { StatuslineConfig } from '../shared/types.js';

const ARROW = '\uE0B0';

const INPUT = JSON.stringify({
  model: { display_name: 'Sonnet 4' },
  workspace: { current_dir: '/home/dev/proj' },
  usage: { inputTokens: 2000, outputTokens: 0 },
});

let trackingDir: string;

beforeEach(() => {
  trackingDir = mkdtempSync(join(tmpdir(), 'ccstatus-line-'));
  // Window opened an hour before the fixed clock
  writeFileSync(join(trackingDir, 'session_start'), '2026-01-07T11:00:00Z\n');
});

afterEach(() => {
  rmSync(trackingDir, { recursive: true, force: true });
});

function options(theme: string): RenderOptions {
  const config: StatuslineConfig = {
    ...DEFAULT_CONFIG,
    theme,
    trackingDir,
    providers: { usageCli: false, usageScript: false, git: false },
  };
  return {
    config,
    now: new Date('2026-01-07T12:00:00Z'),
    identity: 'dev@box',
    homeDir: '/home/dev',
    runner: () => null,
  };
}

describe('runStatusline', () => {
  it('should render the minimal theme', () => {
    const line = runStatusline(INPUT, options('minimal'));
    const pipe = ` ${FG.brightBlack}|${RESET} `;

    expect(line).toBe(
      [
        `${FG.brightGreen}dev@box${RESET}`,
        `${FG.brightBlue}~/proj${RESET}`,
        `${FG.brightMagenta}sonnet${RESET}`,
        `${FG.brightGreen}100%${RESET}`,
        `${FG.brightBlack}🔤 2.0k${RESET}`,
        `${FG.brightRed}$ 0.600¢${RESET}`,
        `${FG.brightCyan}⏱ 1h 0m${RESET}`,
        `${FG.brightCyan}5hr reset 4h 0m${RESET}`,
      ].join(pipe)
    );
  });

  it('should render powerline segments joined by arrows', () => {
    const line = runStatusline(INPUT, options('powerline'));

    const head =
      `${BG.blue}${FG.brightWhite} dev@box ${RESET}` +
      `${BG.brightCyan}${FG.blue}${ARROW}${RESET}` +
      `${BG.brightCyan}${FG.black} ~/proj ${RESET}`;
    const tail =
      `${BG.brightBlue}${FG.brightBlue}${ARROW}${RESET}` +
      `${BG.brightBlue}${FG.brightWhite} 5hr reset 4h 0m ${RESET}`;

    expect(line.slice(0, head.length)).toBe(head);
    expect(line.slice(-tail.length)).toBe(tail);
  });

  it('should never end with a newline', () => {
    expect(runStatusline(INPUT, options('powerline'))).not.toContain('\n');
  });

  it('should fall back to powerline for an unknown theme', () => {
    expect(runStatusline(INPUT, options('no-such-theme'))).toBe(
      runStatusline(INPUT, options('powerline'))
    );
  });

  it('should render a line for an empty object', () => {
    const line = runStatusline('{}', options('minimal'));
    expect(line.startsWith(`${FG.brightGreen}dev@box${RESET}`)).toBe(true);
  });

  it('should throw InputError for unparseable input', () => {
    expect(() => runStatusline('oops', options('minimal'))).toThrow(InputError);
    expect(() => runStatusline('{"model":"sonnet"}', options('minimal'))).toThrow(InputError);
  });
});

describe('runCli', () => {
  it('should print the line with a trailing newline and exit 0', () => {
    const result = runCli(INPUT, options('minimal'));
    expect(result).toEqual({
      code: 0,
      stdout: `${runStatusline(INPUT, options('minimal'))}\n`,
      stderr: '',
    });
  });

  it('should exit 1 with one stderr line for invalid JSON', () => {
    const result = runCli('oops', options('minimal'));
    expect(result.code).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toMatch(/^ccstatus: Error parsing JSON: [^\n]*\n$/);
  });

  it('should render when optional fields are null', () => {
    const result = runCli('{"model":null,"inputTokens":null,"workspace":null}', options('minimal'));
    expect(result.code).toBe(0);
    expect(result.stdout.startsWith(`${FG.brightGreen}dev@box${RESET}`)).toBe(true);
    expect(result.stdout).not.toContain('sonnet');
  });
});
