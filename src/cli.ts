#!/usr/bin/env node

/**
 * ccstatus - Powerline status line for Claude Code
 *
 * Claude Code runs this on every render cycle via the statusLine command
 * configured in ~/.claude/settings.json, piping session JSON on stdin.
 */

import { formatFailure, runCli } from './statusline.js';
import { InputError } from './shared/errors.js';

/**
 * Read all of stdin as UTF-8.
 */
async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of process.stdin) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InputError(`Error reading stdin: ${message}`, 'INPUT_READ');
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function main(): Promise<number> {
  let raw: string;
  try {
    raw = await readStdin();
  } catch (error) {
    process.stderr.write(formatFailure(error));
    return 1;
  }

  const result = runCli(raw);
  process.stdout.write(result.stdout);
  process.stderr.write(result.stderr);
  return result.code;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(formatFailure(error));
    process.exitCode = 1;
  }
);
