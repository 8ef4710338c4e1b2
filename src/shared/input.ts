/**
 * Zod schema for the JSON envelope Claude Code sends on stdin, plus the
 * resolvers that pick a value when the same figure can arrive under more
 * than one field name.
 */

import { z } from 'zod';
import { InputError } from './errors.js';
import type { StatuslineInput } from './types.js';

const count = z.number().int();

const contextUsageSchema = z.object({
  /** Token count of the current context window */
  tokens: count.nullish(),
  /** Character count, used to estimate tokens when no token count is sent */
  characters: count.nullish(),
});

export const statuslineInputSchema = z.object({
  model: z
    .object({
      id: z.string().nullish(),
      display_name: z.string().nullish(),
    })
    .nullish(),
  workspace: z
    .object({
      current_dir: z.string().nullish(),
      project_dir: z.string().nullish(),
    })
    .nullish(),
  /** Older releases send the directory at the top level */
  workspaceDirectory: z.string().nullish(),
  usage: z
    .object({
      inputTokens: count.nullish(),
      outputTokens: count.nullish(),
      totalTokens: count.nullish(),
    })
    .nullish(),
  inputTokens: count.nullish(),
  outputTokens: count.nullish(),
  totalTokens: count.nullish(),
  contextUsage: contextUsageSchema.nullish(),
  /** Older key for contextUsage */
  context: contextUsageSchema.nullish(),
  costData: z
    .object({
      sessionCost: z.number().nullish(),
      dailyCost: z.number().nullish(),
    })
    .nullish(),
  sessionCost: z.number().nullish(),
  dailyCost: z.number().nullish(),
});

/**
 * Parse raw stdin text into a validated StatuslineInput.
 * Throws InputError when the text is not JSON or not the expected shape.
 */
export function parseStatuslineInput(raw: string): StatuslineInput {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new InputError(`Error parsing JSON: ${message}`, 'INPUT_JSON');
  }

  const result = statuslineInputSchema.safeParse(json);
  if (!result.success) {
    throw new InputError('Error parsing JSON: unexpected input shape', 'INPUT_SHAPE', {
      issues: result.error.issues,
    });
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Field resolvers — the nested object wins only when it carries a positive value
// ---------------------------------------------------------------------------

export function getInputTokens(input: StatuslineInput): number {
  const nested = input.usage?.inputTokens ?? 0;
  return nested > 0 ? nested : input.inputTokens ?? 0;
}

export function getOutputTokens(input: StatuslineInput): number {
  const nested = input.usage?.outputTokens ?? 0;
  return nested > 0 ? nested : input.outputTokens ?? 0;
}

export function getTotalTokens(input: StatuslineInput): number {
  const nested = input.usage?.totalTokens ?? 0;
  return nested > 0 ? nested : input.totalTokens ?? 0;
}

export function getContextTokens(input: StatuslineInput): number {
  const primary = input.contextUsage?.tokens ?? 0;
  if (primary > 0) return primary;
  const legacy = input.context?.tokens ?? 0;
  return legacy > 0 ? legacy : 0;
}

export function getContextCharacters(input: StatuslineInput): number {
  const primary = input.contextUsage?.characters ?? 0;
  if (primary > 0) return primary;
  const legacy = input.context?.characters ?? 0;
  return legacy > 0 ? legacy : 0;
}

/** Workspace directory, '~' when Claude Code sent none. */
export function getWorkspacePath(input: StatuslineInput): string {
  if (input.workspace?.current_dir) return input.workspace.current_dir;
  if (input.workspaceDirectory) return input.workspaceDirectory;
  return '~';
}
