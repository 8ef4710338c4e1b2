/**
 * Configuration Loader
 *
 * Loads and merges configuration from multiple sources with a clear precedence:
 *   defaults → user config → project config → env vars
 *
 * Config files use JSONC (JSON with Comments):
 *
 *   // ~/.config/ccstatus/config.jsonc
 *   {
 *     // Foreground-only colors with a pipe divider
 *     "theme": "minimal",
 *     "pathMaxLength": 40,
 *   }
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import * as jsonc from 'jsonc-parser';
import { z } from 'zod';
import type { StatuslineConfig } from '../shared/types.js';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: StatuslineConfig = {
  theme: 'powerline',
  pathMaxLength: 30,
  commandTimeoutMs: 2000,
  providers: {
    usageCli: true,
    usageScript: true,
    git: true,
  },
  display: {
    latency: false,
  },
  debug: false,
};

/**
 * Shape of a config file. Every key is optional; wrongly typed keys make
 * the whole file invalid.
 */
export const configFileSchema = z.object({
  theme: z.string().optional(),
  trackingDir: z.string().optional(),
  pathMaxLength: z.number().int().positive().optional(),
  commandTimeoutMs: z.number().int().positive().optional(),
  providers: z
    .object({
      usageCli: z.boolean().optional(),
      usageScript: z.boolean().optional(),
      git: z.boolean().optional(),
    })
    .optional(),
  display: z
    .object({
      latency: z.boolean().optional(),
    })
    .optional(),
  debug: z.boolean().optional(),
});

// ---------------------------------------------------------------------------
// Config file paths
// ---------------------------------------------------------------------------

/**
 * Get paths for user-level and project-level config files.
 *
 *   User:    ~/.config/ccstatus/config.jsonc
 *   Project: <workspace>/.claude/ccstatus.jsonc
 *
 * XDG_CONFIG_HOME is respected if set.
 */
export function getConfigPaths(workingDirectory?: string): {
  user: string;
  project: string;
} {
  const userConfigDir =
    process.env.XDG_CONFIG_HOME ?? join(homedir(), '.config');

  return {
    user: join(userConfigDir, 'ccstatus', 'config.jsonc'),
    project: join(
      workingDirectory ?? process.cwd(),
      '.claude',
      'ccstatus.jsonc'
    ),
  };
}

// ---------------------------------------------------------------------------
// JSONC file loader
// ---------------------------------------------------------------------------

/**
 * Load and parse a JSONC config file. Returns null if the file doesn't
 * exist, can't be read, or doesn't match the config shape.
 */
export function loadJsoncFile(path: string): StatuslineConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  try {
    const content = readFileSync(path, 'utf-8');
    const errors: jsonc.ParseError[] = [];
    const result: unknown = jsonc.parse(content, errors, {
      allowTrailingComma: true,
      allowEmptyContent: true,
    });

    if (errors.length > 0) {
      // A partially valid config is better than no config
      console.warn(
        `Warning: Parse errors in ${path}:`,
        errors.map((e) => jsonc.printParseErrorCode(e.error))
      );
    }

    if (result === undefined) return null;

    const parsed = configFileSchema.safeParse(result);
    if (!parsed.success) {
      console.warn(`Warning: Ignoring invalid config ${path}:`, parsed.error.issues);
      return null;
    }
    return parsed.data;
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Deep merge
// ---------------------------------------------------------------------------

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively merge source into target. Objects are merged key-by-key,
 * primitives and arrays are replaced wholesale, undefined is skipped.
 *
 *   deepMerge(
 *     { theme: 'powerline', providers: { git: true, usageCli: true } },
 *     { providers: { git: false } }
 *   )
 *   // { theme: 'powerline', providers: { git: false, usageCli: true } }
 */
export function deepMerge<T extends object>(
  target: T,
  source: Partial<T>
): T {
  const result = { ...target };

  for (const key of Object.keys(source) as (keyof T)[]) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge<Record<string, unknown>>(targetValue, sourceValue) as T[keyof T];
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[keyof T];
    }
  }

  return result;
}

// ---------------------------------------------------------------------------
// Environment variable overrides
// ---------------------------------------------------------------------------

/**
 * Load config overrides from environment variables (highest precedence).
 *
 *   CCSTATUS_THEME         theme name
 *   CCSTATUS_TRACKING_DIR  tracking directory
 *   CCSTATUS_DEBUG         "1" / "true" to trace to stderr
 */
export function loadEnvConfig(): Partial<StatuslineConfig> {
  const config: Partial<StatuslineConfig> = {};

  const theme = process.env.CCSTATUS_THEME;
  if (theme) {
    config.theme = theme;
  }

  const trackingDir = process.env.CCSTATUS_TRACKING_DIR;
  if (trackingDir) {
    config.trackingDir = trackingDir;
  }

  const debugFlag = process.env.CCSTATUS_DEBUG;
  if (debugFlag !== undefined) {
    config.debug = debugFlag === '1' || debugFlag === 'true';
  }

  return config;
}

// ---------------------------------------------------------------------------
// Main loader
// ---------------------------------------------------------------------------

/**
 * Load the fully merged configuration.
 *
 * Merge order (lowest to highest precedence):
 *   1. DEFAULT_CONFIG
 *   2. User config     — ~/.config/ccstatus/config.jsonc
 *   3. Project config  — <workspace>/.claude/ccstatus.jsonc
 *   4. Environment     — CCSTATUS_* variables
 */
export function loadConfig(workingDirectory?: string): StatuslineConfig {
  let config: StatuslineConfig = { ...DEFAULT_CONFIG };

  const paths = getConfigPaths(workingDirectory);

  const userConfig = loadJsoncFile(paths.user);
  if (userConfig) {
    config = deepMerge(config, userConfig);
  }

  const projectConfig = loadJsoncFile(paths.project);
  if (projectConfig) {
    config = deepMerge(config, projectConfig);
  }

  const envConfig = loadEnvConfig();
  if (Object.keys(envConfig).length > 0) {
    config = deepMerge(config, envConfig);
  }

  return config;
}
