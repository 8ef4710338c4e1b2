/**
 * Config Module
 *
 * Layered JSONC configuration for the status line.
 */

export {
  loadConfig,
  loadJsoncFile,
  loadEnvConfig,
  getConfigPaths,
  deepMerge,
  configFileSchema,
  DEFAULT_CONFIG,
} from './loader.js';
