/**
 * Configuration module for fileguard
 *
 * This module provides configuration management with:
 * - YAML and JSON config file support
 * - Environment variable configuration (FILEGUARD_*)
 * - Programmatic overrides
 * - Configuration validation using Zod
 * - Configuration precedence: overrides > env vars > config file > defaults
 */

export { ConfigSchema, ENV_VAR_MAPPING } from "./schema.js";
export type { Config, ConfigInput } from "./schema.js";
export {
  loadConfig,
  loadConfigFromFile,
  loadConfigFromEnv,
  mergeConfigs,
  validateConfig,
  normalizePaths,
  getConfig,
  setConfig,
  resetConfig,
  type ConfigTree,
  type LoadConfigOptions,
} from "./loader.js";
