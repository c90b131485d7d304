/**
 * fileguard: validated create/read/delete file operations.
 *
 * ```typescript
 * import { createFile, readFile, deleteFile } from "fileguard";
 *
 * const written = await createFile("~/notes/today.json", { done: false }, { compact: true });
 * const text = await readFile(written);
 * await deleteFile(written, { ignoreMissing: true });
 * ```
 */

import { loadConfig, setConfig, resetConfig as clearConfig, type LoadConfigOptions } from "./config/loader.js";
import type { Config } from "./config/schema.js";
import { initLogger, resetLogger } from "./utils/logger.js";
import { setPlatformAttributes } from "./filesystem/platform.js";

export * from "./filesystem/index.js";
export * from "./content/index.js";
export * from "./errors/index.js";
export { getConfig, ConfigSchema, type Config, type ConfigInput, type LoadConfigOptions } from "./config/index.js";
export { initLogger, getLogger, Logger, type LoggerConfig, type LogLevel, type LogFormat } from "./utils/logger.js";

/**
 * Load configuration (file, env vars, overrides) and apply it.
 * The logger and platform attribute strategy are rebuilt from the result.
 */
export async function configure(options: LoadConfigOptions = {}): Promise<Config> {
  const config = await loadConfig(options);
  setConfig(config);
  initLogger(config.logging);
  setPlatformAttributes(null);
  return config;
}

/**
 * Drop the active configuration; the next call rebuilds it from env vars.
 */
export function resetConfig(): void {
  clearConfig();
  resetLogger();
  setPlatformAttributes(null);
}
