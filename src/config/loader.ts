import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import * as yaml from "js-yaml";
import { ConfigSchema, Config, ConfigInput, ENV_VAR_MAPPING } from "./schema.js";
import { ZodError } from "zod";

/**
 * Unvalidated configuration fragment, as read from a file or the environment
 */
export type ConfigTree = Record<string, unknown>;

function isPlainRecord(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from a file (YAML or JSON)
 */
export async function loadConfigFromFile(configPath: string): Promise<ConfigTree> {
  let fileContent: string;
  try {
    fileContent = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new Error(`Config file not found: ${configPath}`);
    }
    throw new Error(
      `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const ext = path.extname(configPath).toLowerCase();

  let parsed: unknown;
  try {
    if (ext === ".yaml" || ext === ".yml") {
      parsed = yaml.load(fileContent);
    } else if (ext === ".json") {
      parsed = JSON.parse(fileContent);
    } else {
      throw new Error(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
    }
  } catch (error) {
    throw new Error(
      `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isPlainRecord(parsed)) {
    throw new Error(`Failed to load config file: ${configPath} must contain a mapping`);
  }
  return parsed;
}

/**
 * Set a nested property on an object using dot notation
 */
function setNestedProperty(obj: ConfigTree, dottedPath: string, value: unknown): void {
  const keys = dottedPath.split(".");
  let current = obj;

  for (let i = 0; i < keys.length - 1; i++) {
    const key = keys[i];
    if (!key) {
      continue;
    }
    const next = current[key];
    if (isPlainRecord(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[key] = created;
      current = created;
    }
  }

  const lastKey = keys[keys.length - 1];
  if (lastKey) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string): unknown {
  // Try to parse as JSON first (handles booleans, numbers, etc.)
  try {
    return JSON.parse(value);
  } catch {
    // If not valid JSON, return as string
    return value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const config: ConfigTree = {};

  for (const [envVar, configPath] of Object.entries(ENV_VAR_MAPPING)) {
    const value = env[envVar];
    if (value !== undefined) {
      setNestedProperty(config, configPath, parseEnvValue(value));
    }
  }

  return config;
}

/**
 * Merge multiple config objects with proper precedence
 * Later configs override earlier ones
 */
export function mergeConfigs(...configs: ConfigTree[]): ConfigTree {
  const result: ConfigTree = {};

  for (const config of configs) {
    mergeDeep(result, config);
  }

  return result;
}

/**
 * Deep merge helper
 */
function mergeDeep(target: ConfigTree, source: ConfigTree): void {
  for (const [key, value] of Object.entries(source)) {
    if (isPlainRecord(value)) {
      const existing = target[key];
      const nested: ConfigTree = isPlainRecord(existing) ? existing : {};
      target[key] = nested;
      mergeDeep(nested, value);
    } else if (value !== undefined) {
      target[key] = value;
    }
  }
}

/**
 * Validate and parse configuration using Zod schema
 */
export function validateConfig(config: unknown): Config {
  try {
    return ConfigSchema.parse(config);
  } catch (error) {
    if (error instanceof ZodError) {
      const messages = error.errors
        .map((err) => `  - ${err.path.join(".")}: ${err.message}`)
        .join("\n");
      throw new Error(`Configuration validation failed:\n${messages}`);
    }
    throw error;
  }
}

/**
 * Expand home directory in paths
 */
function expandHome(filepath: string): string {
  if (filepath.startsWith("~/") || filepath === "~") {
    return path.join(os.homedir(), filepath.slice(1));
  }
  return filepath;
}

/**
 * Normalize and resolve paths in configuration
 */
export function normalizePaths(config: Config): Config {
  return {
    ...config,
    logging: {
      ...config.logging,
      destination: config.logging.destination
        ? path.resolve(expandHome(config.logging.destination))
        : undefined,
    },
    tempFiles: {
      ...config.tempFiles,
      directory: config.tempFiles.directory
        ? path.resolve(expandHome(config.tempFiles.directory))
        : undefined,
    },
  };
}

/**
 * Main configuration loader with full precedence chain
 * Precedence: overrides > env vars > config file > defaults
 */
export interface LoadConfigOptions {
  configPath?: string;
  overrides?: ConfigInput;
  envConfig?: ConfigTree;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const configs: ConfigTree[] = [];

  // 1. Start with defaults (handled by Zod schema defaults)
  configs.push({});

  // 2. Load from config file if provided
  if (options.configPath) {
    configs.push(await loadConfigFromFile(options.configPath));
  }

  // 3. Load from environment variables
  configs.push(options.envConfig ?? loadConfigFromEnv());

  // 4. Apply programmatic overrides (highest precedence)
  if (options.overrides) {
    configs.push(options.overrides);
  }

  const merged = mergeConfigs(...configs);
  return normalizePaths(validateConfig(merged));
}

// Active configuration; built from defaults and env vars when first read
let activeConfig: Config | null = null;

export function getConfig(): Config {
  if (!activeConfig) {
    activeConfig = normalizePaths(validateConfig(loadConfigFromEnv()));
  }
  return activeConfig;
}

export function setConfig(config: Config): void {
  activeConfig = config;
}

export function resetConfig(): void {
  activeConfig = null;
}
