import { z } from "zod";

/**
 * Configuration schema for fileguard
 * Supports both YAML and JSON formats
 */
export const ConfigSchema = z
  .object({
    // Logging configuration
    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error", "silent"]).optional().default("warn"),
        format: z.enum(["json", "pretty"]).optional().default("json"),
        destination: z.string().optional(), // Optional log file path
      })
      .optional()
      .default({}),

    // Defaults for createFile / readFile
    files: z
      .object({
        encoding: z.string().min(1).optional().default("utf-8"),
        overwrite: z.boolean().optional().default(true),
        compact: z.boolean().optional().default(false),
      })
      .optional()
      .default({}),

    // Defaults for createTempFile
    tempFiles: z
      .object({
        prefix: z.string().optional().default("tmp_"),
        suffix: z.string().optional().default(".tmp"),
        directory: z.string().optional(),
      })
      .optional()
      .default({}),

    // Hidden/read-only detection strategy
    platform: z
      .object({
        attributes: z.enum(["auto", "posix", "win32"]).optional().default("auto"),
      })
      .optional()
      .default({}),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * Environment variable mapping for configuration
 * Format: FILEGUARD_<SECTION>_<KEY>
 */
export const ENV_VAR_MAPPING: Record<string, string> = {
  // Logging
  FILEGUARD_LOGGING_LEVEL: "logging.level",
  FILEGUARD_LOGGING_FORMAT: "logging.format",
  FILEGUARD_LOGGING_DESTINATION: "logging.destination",

  // Files
  FILEGUARD_FILES_ENCODING: "files.encoding",
  FILEGUARD_FILES_OVERWRITE: "files.overwrite",
  FILEGUARD_FILES_COMPACT: "files.compact",

  // Temp files
  FILEGUARD_TEMP_FILES_PREFIX: "tempFiles.prefix",
  FILEGUARD_TEMP_FILES_SUFFIX: "tempFiles.suffix",
  FILEGUARD_TEMP_FILES_DIRECTORY: "tempFiles.directory",

  // Platform
  FILEGUARD_PLATFORM_ATTRIBUTES: "platform.attributes",
};
