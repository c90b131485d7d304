import fs from "fs/promises";
import type { Stats } from "fs";
import path from "path";
import os from "os";
import { fileURLToPath } from "url";
import { InvalidInputKindError, guard } from "../errors/index.js";

/**
 * Anything a caller may pass where a path is expected.
 */
export type PathInput = string | URL;

/**
 * Check that a value is a usable path and return it as a string.
 * Throws InvalidInputKindError otherwise.
 */
export function toPathString(input: unknown, argumentName = "path"): string {
  if (input instanceof URL) {
    if (input.protocol !== "file:") {
      throw new InvalidInputKindError(argumentName, "Only file: URLs are supported", input);
    }
    return fileURLToPath(input);
  }

  if (typeof input !== "string") {
    throw new InvalidInputKindError(argumentName, "Must be a string or a file: URL", input);
  }

  if (input.trim().length === 0) {
    throw new InvalidInputKindError(argumentName, "Cannot be empty", input);
  }

  return input;
}

/**
 * Expand home directory in file paths
 */
export function expandHome(filepath: string): string {
  if (filepath === "~" || filepath.startsWith("~/") || filepath.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), filepath.slice(1));
  }
  return filepath;
}

function isMissingError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * Canonicalize an absolute path without requiring it to exist.
 * The deepest existing ancestor is resolved through realpath and the
 * missing tail is appended as-is.
 */
async function canonicalize(absolute: string): Promise<string> {
  try {
    return await fs.realpath(absolute);
  } catch (error) {
    if (!isMissingError(error)) {
      throw error;
    }
    const parent = path.dirname(absolute);
    if (parent === absolute) {
      return absolute;
    }
    return path.join(await canonicalize(parent), path.basename(absolute));
  }
}

/**
 * Expand, absolutize and canonicalize a raw path.
 */
export async function resolvePath(input: unknown, argumentName = "path"): Promise<string> {
  const raw = toPathString(input, argumentName);
  const absolute = path.resolve(expandHome(raw));
  return guard(() => canonicalize(absolute), "resolve path", absolute);
}

/**
 * Stat a path, following symlinks. Returns null when nothing is there.
 */
export async function statOrNull(resolvedPath: string): Promise<Stats | null> {
  return guard(
    async () => {
      try {
        return await fs.stat(resolvedPath);
      } catch (error) {
        if (isMissingError(error)) {
          return null;
        }
        throw error;
      }
    },
    "stat",
    resolvedPath
  );
}

export async function pathExists(resolvedPath: string): Promise<boolean> {
  return (await statOrNull(resolvedPath)) !== null;
}

/**
 * Best-effort label for a raw path argument, used in logs before resolution.
 */
export function describePathInput(input: unknown): string {
  if (typeof input === "string") {
    return input;
  }
  if (input instanceof URL) {
    return input.href;
  }
  return `<${input === null ? "null" : typeof input}>`;
}
