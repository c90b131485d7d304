import fs from "fs/promises";
import { constants } from "fs";
import path from "path";
import {
  HiddenPathError,
  NotReadableError,
  NotWritableError,
  PathNotFoundError,
  WrongKindError,
} from "../errors/index.js";
import { resolvePath, statOrNull, type PathInput } from "./paths.js";

export type EntryKind = "file" | "directory";

/**
 * Checks applied by validatePath. Every requested check must pass.
 */
export interface ValidationConstraints {
  /** Defaults to true. */
  mustExist?: boolean;
  expectedKind?: EntryKind;
  readable?: boolean;
  writable?: boolean;
  /** Defaults to true. When false, dot-prefixed names are rejected. */
  allowHidden?: boolean;
}

/**
 * Unix naming convention only; see isHidden for the platform-aware check.
 */
export function hasHiddenName(resolvedPath: string): boolean {
  return path.basename(resolvedPath).startsWith(".");
}

// The access failure, or null when access is granted
async function accessError(resolvedPath: string, mode: number): Promise<Error | null> {
  try {
    await fs.access(resolvedPath, mode);
    return null;
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

/**
 * Resolve a path and check it against the given constraints.
 * Checks run in a fixed order and the first failure is thrown.
 */
export async function validatePath(
  rawPath: PathInput,
  constraints: ValidationConstraints = {}
): Promise<string> {
  const {
    mustExist = true,
    expectedKind,
    readable = false,
    writable = false,
    allowHidden = true,
  } = constraints;

  const resolved = await resolvePath(rawPath);
  const stats = mustExist || expectedKind ? await statOrNull(resolved) : null;

  if (mustExist && !stats) {
    throw new PathNotFoundError(resolved);
  }

  if (expectedKind === "file" && !stats?.isFile()) {
    throw new WrongKindError(resolved, "expected a file");
  }
  if (expectedKind === "directory" && !stats?.isDirectory()) {
    throw new WrongKindError(resolved, "expected a directory");
  }

  if (!allowHidden && hasHiddenName(resolved)) {
    throw new HiddenPathError(resolved);
  }

  if (readable) {
    const denied = await accessError(resolved, constants.R_OK);
    if (denied) {
      throw new NotReadableError(resolved, denied);
    }
  }

  if (writable) {
    const denied = await accessError(resolved, constants.W_OK);
    if (denied) {
      throw new NotWritableError(resolved, denied);
    }
  }

  return resolved;
}
