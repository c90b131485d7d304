import fs from "fs/promises";
import path from "path";
import {
  AlreadyExistsError,
  DirectoryCreateFailedError,
  PathNotFoundError,
  PermissionDeniedError,
  WrongKindError,
  getErrorMessage,
  isErrnoException,
} from "../errors/index.js";
import { resolvePath, statOrNull, type PathInput } from "./paths.js";

export interface EnsureDirectoryOptions {
  /** Defaults to true. */
  createIfMissing?: boolean;
  /** Defaults to true. When false, an existing directory is an error. */
  existOk?: boolean;
}

async function makeDirectory(resolved: string, existOk: boolean): Promise<void> {
  if (existOk) {
    await fs.mkdir(resolved, { recursive: true });
    return;
  }
  // Ancestors may already exist; only the leaf must be new
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.mkdir(resolved);
}

/**
 * Make sure a directory exists, creating it and its ancestors when allowed.
 */
export async function ensureDirectory(
  directory: PathInput,
  options: EnsureDirectoryOptions = {}
): Promise<string> {
  const { createIfMissing = true, existOk = true } = options;
  const resolved = await resolvePath(directory, "directory");
  const stats = await statOrNull(resolved);

  if (stats) {
    if (!stats.isDirectory()) {
      throw new WrongKindError(resolved, "the path exists but is not a directory");
    }
    if (!existOk) {
      throw new AlreadyExistsError(resolved, "the directory already exists");
    }
    return resolved;
  }

  if (!createIfMissing) {
    throw new PathNotFoundError(resolved, "the directory does not exist and creation is disabled");
  }

  try {
    await makeDirectory(resolved, existOk);
  } catch (error) {
    if (isErrnoException(error)) {
      if (error.code === "EACCES" || error.code === "EPERM") {
        throw new PermissionDeniedError(resolved, "create the directory", error);
      }
      if (error.code === "EEXIST" && !existOk) {
        throw new AlreadyExistsError(resolved, "the directory already exists", error);
      }
    }
    throw new DirectoryCreateFailedError(resolved, getErrorMessage(error), error);
  }

  return resolved;
}
