import fs, { type FileHandle } from "fs/promises";
import os from "os";
import path from "path";
import { randomUUID } from "crypto";
import {
  ErrorKind,
  FileGuardError,
  TEMPFILE_PLACEHOLDER,
  TempFileCreateFailedError,
  getErrorMessage,
  isErrnoException,
} from "../errors/index.js";
import { getConfig } from "../config/loader.js";
import { ensureDirectory } from "./directories.js";
import { resolvePath, type PathInput } from "./paths.js";

const MAX_ATTEMPTS = 100;

export interface TempFileOptions {
  prefix?: string;
  suffix?: string;
  /** Created with its ancestors when missing. Defaults to the system temp directory. */
  directory?: PathInput;
  /** Defaults to true. */
  closeImmediately?: boolean;
}

/**
 * An open temporary file. The caller owns `handle` and must close it.
 */
export interface TempFile {
  path: string;
  handle: FileHandle;
}

function randomToken(): string {
  return randomUUID().replace(/-/g, "").slice(0, 12);
}

async function prepareDirectory(directory: PathInput | undefined): Promise<string> {
  if (directory === undefined) {
    return resolvePath(os.tmpdir());
  }
  try {
    return await ensureDirectory(directory, { createIfMissing: true, existOk: true });
  } catch (error) {
    if (
      error instanceof FileGuardError &&
      (error.kind === ErrorKind.WRONG_KIND || error.kind === ErrorKind.INVALID_INPUT_KIND)
    ) {
      throw error;
    }
    const label = typeof directory === "string" ? directory : directory.href;
    throw new TempFileCreateFailedError(
      label,
      `cannot prepare the directory: ${getErrorMessage(error)}`,
      error
    );
  }
}

// Exclusive create; a fresh name is drawn whenever one is taken
async function openUnique(
  directory: string,
  prefix: string,
  suffix: string
): Promise<{ filePath: string; handle: FileHandle }> {
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const filePath = path.join(directory, `${prefix}${randomToken()}${suffix}`);
    try {
      const handle = await fs.open(filePath, "wx", 0o600);
      return { filePath, handle };
    } catch (error) {
      if (isErrnoException(error) && error.code === "EEXIST") {
        continue;
      }
      throw new TempFileCreateFailedError(TEMPFILE_PLACEHOLDER, getErrorMessage(error), error);
    }
  }
  throw new TempFileCreateFailedError(
    TEMPFILE_PLACEHOLDER,
    `no unused name found after ${MAX_ATTEMPTS} attempts`
  );
}

/**
 * Create a uniquely named, empty file on disk.
 * Resolves to its path, or to the path and open handle when
 * closeImmediately is false.
 */
export async function createTempFile(
  options?: TempFileOptions & { closeImmediately?: true }
): Promise<string>;
export async function createTempFile(options: TempFileOptions & { closeImmediately: false }): Promise<TempFile>;
export async function createTempFile(options: TempFileOptions): Promise<string | TempFile>;
export async function createTempFile(options: TempFileOptions = {}): Promise<string | TempFile> {
  const defaults = getConfig().tempFiles;
  const {
    prefix = defaults.prefix,
    suffix = defaults.suffix,
    directory = defaults.directory,
    closeImmediately = true,
  } = options;

  const targetDirectory = await prepareDirectory(directory);
  const { filePath, handle } = await openUnique(targetDirectory, prefix, suffix);

  let resolved: string;
  try {
    resolved = await resolvePath(filePath);
  } catch (error) {
    // Nothing may be left behind once the call has failed
    await handle.close();
    await fs.rm(filePath, { force: true });
    throw error;
  }

  if (closeImmediately) {
    await handle.close();
    return resolved;
  }
  return { path: resolved, handle };
}
