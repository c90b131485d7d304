import fs from "fs/promises";
import path from "path";
import { TextDecoder } from "util";
import {
  AlreadyExistsError,
  DecodeError,
  ErrorKind,
  InvalidInputKindError,
  IsADirectoryError,
  WrongKindError,
  attempt,
  guard,
  withErrorHandling,
} from "../errors/index.js";
import { getConfig } from "../config/loader.js";
import { sanitizeContent } from "../content/sanitizer.js";
import { ensureDirectory } from "./directories.js";
import { describePathInput, pathExists, resolvePath, statOrNull, type PathInput } from "./paths.js";
import { validatePath } from "./validation.js";

export interface CreateFileOptions {
  /** Replace an existing file. Defaults to true. */
  overwrite?: boolean;
  /** Compact sanitization. Defaults to false. */
  compact?: boolean;
  /** Node.js buffer encoding used for writing. Defaults to "utf-8". */
  encoding?: string;
}

export interface ReadFileOptions {
  asBytes?: boolean;
  /** WHATWG encoding label used for decoding. Defaults to "utf-8". */
  encoding?: string;
}

export interface DeleteFileOptions {
  /** Resolve to false instead of failing when the file is missing. */
  ignoreMissing?: boolean;
}

function encodeText(text: string, encoding: string): Buffer {
  if (!Buffer.isEncoding(encoding)) {
    throw new InvalidInputKindError("encoding", `Unknown encoding "${encoding}"`, encoding);
  }
  return Buffer.from(text, encoding);
}

function createDecoder(encoding: string): TextDecoder {
  try {
    return new TextDecoder(encoding, { fatal: true });
  } catch (error) {
    if (error instanceof RangeError) {
      throw new InvalidInputKindError("encoding", `Unknown encoding "${encoding}"`, encoding);
    }
    throw error;
  }
}

/**
 * Create (or replace) a file holding the sanitized form of `content`.
 * Missing parent directories are created.
 *
 * Resolves to the absolute path written.
 */
export async function createFile(
  filePath: PathInput,
  content: unknown = "",
  options: CreateFileOptions = {}
): Promise<string> {
  const defaults = getConfig().files;
  const {
    overwrite = defaults.overwrite,
    compact = defaults.compact,
    encoding = defaults.encoding,
  } = options;

  return withErrorHandling(
    async () => {
      const target = await resolvePath(filePath);

      if (!overwrite && (await pathExists(target))) {
        throw new AlreadyExistsError(target, "the file already exists and overwrite is disabled");
      }

      await ensureDirectory(path.dirname(target), { createIfMissing: true, existOk: true });

      const data = encodeText(sanitizeContent(content, { compact }), encoding);
      await guard(() => fs.writeFile(target, data), "write file", target);

      return target;
    },
    "create_file",
    { path: describePathInput(filePath), overwrite, compact, encoding }
  );
}

/**
 * Read a whole file, as text or as raw bytes.
 */
export async function readFile(
  filePath: PathInput,
  options: ReadFileOptions & { asBytes: true }
): Promise<Buffer>;
export async function readFile(
  filePath: PathInput,
  options?: ReadFileOptions & { asBytes?: false }
): Promise<string>;
export async function readFile(filePath: PathInput, options?: ReadFileOptions): Promise<string | Buffer>;
export async function readFile(
  filePath: PathInput,
  options: ReadFileOptions = {}
): Promise<string | Buffer> {
  const { asBytes = false, encoding = getConfig().files.encoding } = options;

  return withErrorHandling(
    async () => {
      const decoder = asBytes ? null : createDecoder(encoding);
      const target = await validatePath(filePath, {
        mustExist: true,
        expectedKind: "file",
        readable: true,
      });

      const bytes = await guard(() => fs.readFile(target), "read file", target);
      if (!decoder) {
        return bytes;
      }

      try {
        return decoder.decode(bytes);
      } catch (error) {
        throw new DecodeError(target, encoding, error);
      }
    },
    "read_file",
    { path: describePathInput(filePath), asBytes, encoding }
  );
}

/**
 * Delete a regular file.
 *
 * Resolves to true when the file was removed, and to false when it was
 * already missing and `ignoreMissing` is set. Directories are always rejected.
 */
export async function deleteFile(
  filePath: PathInput,
  options: DeleteFileOptions = {}
): Promise<boolean> {
  const { ignoreMissing = false } = options;
  const label = describePathInput(filePath);

  return withErrorHandling(
    async () => {
      const validated = await attempt(
        () => validatePath(filePath, { mustExist: true }),
        "validate path",
        label
      );
      if (!validated.ok) {
        if (ignoreMissing && validated.error.kind === ErrorKind.NOT_FOUND) {
          return false;
        }
        throw validated.error;
      }
      const target = validated.value;

      const stats = await statOrNull(target);
      if (stats?.isDirectory()) {
        throw new IsADirectoryError(target);
      }
      if (stats && !stats.isFile()) {
        throw new WrongKindError(target, "expected a file");
      }

      const removed = await attempt(() => fs.unlink(target), "delete file", target);
      if (!removed.ok) {
        // Removed by someone else between the check and the unlink
        if (ignoreMissing && removed.error.kind === ErrorKind.NOT_FOUND) {
          return false;
        }
        throw removed.error;
      }
      return true;
    },
    "delete_file",
    { path: label, ignoreMissing }
  );
}
