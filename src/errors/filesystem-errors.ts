/**
 * Specific error classes for path validation and file operations.
 * Each error type carries the offending path, a reason, and a suggestion.
 */

import { FileGuardError, ErrorKind, type FileGuardErrorOptions } from "./base.js";

/**
 * Placeholder path reported when a failure happens before a path exists.
 */
export const TEMPFILE_PLACEHOLDER = "<tempfile>";

/**
 * Error thrown when an argument is not a recognized path-like or content-like value.
 */
export class InvalidInputKindError extends FileGuardError {
  constructor(argumentName: string, reason: string, received?: unknown) {
    super(`Invalid argument: ${argumentName} - ${reason}`, ErrorKind.INVALID_INPUT_KIND, {
      details: { argumentName, reason, received: describeType(received) },
      suggestion: "Pass a non-empty string or a file: URL.",
    });
  }
}

/**
 * Base class for failures tied to a specific path.
 */
export class PathValidationError extends FileGuardError {
  public readonly path: string;
  public readonly reason: string;

  constructor(path: string, reason: string, kind: ErrorKind, options?: FileGuardErrorOptions) {
    super(`Path validation failed (${path}): ${reason}`, kind, {
      ...options,
      details: { path, reason, ...options?.details },
    });
    this.path = path;
    this.reason = reason;
  }
}

/**
 * Error thrown when a required path does not exist.
 */
export class PathNotFoundError extends PathValidationError {
  constructor(path: string, reason = "the path does not exist", cause?: unknown) {
    super(path, reason, ErrorKind.NOT_FOUND, {
      suggestion: "Check the path spelling and verify the file exists.",
      cause,
    });
  }
}

/**
 * Error thrown when a path exists but is the wrong entry type.
 */
export class WrongKindError extends PathValidationError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(path, reason, ErrorKind.WRONG_KIND, { cause });
  }
}

/**
 * Error thrown when a hidden path is rejected by policy.
 */
export class HiddenPathError extends PathValidationError {
  constructor(path: string) {
    super(path, "hidden paths are not allowed", ErrorKind.HIDDEN_REJECTED, {
      suggestion: "Pass allowHidden: true to accept dot-prefixed names.",
    });
  }
}

export class NotReadableError extends PathValidationError {
  constructor(path: string, cause?: unknown) {
    super(path, "the path is not readable", ErrorKind.NOT_READABLE, { cause });
  }
}

export class NotWritableError extends PathValidationError {
  constructor(path: string, cause?: unknown) {
    super(path, "the path is not writable", ErrorKind.NOT_WRITABLE, { cause });
  }
}

/**
 * Error thrown when the OS denies an operation on a path.
 */
export class PermissionDeniedError extends PathValidationError {
  constructor(path: string, operation: string, cause?: unknown) {
    super(path, `permission denied: cannot ${operation}`, ErrorKind.PERMISSION_DENIED, {
      details: { operation },
      suggestion: "Ensure you have the necessary permissions on the path and its parent.",
      cause,
    });
  }
}

/**
 * Error thrown when creation is blocked by an existing entry.
 */
export class AlreadyExistsError extends PathValidationError {
  constructor(path: string, reason = "the path already exists", cause?: unknown) {
    super(path, reason, ErrorKind.ALREADY_EXISTS, {
      suggestion: "Choose a different path or remove the existing entry first.",
      cause,
    });
  }
}

/**
 * Error thrown when a file operation is attempted on a directory.
 */
export class IsADirectoryError extends PathValidationError {
  constructor(path: string, cause?: unknown) {
    super(path, "the path is a directory", ErrorKind.IS_A_DIRECTORY, { cause });
  }
}

/**
 * Error thrown when file bytes cannot be decoded with the requested encoding.
 */
export class DecodeError extends PathValidationError {
  constructor(path: string, encoding: string, cause?: unknown) {
    super(path, `failed to decode the content as ${encoding}`, ErrorKind.DECODE_ERROR, {
      details: { encoding },
      suggestion: "Read the file with asBytes: true or pass the encoding it was written with.",
      cause,
    });
  }
}

export class DirectoryCreateFailedError extends PathValidationError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(path, `failed to create the directory: ${reason}`, ErrorKind.DIRECTORY_CREATE_FAILED, {
      cause,
    });
  }
}

export class TempFileCreateFailedError extends PathValidationError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(path, `failed to create the temporary file: ${reason}`, ErrorKind.TEMP_FILE_CREATE_FAILED, {
      cause,
    });
  }
}

/**
 * Generic path failure for OS errors with no closer kind.
 */
export class OperationFailedError extends PathValidationError {
  constructor(path: string, operation: string, reason: string, cause?: unknown) {
    super(path, `${operation} failed: ${reason}`, ErrorKind.OPERATION_FAILED, {
      details: { operation },
      suggestion: "Check the logs for more details or retry the operation.",
      cause,
    });
  }
}

/**
 * Short type name for error details (constructor name for objects)
 */
export function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}
