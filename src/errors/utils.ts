/**
 * Utility functions for error handling.
 * Provides helpers for error conversion, explicit results, and logging.
 */

import { FileGuardError } from "./base.js";
import {
  AlreadyExistsError,
  IsADirectoryError,
  OperationFailedError,
  PathNotFoundError,
  PermissionDeniedError,
  WrongKindError,
} from "./filesystem-errors.js";
import { getLogger } from "../utils/logger.js";

/**
 * Outcome of an operation, with the failure carried as a value.
 */
export type Result<T, E extends FileGuardError = FileGuardError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Narrow an unknown error to a Node.js system error.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/**
 * Convert a generic error to the closest FileGuardError kind.
 * Wraps Node.js fs errors; the original error is kept as the cause.
 */
export function toFileGuardError(
  error: unknown,
  operation: string,
  path: string
): FileGuardError {
  if (error instanceof FileGuardError) {
    return error;
  }

  if (isErrnoException(error)) {
    switch (error.code) {
      case "ENOENT":
        return new PathNotFoundError(path, "the path does not exist", error);

      case "EACCES":
      case "EPERM":
        return new PermissionDeniedError(path, operation, error);

      case "EEXIST":
        return new AlreadyExistsError(path, "the path already exists", error);

      case "ENOTDIR":
        return new WrongKindError(path, "a path component is not a directory", error);

      case "EISDIR":
        return new IsADirectoryError(path, error);

      default:
        return new OperationFailedError(path, operation, error.message, error);
    }
  }

  if (error instanceof Error) {
    return new OperationFailedError(path, operation, error.message, error);
  }

  return new OperationFailedError(path, operation, String(error));
}

/**
 * Log an error with full details.
 * User errors go to warn, OS-level failures to error.
 */
export function logError(error: FileGuardError, context?: Record<string, unknown>): void {
  const logger = getLogger();
  const logDetails = error.toLogDetails();

  const enrichedContext = {
    ...context,
    errorName: error.name,
    isUserError: error.isUserError(),
    ...logDetails,
  };

  if (error.isUserError()) {
    logger.warn(enrichedContext, `User error: ${logDetails.message}`);
  } else {
    logger.error(enrichedContext, `System error: ${logDetails.message}`);
  }
}

/**
 * Run an operation and re-throw any failure as a FileGuardError, without logging.
 * Used inside building blocks so raw fs errors never cross a module boundary.
 */
export async function guard<T>(
  operation: () => Promise<T>,
  operationName: string,
  path: string
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toFileGuardError(error, operationName, path);
  }
}

/**
 * Run an operation and return its outcome as a Result instead of throwing.
 */
export async function attempt<T>(
  operation: () => Promise<T>,
  operationName: string,
  path: string
): Promise<Result<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    return { ok: false, error: toFileGuardError(error, operationName, path) };
  }
}

/**
 * Unwrap a Result, throwing its error.
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Wrap a public operation with error handling.
 * Converts and logs errors, then re-throws them.
 */
export async function withErrorHandling<T>(
  operation: () => Promise<T>,
  operationName: string,
  context: { path: string } & Record<string, unknown>
): Promise<T> {
  const logger = getLogger();
  try {
    const result = await operation();
    logger.operation(operationName, context);
    return result;
  } catch (error) {
    const fsError = toFileGuardError(error, operationName, context.path);
    logError(fsError, { operation: operationName, ...context });
    throw fsError;
  }
}

/**
 * Safely get error message from unknown error type.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
