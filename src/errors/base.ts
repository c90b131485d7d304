/**
 * Base error class for all fileguard errors.
 * Every failure carries an explicit kind so callers can branch on it
 * without inspecting messages or Node.js errno codes.
 */

export enum ErrorKind {
  // Input errors
  INVALID_INPUT_KIND = "InvalidInputKind",

  // Path validation errors
  NOT_FOUND = "NotFound",
  WRONG_KIND = "WrongKind",
  HIDDEN_REJECTED = "HiddenRejected",
  NOT_READABLE = "NotReadable",
  NOT_WRITABLE = "NotWritable",
  PERMISSION_DENIED = "PermissionDenied",
  ALREADY_EXISTS = "AlreadyExists",
  IS_A_DIRECTORY = "IsADirectory",
  DECODE_ERROR = "DecodeError",

  // Content sanitization errors
  UNSUPPORTED_TYPE = "UnsupportedType",
  INVALID_ENCODING = "InvalidEncoding",
  EMPTY_CONTENT = "EmptyContent",

  // Wrapped OS failures
  DIRECTORY_CREATE_FAILED = "DirectoryCreateFailed",
  TEMP_FILE_CREATE_FAILED = "TempFileCreateFailed",
  OPERATION_FAILED = "OperationFailed",
}

export interface ErrorDetails {
  kind: ErrorKind;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
  cause?: string;
  stack?: string;
}

export interface FileGuardErrorOptions {
  details?: Record<string, unknown>;
  suggestion?: string;
  cause?: unknown;
}

const SYSTEM_ERROR_KINDS: readonly ErrorKind[] = [
  ErrorKind.DIRECTORY_CREATE_FAILED,
  ErrorKind.TEMP_FILE_CREATE_FAILED,
  ErrorKind.OPERATION_FAILED,
];

/**
 * Base class for all fileguard errors.
 * Extends Error with a kind discriminant and structured metadata for logging.
 */
export class FileGuardError extends Error {
  public readonly kind: ErrorKind;
  public readonly details?: Record<string, unknown>;
  public readonly suggestion?: string;

  constructor(message: string, kind: ErrorKind, options?: FileGuardErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.kind = kind;
    this.details = options?.details;
    this.suggestion = options?.suggestion;

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Full error details for logging, including the cause's message
   */
  public toLogDetails(): ErrorDetails {
    return {
      kind: this.kind,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack,
    };
  }

  /**
   * Check if this is a caller mistake (bad input, policy violation) vs an OS failure
   */
  public isUserError(): boolean {
    return !SYSTEM_ERROR_KINDS.includes(this.kind);
  }
}
