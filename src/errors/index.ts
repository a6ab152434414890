/**
 * Unified error handling for fastcollect
 *
 * Error severity levels:
 * - Fatal: Unrecoverable errors that should stop execution
 * - Info: Informational messages (not truly errors)
 *
 * Exit codes:
 * - 0: Success
 * - 1: General error
 * - 2: Argument error
 * - 130: User cancelled (Ctrl+C or declined confirmation)
 */

export const CANCELLED_MESSAGE = "Operation cancelled";

export enum ErrorSeverity {
  Fatal = "fatal",
  Info = "info",
}

/**
 * Base class for all fastcollect errors
 */
export abstract class CollectError extends Error {
  abstract readonly severity: ErrorSeverity;
  abstract readonly exitCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * User cancelled the operation (e.g., Ctrl+C or declined confirmation)
 */
export class UserCancelledError extends CollectError {
  readonly severity = ErrorSeverity.Info;
  readonly exitCode = 130;

  constructor(message = CANCELLED_MESSAGE) {
    super(message);
  }
}

/**
 * Configuration error (config file parsing, invalid worker count,
 * conflicting options). Raised before any file is transferred.
 */
export class ConfigurationError extends CollectError {
  readonly severity = ErrorSeverity.Fatal;
  readonly exitCode = 1;
  readonly configPath?: string;

  constructor(message: string, configPath?: string) {
    super(configPath ? `${configPath}: ${message}` : message);
    this.configPath = configPath;
  }
}

/**
 * File system operation error
 */
export class FileSystemError extends CollectError {
  readonly severity = ErrorSeverity.Fatal;
  readonly exitCode = 1;
  readonly path: string;

  constructor(operation: string, path: string, cause?: Error) {
    const message = cause
      ? `Failed to ${operation} "${path}": ${cause.message}`
      : `Failed to ${operation} "${path}"`;
    super(message);
    this.path = path;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * A single copy or link operation failed.
 *
 * Fatal in sequential mode. In parallel mode it is collected by the worker
 * pool and reported once every queued task has been attempted.
 */
export class TransferError extends CollectError {
  readonly severity = ErrorSeverity.Fatal;
  readonly exitCode = 1;
  readonly operation: "copy" | "link";
  readonly destinationPath: string;

  constructor(operation: "copy" | "link", destinationPath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} '${destinationPath}': ${detail}`);
    this.operation = operation;
    this.destinationPath = destinationPath;
    this.cause = cause;
  }
}

/**
 * Every transfer failure of a parallel run, raised after post-processing
 * so the exit status reflects them.
 */
export class TransferAggregateError extends CollectError {
  readonly severity = ErrorSeverity.Fatal;
  readonly exitCode = 1;
  readonly errors: readonly TransferError[];

  constructor(errors: readonly TransferError[], attempted: number) {
    const noun = errors.length === 1 ? "file" : "files";
    super(`${errors.length} of ${attempted} static ${noun} failed to transfer`);
    this.errors = errors;
  }
}

/**
 * The storage backend reported a post-processing failure for one file.
 * Always fatal.
 */
export class PostProcessError extends CollectError {
  readonly severity = ErrorSeverity.Fatal;
  readonly exitCode = 1;
  readonly originalPath: string;

  constructor(originalPath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Post-processing '${originalPath}' failed: ${detail}`);
    this.originalPath = originalPath;
    this.cause = cause;
  }
}

/**
 * Command argument error
 */
export class ArgumentError extends CollectError {
  readonly severity = ErrorSeverity.Fatal;
  readonly exitCode = 2;
  readonly argument?: string;

  constructor(message: string, argument?: string) {
    super(message);
    this.argument = argument;
  }
}
