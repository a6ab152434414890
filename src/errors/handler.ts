/**
 * Unified error handler for fastcollect
 *
 * This module provides consistent error handling across all commands.
 */

import { type AppContext, getGlobalContext } from "../context/index.ts";
import { DIM, RED, colorize } from "../utils/ansi.ts";
import { CANCELLED_MESSAGE, CollectError, ErrorSeverity, TransferAggregateError } from "./index.ts";

/**
 * Options for error handling
 */
export interface ErrorHandlerOptions {
  /** Whether to print verbose error details */
  verbose?: boolean;
  /** Whether to suppress output */
  quiet?: boolean;
}

/**
 * Handle an error and return appropriate exit code
 *
 * @param error The error to handle
 * @param options Handler options
 * @returns Exit code (0 for success, non-zero for errors)
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): number {
  const { verbose = false, quiet = false } = options;

  if (error instanceof CollectError) {
    return handleCollectError(error, { verbose, quiet });
  }

  // Errors are printed even in quiet mode
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.error(colorize(RED, `Error: ${errorMessage}`));

  if (verbose && error instanceof Error && error.stack) {
    console.error(colorize(DIM, `\nStack trace:\n${error.stack}`));
  }

  return 1;
}

/**
 * Handle a CollectError with appropriate output
 */
function handleCollectError(
  error: CollectError,
  options: { verbose: boolean; quiet: boolean },
): number {
  const { verbose, quiet } = options;

  // Info-level errors (cancellation) are silent unless they carry a custom message
  if (error.severity === ErrorSeverity.Info) {
    if (!quiet && error.message !== CANCELLED_MESSAGE) {
      console.error(error.message);
    }
    return error.exitCode;
  }

  console.error(colorize(RED, `Error: ${error.message}`));

  // Individual failures were already reported when the pool finished;
  // verbose mode repeats their causes with stacks.
  if (verbose && error instanceof TransferAggregateError) {
    for (const failure of error.errors) {
      const cause = failure.cause instanceof Error ? failure.cause.stack : undefined;
      console.error(colorize(DIM, `  ${failure.destinationPath}: ${cause ?? failure.message}`));
    }
  }

  if (verbose && error.stack) {
    console.error(colorize(DIM, `\nStack trace:\n${error.stack}`));
  }

  return error.exitCode;
}

/**
 * Wrap a command function with error handling
 *
 * This is a higher-order function that wraps any async command function
 * with consistent error handling and process exit.
 *
 * @param fn The command function to wrap
 * @param options Handler options
 * @param ctx Application context
 */
export function withErrorHandler<Args extends unknown[]>(
  fn: (...args: Args) => Promise<void>,
  options: ErrorHandlerOptions = {},
  ctx: AppContext = getGlobalContext(),
): (...args: Args) => Promise<void> {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const exitCode = handleError(error, options);
      const shouldExit = exitCode !== 0;
      if (shouldExit) {
        ctx.runtime.control.exit(exitCode);
      }
    }
  };
}
