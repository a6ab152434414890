/**
 * Node.js errors implementation
 */

import type { RuntimeErrors } from "../types.ts";

/**
 * Error raised by the runtime when a path does not exist
 */
export class NotFoundError extends Error {
  readonly code = "ENOENT";
  override name = "NotFound";

  constructor(message?: string) {
    super(message ?? "No such file or directory");
  }
}

/**
 * Check whether an error carries one of the given Node.js system error codes
 */
function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  const isErrorWithCode = error instanceof Error && "code" in error;
  if (!isErrorWithCode) return false;
  return typeof error.code === "string" && codes.includes(error.code);
}

export const nodeErrors: RuntimeErrors = {
  NotFound: NotFoundError,

  isNotFound(error: unknown): boolean {
    return hasErrorCode(error, "ENOENT");
  },
};
