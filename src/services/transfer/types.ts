import type { TransferError } from "../../errors/index.ts";
import type { SourceLocation } from "../storage/types.ts";

/**
 * Transfer operation identifier
 */
export type TransferOperation = "copy" | "link";

/**
 * One unit of work for the worker pool
 */
export interface TransferTask {
  readonly operation: TransferOperation;
  /** Path of the file within its source location */
  readonly sourcePath: string;
  /** Path within the destination storage; the logical key of the file */
  readonly destinationPath: string;
  readonly source: SourceLocation;
}

/**
 * Result of executing a single task
 */
export type TransferOutcome =
  | { readonly ok: true; readonly task: TransferTask }
  | { readonly ok: false; readonly task: TransferTask; readonly error: TransferError };

/**
 * How the collector executes transfers
 */
export type CollectionMode = "sequential" | "parallel";
