import { type OutputOptions, warnLog } from "../../utils/output.ts";

/**
 * Handle to a set of spawned workers
 */
export interface JoinHandle {
  /**
   * Resolve once every worker has settled. When a worker rejected, rejects
   * with the first worker error after all others have settled too.
   */
  join(): Promise<void>;
}

export type ConcurrencyBackendName = "cooperative";

/**
 * Strategy for running N workers concurrently
 */
export interface ConcurrencyBackend {
  readonly name: ConcurrencyBackendName;
  spawn(count: number, worker: (workerId: number) => Promise<void>): JoinHandle;
}

/**
 * Workers are async functions interleaving on the event loop. Storage I/O
 * is non-blocking, so N workers keep up to N transfers in flight.
 */
export const cooperativeBackend: ConcurrencyBackend = {
  name: "cooperative",

  spawn(count: number, worker: (workerId: number) => Promise<void>): JoinHandle {
    // Start every worker before the first one can settle
    const running = Array.from({ length: count }, (_, workerId) => worker(workerId));
    const settled = Promise.allSettled(running);

    return {
      async join(): Promise<void> {
        const results = await settled;
        for (const result of results) {
          if (result.status === "rejected") {
            throw result.reason;
          }
        }
      },
    };
  },
};

export interface ConcurrencyBackendOptions {
  /** Request OS-process workers instead of cooperative ones */
  useMultiprocessing?: boolean;
}

/**
 * Pick the concurrency backend for a run.
 *
 * OS-process workers cannot share the in-process storage and source
 * handles, so a request for them falls back to cooperative workers.
 */
export function resolveConcurrencyBackend(
  options: ConcurrencyBackendOptions = {},
  output: OutputOptions = {},
): ConcurrencyBackend {
  if (options.useMultiprocessing) {
    warnLog("Warning: --use-multiprocessing is not supported; using cooperative workers.", output);
  }
  return cooperativeBackend;
}
