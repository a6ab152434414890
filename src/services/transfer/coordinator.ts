import { PostProcessError, type TransferError } from "../../errors/index.ts";
import { errorLog, log, logDryRun, type OutputOptions, verboseLog, warnLog } from "../../utils/output.ts";
import type { ProgressTracker } from "../../utils/progress.ts";
import type { Finder } from "../finder/types.ts";
import type { ModifiedFileRecord, StorageBackend } from "../storage/types.ts";
import type { ConcurrencyBackend } from "./concurrency.ts";
import { TransferExecutor } from "./executor.ts";
import { TaskQueue } from "./task-queue.ts";
import type { CollectionMode, TransferOperation, TransferTask } from "./types.ts";
import { DEFAULT_WORKER_COUNT, WorkerPool } from "./worker-pool.ts";

export type CoordinatorState =
  | "idle"
  | "discovering"
  | "sequential"
  | "parallel"
  | "post-processing"
  | "done";

export interface CollectionCoordinatorOptions {
  mode: CollectionMode;
  operation?: TransferOperation;
  /** Pool size in parallel mode */
  workerCount?: number;
  dryRun?: boolean;
  /** Delete every stored file before collecting */
  clear?: boolean;
  postProcess?: boolean;
  ignorePatterns?: string[];
  backend?: ConcurrencyBackend;
  output?: OutputOptions;
  tracker?: ProgressTracker;
  onStateChange?: (state: CoordinatorState, previous: CoordinatorState) => void;
}

interface ResolvedOptions {
  mode: CollectionMode;
  operation: TransferOperation;
  dryRun: boolean;
  clear: boolean;
  postProcess: boolean;
  ignorePatterns: string[];
}

export interface CollectionResult {
  mode: CollectionMode;
  /** Tasks enqueued (parallel) or transfers executed (sequential) */
  transferredCount: number;
  /** Transfer failures of a parallel run, in completion order */
  failures: TransferError[];
  /** Destinations skipped because they were not modified */
  unmodified: string[];
  /** Destinations removed by clear */
  deleted: string[];
  modifiedFiles: ModifiedFileRecord;
  postProcessed: string[];
  postProcessSkipped: string[];
  elapsedMs: number;
}

/**
 * Drives one collection run: discovery, transfers and post-processing.
 *
 * In sequential mode each found file is transferred inline and the first
 * failure aborts the run. In parallel mode discovery only fills a queue,
 * which a WorkerPool drains once discovery has finished.
 */
export class CollectionCoordinator {
  private currentState: CoordinatorState = "idle";
  private readonly options: ResolvedOptions;
  private readonly output: OutputOptions;
  private readonly executor: TransferExecutor;
  private readonly pool: WorkerPool | null;
  private readonly queue = new TaskQueue<TransferTask>();
  private transferPhase: string | null = null;

  // Destinations already handled in this sequential run
  private readonly handled = new Set<string>();

  constructor(
    private readonly finder: Finder,
    private readonly storage: StorageBackend,
    private readonly settings: CollectionCoordinatorOptions,
  ) {
    this.options = {
      mode: settings.mode,
      operation: settings.operation ?? "copy",
      dryRun: settings.dryRun ?? false,
      clear: settings.clear ?? false,
      postProcess: settings.postProcess ?? true,
      ignorePatterns: settings.ignorePatterns ?? [],
    };
    this.output = settings.output ?? {};
    this.executor = new TransferExecutor(storage, { dryRun: this.options.dryRun, output: this.output });

    // Built up front so an invalid worker count fails before any work
    this.pool =
      settings.mode === "parallel"
        ? new WorkerPool({
            workerCount: settings.workerCount ?? DEFAULT_WORKER_COUNT,
            backend: settings.backend,
            onTaskSettled: (outcome) => {
              if (this.transferPhase !== null) {
                settings.tracker?.advance(this.transferPhase, { failed: !outcome.ok });
              }
            },
          })
        : null;
  }

  get state(): CoordinatorState {
    return this.currentState;
  }

  private transition(next: CoordinatorState): void {
    const previous = this.currentState;
    this.currentState = next;
    this.settings.onStateChange?.(next, previous);
  }

  /**
   * Run the collection once.
   *
   * @throws TransferError on the first failed transfer in sequential mode
   * @throws PostProcessError when the storage reports a post-processing failure
   */
  async collect(): Promise<CollectionResult> {
    if (this.currentState !== "idle") {
      throw new Error(`Collection already started (state: ${this.currentState})`);
    }

    const startTime = Date.now();
    const modifiedFiles: ModifiedFileRecord = new Map();
    const result: CollectionResult = {
      mode: this.options.mode,
      transferredCount: 0,
      failures: [],
      unmodified: [],
      deleted: [],
      modifiedFiles,
      postProcessed: [],
      postProcessSkipped: [],
      elapsedMs: 0,
    };

    this.transition("discovering");

    if (this.options.clear) {
      result.deleted = await this.clearStorage();
    }

    if (this.options.mode === "sequential") {
      this.transition("sequential");
    }

    for await (const found of this.finder.list(this.options.ignorePatterns)) {
      const { destinationPath, source, sourcePath } = found;
      if (modifiedFiles.has(destinationPath)) {
        warnLog(
          `Found another file with the destination path '${destinationPath}'. ` +
            `'${source.path(sourcePath)}' replaces the earlier one.`,
          this.output,
        );
      }
      modifiedFiles.set(destinationPath, { source, sourcePath });

      const task: TransferTask = { operation: this.options.operation, sourcePath, destinationPath, source };

      if (this.pool !== null) {
        this.queue.put(task);
        result.transferredCount++;
        continue;
      }

      const shouldTransfer = await this.deleteStaleFile(task);
      this.handled.add(destinationPath);
      if (!shouldTransfer) {
        result.unmodified.push(destinationPath);
        continue;
      }

      const outcome = await this.executor.execute(task);
      if (!outcome.ok) {
        throw outcome.error;
      }
      result.transferredCount++;
    }

    if (this.pool !== null) {
      this.transition("parallel");
      result.failures = await this.runPool(this.pool);
    }

    this.transition("post-processing");
    await this.postProcess(modifiedFiles, result);

    this.transition("done");
    result.elapsedMs = Date.now() - startTime;
    return result;
  }

  /**
   * Make room for a transfer. Resolves false when the stored file is up to
   * date and the transfer should be skipped.
   *
   * Parallel runs overwrite unconditionally, so nothing is checked there.
   */
  async deleteStaleFile(task: TransferTask): Promise<boolean> {
    if (this.options.mode === "parallel") {
      return true;
    }

    const { destinationPath, source, sourcePath, operation } = task;
    if (!(await this.storage.exists(destinationPath))) {
      return true;
    }

    const isDuplicate = this.handled.has(destinationPath);
    if (!isDuplicate) {
      const [storedTime, sourceTime, isLink] = await Promise.all([
        this.storage.modifiedTime(destinationPath),
        source.modifiedTime(sourcePath),
        this.storage.isLink(destinationPath),
      ]);

      const isUpToDate = storedTime !== null && sourceTime !== null && storedTime >= sourceTime;
      const sameKind = isLink === (operation === "link");
      if (isUpToDate && sameKind) {
        verboseLog(`Skipping '${destinationPath}' (not modified)`, this.output);
        return false;
      }
    }

    if (this.options.dryRun) {
      logDryRun(`Pretending to delete '${destinationPath}'`, this.output);
    } else {
      verboseLog(`Deleting '${destinationPath}'`, this.output);
      await this.storage.delete(destinationPath);
    }
    return true;
  }

  private async clearStorage(): Promise<string[]> {
    const paths = await this.storage.listAll();
    for (const path of paths) {
      if (this.options.dryRun) {
        logDryRun(`Pretending to delete '${path}'`, this.output);
      } else {
        verboseLog(`Deleting '${path}'`, this.output);
        await this.storage.delete(path);
      }
    }
    return paths;
  }

  private async runPool(pool: WorkerPool): Promise<TransferError[]> {
    const tracker = this.settings.tracker;
    this.transferPhase = tracker?.addPhase("Transferring files", this.queue.size) ?? null;
    tracker?.start();

    let failures: TransferError[] = [];
    try {
      ({ failures } = await pool.run(this.queue, this.executor));
      if (tracker && this.transferPhase !== null) {
        tracker.completePhase(this.transferPhase);
      }
    } finally {
      tracker?.finish();
    }

    for (const failure of failures) {
      errorLog(failure.message);
    }
    return failures;
  }

  private async postProcess(files: ModifiedFileRecord, result: CollectionResult): Promise<void> {
    if (!this.options.postProcess || !this.storage.postProcess) {
      return;
    }

    const processor = this.storage.postProcess(files, { dryRun: this.options.dryRun });
    for await (const processed of processor) {
      switch (processed.kind) {
        case "processed":
          log(`Post-processed '${processed.originalPath}' as '${processed.processedPath}'`, this.output);
          result.postProcessed.push(processed.originalPath);
          break;
        case "skipped":
          verboseLog(`Skipped post-processing '${processed.originalPath}'`, this.output);
          result.postProcessSkipped.push(processed.originalPath);
          break;
        case "failed":
          errorLog(`Post-processing '${processed.originalPath}' failed!`);
          errorLog("");
          throw new PostProcessError(processed.originalPath, processed.error);
      }
    }
  }
}
