import { ConfigurationError, type TransferError } from "../../errors/index.ts";
import { type ConcurrencyBackend, cooperativeBackend } from "./concurrency.ts";
import type { TransferExecutor } from "./executor.ts";
import type { TaskQueue } from "./task-queue.ts";
import type { TransferOutcome, TransferTask } from "./types.ts";

export const DEFAULT_WORKER_COUNT = 20;

export interface WorkerPoolOptions {
  workerCount: number;
  backend?: ConcurrencyBackend;
  /** Called when a worker picks up a task */
  onTaskStart?: (task: TransferTask, workerId: number) => void;
  /** Called when a task has been attempted, whatever the outcome */
  onTaskSettled?: (outcome: TransferOutcome, workerId: number) => void;
}

export interface WorkerPoolResult {
  attempted: number;
  succeeded: number;
  /** Failures in completion order */
  failures: TransferError[];
}

/**
 * Validate a worker count.
 *
 * @throws ConfigurationError unless count is a positive integer
 */
export function assertValidWorkerCount(count: number): void {
  const isValid = Number.isInteger(count) && count >= 1;
  if (!isValid) {
    throw new ConfigurationError(
      `Invalid worker count '${count}'. Must be a positive integer.`,
    );
  }
}

/**
 * Fixed-size pool draining a TaskQueue through a TransferExecutor.
 *
 * Each worker takes tasks until the queue is empty. A failed task does not
 * stop its worker; failures are collected and returned once every worker
 * has finished.
 */
export class WorkerPool {
  readonly workerCount: number;
  private readonly backend: ConcurrencyBackend;
  private readonly onTaskStart?: WorkerPoolOptions["onTaskStart"];
  private readonly onTaskSettled?: WorkerPoolOptions["onTaskSettled"];

  constructor(options: WorkerPoolOptions) {
    assertValidWorkerCount(options.workerCount);
    this.workerCount = options.workerCount;
    this.backend = options.backend ?? cooperativeBackend;
    this.onTaskStart = options.onTaskStart;
    this.onTaskSettled = options.onTaskSettled;
  }

  /**
   * Drain the queue. Resolves only after all workers have terminated, so
   * every queued task has been attempted exactly once.
   */
  async run(queue: TaskQueue<TransferTask>, executor: TransferExecutor): Promise<WorkerPoolResult> {
    const result: WorkerPoolResult = { attempted: 0, succeeded: 0, failures: [] };

    const worker = async (workerId: number): Promise<void> => {
      for (let task = queue.tryTake(); task !== undefined; task = queue.tryTake()) {
        this.onTaskStart?.(task, workerId);
        const outcome = await executor.execute(task);

        result.attempted++;
        if (outcome.ok) {
          result.succeeded++;
        } else {
          result.failures.push(outcome.error);
        }

        this.onTaskSettled?.(outcome, workerId);
      }
    };

    await this.backend.spawn(this.workerCount, worker).join();
    return result;
  }
}
