export {
  type ConcurrencyBackend,
  type ConcurrencyBackendName,
  cooperativeBackend,
  type JoinHandle,
  resolveConcurrencyBackend,
} from "./concurrency.ts";
export {
  CollectionCoordinator,
  type CollectionCoordinatorOptions,
  type CollectionResult,
  type CoordinatorState,
} from "./coordinator.ts";
export { TransferExecutor, type TransferExecutorOptions } from "./executor.ts";
export { TaskQueue } from "./task-queue.ts";
export type { CollectionMode, TransferOperation, TransferOutcome, TransferTask } from "./types.ts";
export {
  assertValidWorkerCount,
  DEFAULT_WORKER_COUNT,
  WorkerPool,
  type WorkerPoolOptions,
  type WorkerPoolResult,
} from "./worker-pool.ts";
