export {
  InProcessWorkerPool,
  type InProcessWorkerPoolDeps,
} from "./adapters/in-process/in-process-worker-pool"
export {
  type BoundedTaskExecutorDeps,
  createBoundedTaskExecutor,
  IMMEDIATE_RETRIES,
  RETRY_SLEEP_MS,
} from "./core/bounded-task-executor"
export { HandOffRejectedError, PoolShutdownError } from "./core/errors"
export { Semaphore } from "./core/semaphore"
export { createWorkerNameFactory, type WorkerNameFactoryOptions } from "./core/worker-name-factory"
export type { BoundedTaskExecutor, ExecutorStats } from "./ports/bounded-task-executor"
export type { BoundedTaskExecutorOptions, WorkerPoolOptions } from "./ports/executor-options"
export type { Task, TaskOutcome, TaskReceipt } from "./ports/task"
export type { WorkerNameFactory } from "./ports/worker-name-factory"
export type { HandOffHooks, WorkerPool, WorkerPoolStats } from "./ports/worker-pool"
