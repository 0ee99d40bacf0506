import type { Task, TaskOutcome, TaskReceipt } from "./task"

export interface HandOffHooks<T> {
  /**
   * Called once the task has settled, before the worker is available for
   * another task.
   */
  afterExecute(outcome: TaskOutcome<T>): void
}

export type WorkerPoolStats = Readonly<{
  poolSize: number
  activeWorkers: number
  idleWorkers: number
  largestPoolSize: number
  completedTasks: number
}>

/**
 * Fixed-bound pool of workers with direct hand-off: no internal queue.
 */
export interface WorkerPool {
  readonly name: string
  readonly maxPoolSize: number

  /**
   * Hands `task` to a worker or throws.
   *
   * @throws HandOffRejectedError (retryable) when every worker is busy.
   * @throws PoolShutdownError after `shutdown()`.
   */
  handOff<T>(task: Task<T>, hooks: HandOffHooks<T>): TaskReceipt<T>

  stats(): WorkerPoolStats

  /** Stops accepting work. Resolves once every accepted task has finished. */
  shutdown(): Promise<void>
}
