import type { Task, TaskReceipt } from "./task"
import type { WorkerPoolStats } from "./worker-pool"

export type ExecutorStats = WorkerPoolStats &
  Readonly<{
    maxConcurrency: number
    availablePermits: number
    waitingSubmitters: number
  }>

export interface BoundedTaskExecutor {
  /** Equal to the pool's maximum size. */
  readonly maxConcurrency: number

  /**
   * Waits for a free slot, then hands `task` to a worker.
   *
   * Resolves once the task is accepted, not when it completes; the task's
   * result is on the receipt's `outcome`. Rejects only when the pool refuses
   * the task for good (e.g. it has been shut down).
   */
  submit<T>(task: Task<T>): Promise<TaskReceipt<T>>

  stats(): ExecutorStats

  shutdown(): Promise<void>
}
