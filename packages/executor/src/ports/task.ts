/** A unit of work. May be synchronous or return a promise. */
export type Task<T = unknown> = () => T | PromiseLike<T>

export type TaskOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown }

/**
 * Proof that a task was accepted by a worker.
 *
 * `outcome` settles when the task finishes and never rejects: a task fault
 * is reported as `{ ok: false, error }`.
 */
export interface TaskReceipt<T> {
  readonly workerName: string
  readonly outcome: Promise<TaskOutcome<T>>
}
