import { setImmediate as nextTurn } from "node:timers/promises"
import { type Clock, SystemClock } from "@devicekit/clock"
import { isRetryableError } from "@devicekit/errors"
import { type Logger, NullLogger } from "@devicekit/logger"
import { InProcessWorkerPool } from "../adapters/in-process/in-process-worker-pool"
import type { BoundedTaskExecutor, ExecutorStats } from "../ports/bounded-task-executor"
import type { BoundedTaskExecutorOptions } from "../ports/executor-options"
import type { Task, TaskOutcome, TaskReceipt } from "../ports/task"
import type { WorkerPool } from "../ports/worker-pool"
import { parseExecutorOptions } from "./parse-options"
import { Semaphore } from "./semaphore"

/** Rejected hand-offs retried after a single event-loop turn. */
export const IMMEDIATE_RETRIES = 2

/** Pause before each retry past {@link IMMEDIATE_RETRIES}. */
export const RETRY_SLEEP_MS = 100

export type BoundedTaskExecutorDeps = {
  clock?: Clock
  logger?: Logger
  /** Default: an {@link InProcessWorkerPool} built from the same options. */
  pool?: WorkerPool
}

/**
 * Creates an executor that blocks `submit()` while `maxPoolSize` tasks are
 * in flight, instead of rejecting them.
 *
 * @throws RangeError for invalid sizes, or when `deps.pool` has a different
 * `maxPoolSize`.
 */
export function createBoundedTaskExecutor(
  options: BoundedTaskExecutorOptions,
  deps: BoundedTaskExecutorDeps = {},
): BoundedTaskExecutor {
  return new PermitBoundedExecutor(options, deps)
}

class PermitBoundedExecutor implements BoundedTaskExecutor {
  readonly maxConcurrency: number

  private readonly permits: Semaphore
  private readonly pool: WorkerPool
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly slowHandOffWarnMs: number | undefined

  constructor(options: BoundedTaskExecutorOptions, deps: BoundedTaskExecutorDeps) {
    const parsed = parseExecutorOptions(options)
    const logger = deps.logger ?? new NullLogger()

    this.clock = deps.clock ?? new SystemClock()
    this.pool = deps.pool ?? new InProcessWorkerPool(parsed, { clock: this.clock, logger })

    if (this.pool.maxPoolSize !== parsed.maxPoolSize) {
      throw new RangeError(
        `Pool maxPoolSize ${this.pool.maxPoolSize} does not match maxPoolSize ${parsed.maxPoolSize}`,
      )
    }

    this.maxConcurrency = parsed.maxPoolSize
    this.permits = new Semaphore(parsed.maxPoolSize)
    this.slowHandOffWarnMs = parsed.slowHandOffWarnMs
    this.logger = logger.child({ module: "executor", pool: this.pool.name })
  }

  async submit<T>(task: Task<T>): Promise<TaskReceipt<T>> {
    await this.permits.acquire()

    let released = false
    const release = () => {
      if (released) return
      released = true
      this.permits.release()
    }

    try {
      return await this.handOff(task, (outcome) => {
        release()
        if (!outcome.ok) this.logger.debug("Task failed", { err: outcome.error })
      })
    } catch (err) {
      release()
      throw err
    }
  }

  stats(): ExecutorStats {
    return {
      ...this.pool.stats(),
      maxConcurrency: this.maxConcurrency,
      availablePermits: this.permits.available,
      waitingSubmitters: this.permits.waitingCount,
    }
  }

  shutdown(): Promise<void> {
    return this.pool.shutdown()
  }

  /**
   * Retries a rejected hand-off until a worker takes the task. A permit is
   * held, so a worker is about to come free: the one whose task just
   * released it.
   */
  private async handOff<T>(
    task: Task<T>,
    afterExecute: (outcome: TaskOutcome<T>) => void,
  ): Promise<TaskReceipt<T>> {
    const startedAt = this.clock.nowMs()
    let retries = 0
    let warned = false

    for (;;) {
      try {
        return this.pool.handOff(task, { afterExecute })
      } catch (err) {
        if (!isRetryableError(err)) throw err
      }

      retries++

      const elapsedMs = this.clock.nowMs() - startedAt
      if (!warned && this.slowHandOffWarnMs !== undefined && elapsedMs >= this.slowHandOffWarnMs) {
        warned = true
        this.logger.warn("Hand-off still retrying", {
          attempt: retries,
          elapsedMs,
          availablePermits: this.permits.available,
        })
      }

      if (retries > IMMEDIATE_RETRIES) {
        await this.clock.sleep(RETRY_SLEEP_MS)
      } else {
        await nextTurn()
      }
    }
  }
}
