import { type Clock, SystemClock, type TimerHandle } from "@devicekit/clock"
import { type Logger, NullLogger } from "@devicekit/logger"
import { HandOffRejectedError, PoolShutdownError } from "../../core/errors"
import { parseExecutorOptions } from "../../core/parse-options"
import { createWorkerNameFactory } from "../../core/worker-name-factory"
import type { WorkerPoolOptions } from "../../ports/executor-options"
import type { Task, TaskOutcome, TaskReceipt } from "../../ports/task"
import type { WorkerNameFactory } from "../../ports/worker-name-factory"
import type { HandOffHooks, WorkerPool, WorkerPoolStats } from "../../ports/worker-pool"

export type InProcessWorkerPoolDeps = {
  clock?: Clock
  logger?: Logger
  /** Default: `createWorkerNameFactory(options.name, { daemon: options.daemon })` */
  names?: WorkerNameFactory
}

type Worker = {
  readonly name: string
  idleTimer: TimerHandle | undefined
  current: Promise<unknown> | undefined
}

/**
 * Worker pool whose workers are concurrent lanes on the event loop.
 *
 * Hand-off has no queue:
 * below `corePoolSize` a new worker always starts; otherwise an idle worker
 * takes the task; otherwise a new worker starts if the pool is below
 * `maxPoolSize`; otherwise the hand-off is rejected.
 *
 * A worker runs `afterExecute` as soon as its task settles but only becomes
 * idle on the next turn of the event loop.
 */
export class InProcessWorkerPool implements WorkerPool {
  readonly name: string
  readonly maxPoolSize: number

  private readonly corePoolSize: number
  private readonly keepAliveMs: number
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly names: WorkerNameFactory

  private readonly workers = new Set<Worker>()
  private readonly idle: Worker[] = []
  private readonly running = new Set<Promise<unknown>>()
  private largestPoolSize = 0
  private completedTasks = 0
  private isShutdown = false

  constructor(options: WorkerPoolOptions, deps: InProcessWorkerPoolDeps = {}) {
    const parsed = parseExecutorOptions(options)

    this.name = parsed.name
    this.corePoolSize = parsed.corePoolSize
    this.maxPoolSize = parsed.maxPoolSize
    this.keepAliveMs = parsed.keepAliveMs
    this.clock = deps.clock ?? new SystemClock()
    this.names = deps.names ?? createWorkerNameFactory(parsed.name, { daemon: parsed.daemon })
    this.logger = (deps.logger ?? new NullLogger()).child({
      module: "worker-pool",
      pool: parsed.name,
    })
  }

  handOff<T>(task: Task<T>, hooks: HandOffHooks<T>): TaskReceipt<T> {
    if (this.isShutdown) throw new PoolShutdownError(this.name)

    const worker = this.pickWorker()
    if (!worker) throw new HandOffRejectedError(this.name, this.workers.size)

    return { workerName: worker.name, outcome: this.run(worker, task, hooks) }
  }

  stats(): WorkerPoolStats {
    return {
      poolSize: this.workers.size,
      activeWorkers: this.workers.size - this.idle.length,
      idleWorkers: this.idle.length,
      largestPoolSize: this.largestPoolSize,
      completedTasks: this.completedTasks,
    }
  }

  async shutdown(): Promise<void> {
    if (!this.isShutdown) {
      this.isShutdown = true
      for (const worker of this.idle.splice(0)) this.retire(worker)
      this.logger.debug("Pool shutting down")
    }

    await Promise.all(this.running)
  }

  private pickWorker(): Worker | undefined {
    if (this.workers.size < this.corePoolSize) return this.startWorker()

    const idle = this.idle.pop()
    if (idle) {
      idle.idleTimer?.cancel()
      idle.idleTimer = undefined
      return idle
    }

    if (this.workers.size < this.maxPoolSize) return this.startWorker()

    return undefined
  }

  private startWorker(): Worker {
    const worker: Worker = { name: this.names.next(), idleTimer: undefined, current: undefined }

    this.workers.add(worker)
    this.largestPoolSize = Math.max(this.largestPoolSize, this.workers.size)
    this.logger.trace("Worker started", { worker: worker.name })

    return worker
  }

  private run<T>(worker: Worker, task: Task<T>, hooks: HandOffHooks<T>): Promise<TaskOutcome<T>> {
    const run = Promise.resolve()
      .then(task)
      .then(
        (value): TaskOutcome<T> => ({ ok: true, value }),
        (error: unknown): TaskOutcome<T> => ({ ok: false, error }),
      )
      .then((outcome) => {
        this.afterExecute(worker, hooks, outcome)
        return outcome
      })

    worker.current = run
    this.running.add(run)
    return run
  }

  private afterExecute<T>(worker: Worker, hooks: HandOffHooks<T>, outcome: TaskOutcome<T>): void {
    try {
      hooks.afterExecute(outcome)
    } catch (err) {
      this.logger.error("afterExecute hook failed", { worker: worker.name, err })
    }

    this.completedTasks++
    setImmediate(() => this.becomeIdle(worker))
  }

  private becomeIdle(worker: Worker): void {
    if (worker.current) this.running.delete(worker.current)
    worker.current = undefined

    if (this.isShutdown) {
      this.retire(worker)
      return
    }

    this.idle.push(worker)

    if (this.workers.size > this.corePoolSize) {
      worker.idleTimer = this.clock.schedule(this.keepAliveMs, () => this.expire(worker), {
        unref: this.names.daemon,
      })
    }
  }

  private expire(worker: Worker): void {
    worker.idleTimer = undefined
    if (this.workers.size <= this.corePoolSize) return

    const index = this.idle.indexOf(worker)
    if (index === -1) return

    this.idle.splice(index, 1)
    this.retire(worker)
  }

  private retire(worker: Worker): void {
    worker.idleTimer?.cancel()
    worker.idleTimer = undefined
    this.workers.delete(worker)
    this.logger.trace("Worker retired", { worker: worker.name })
  }
}
