import type { Milliseconds } from "@devicekit/clock"

export type WorkerPoolOptions = Readonly<{
  /** Workers kept alive even when idle. */
  corePoolSize: number

  /** Upper bound on workers; also the executor's admission limit. */
  maxPoolSize: number

  /** How long a worker beyond `corePoolSize` may stay idle before it retires. */
  keepAliveMs: Milliseconds

  /** Worker name prefix. Default: "executor" */
  name?: string

  /** Default: true */
  daemon?: boolean
}>

export type BoundedTaskExecutorOptions = WorkerPoolOptions &
  Readonly<{
    /**
     * Log a warning when a single submission has kept retrying its hand-off
     * for this long. Disabled when unset.
     */
    slowHandOffWarnMs?: Milliseconds
  }>
