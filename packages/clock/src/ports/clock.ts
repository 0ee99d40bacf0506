import type { Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /** Delay execution for `ms` milliseconds. Resolves early if `signal` is aborted. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type TimerOptions = Readonly<{
  /**
   * When true the timer does not keep the process alive.
   * Default: false
   */
  unref?: boolean
}>

export interface TimerHandle {
  /** Idempotent. */
  cancel(): void
}

export interface Scheduler {
  /** Run `callback` once after `ms` milliseconds unless cancelled first. */
  schedule(ms: Milliseconds, callback: () => void, options?: TimerOptions): TimerHandle
}

export type Clock = TimeSource & Sleeper & Scheduler
