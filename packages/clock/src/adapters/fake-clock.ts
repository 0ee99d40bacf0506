import type { Clock, TimerHandle } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

type PendingTimer = {
  id: number
  dueAt: Milliseconds
  callback: () => void
}

/**
 * Virtual clock for tests.
 *
 * `sleep()` records the requested duration and advances virtual time by it,
 * firing any timers that fall due. Nothing ever waits on a real timer.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private nextTimerId = 1
  private timers: PendingTimer[] = []
  private readonly recordedSleeps: Milliseconds[] = []

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  /** Durations passed to `sleep()`, in call order. */
  get sleeps(): readonly Milliseconds[] {
    return this.recordedSleeps
  }

  /** Number of scheduled timers that have neither fired nor been cancelled. */
  get pendingTimers(): number {
    return this.timers.length
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  /** Moves time to `ms`, firing due timers in due order. */
  set(ms: Milliseconds): void {
    for (;;) {
      const next = this.nextDue(ms)
      if (!next) break

      this.timers = this.timers.filter((t) => t.id !== next.id)
      this.time = Math.max(this.time, next.dueAt)
      next.callback()
    }

    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.recordedSleeps.push(ms)
    if (ms > 0) this.advance(ms)
  }

  schedule(ms: Milliseconds, callback: () => void): TimerHandle {
    const timer: PendingTimer = {
      id: this.nextTimerId++,
      dueAt: this.time + Math.max(0, ms),
      callback,
    }
    this.timers.push(timer)

    return {
      cancel: () => {
        this.timers = this.timers.filter((t) => t.id !== timer.id)
      },
    }
  }

  private nextDue(until: Milliseconds): PendingTimer | undefined {
    let next: PendingTimer | undefined

    for (const t of this.timers) {
      if (t.dueAt > until) continue
      if (!next || t.dueAt < next.dueAt) next = t
    }

    return next
  }
}
