/**
 * Counting semaphore for async callers.
 *
 * Waiters are served in FIFO order. A released permit goes straight to the
 * oldest waiter, so a newcomer calling `tryAcquire()` cannot take it first.
 */
export class Semaphore {
  private permits: number
  private readonly waiting: Array<() => void> = []

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 0) {
      throw new RangeError(`permits must be a non-negative integer, got ${permits}`)
    }
    this.permits = permits
  }

  /** Resolves once a permit is held. Never rejects. */
  acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--
      return Promise.resolve()
    }

    return new Promise<void>((resolve) => this.waiting.push(resolve))
  }

  tryAcquire(): boolean {
    if (this.permits > 0) {
      this.permits--
      return true
    }
    return false
  }

  release(): void {
    const next = this.waiting.shift()
    if (next) {
      next()
      return
    }
    this.permits++
  }

  get available(): number {
    return this.permits
  }

  get waitingCount(): number {
    return this.waiting.length
  }
}
