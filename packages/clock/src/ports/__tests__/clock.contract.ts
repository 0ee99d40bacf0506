import { describe, expect, it } from "vitest"
import type { Clock } from "../clock"
import type { Milliseconds } from "../time"

export type ClockHarness<C extends Clock = Clock> = {
  name: string
  make: () => C
  /** Let `ms` of the clock's time pass. */
  elapse: (clock: C, ms: Milliseconds) => Promise<void>
}

export function describeClockContract<C extends Clock>(h: ClockHarness<C>) {
  describe(`${h.name} (Clock contract)`, () => {
    describe("TimeSource", () => {
      it("now() returns a Date", () => {
        const clock = h.make()

        expect(clock.now()).toBeInstanceOf(Date)
      })

      it("now() and nowMs() are consistent", () => {
        const clock = h.make()
        const date = clock.now()
        const ms = clock.nowMs()

        expect(Math.abs(date.getTime() - ms)).toBeLessThan(5)
      })
    })

    describe("Sleeper", () => {
      it("sleep() resolves", async () => {
        const clock = h.make()

        await expect(clock.sleep(0)).resolves.toBeUndefined()
      })

      it("sleep() resolves early when signal is already aborted", async () => {
        const clock = h.make()
        const ac = new AbortController()
        ac.abort()

        await expect(clock.sleep(10_000, ac.signal)).resolves.toBeUndefined()
      })
    })

    describe("Scheduler", () => {
      it("fires a scheduled callback once its delay has passed", async () => {
        const clock = h.make()
        let fired = 0

        clock.schedule(10, () => fired++, { unref: true })
        await h.elapse(clock, 30)

        expect(fired).toBe(1)
      })

      it("does not fire a cancelled callback", async () => {
        const clock = h.make()
        let fired = 0

        const handle = clock.schedule(10, () => fired++, { unref: true })
        handle.cancel()
        handle.cancel()
        await h.elapse(clock, 30)

        expect(fired).toBe(0)
      })
    })
  })
}
