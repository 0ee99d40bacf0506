import { Semaphore } from "../semaphore"

describe("Semaphore", () => {
  it("rejects invalid permit counts", () => {
    expect(() => new Semaphore(-1)).toThrow(RangeError)
    expect(() => new Semaphore(1.5)).toThrow(RangeError)
  })

  it("grants permits while available", async () => {
    const sem = new Semaphore(2)

    await sem.acquire()
    expect(sem.tryAcquire()).toBe(true)
    expect(sem.tryAcquire()).toBe(false)
    expect(sem.available).toBe(0)
  })

  it("queues waiters and serves them in FIFO order", async () => {
    const sem = new Semaphore(1)
    const order: string[] = []

    await sem.acquire()
    const first = sem.acquire().then(() => order.push("first"))
    const second = sem.acquire().then(() => order.push("second"))

    expect(sem.waitingCount).toBe(2)

    sem.release()
    await first
    sem.release()
    await second

    expect(order).toEqual(["first", "second"])
    expect(sem.available).toBe(0)
    expect(sem.waitingCount).toBe(0)
  })

  it("hands a released permit to a waiter, not to tryAcquire", async () => {
    const sem = new Semaphore(1)

    await sem.acquire()
    const waiter = sem.acquire()
    sem.release()

    expect(sem.tryAcquire()).toBe(false)
    await expect(waiter).resolves.toBeUndefined()
  })

  it("returns the permit to the pool when nobody waits", () => {
    const sem = new Semaphore(1)

    expect(sem.tryAcquire()).toBe(true)
    sem.release()

    expect(sem.available).toBe(1)
  })
})
