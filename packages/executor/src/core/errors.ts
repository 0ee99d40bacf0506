import { BaseError } from "@devicekit/errors"

/** Every worker is busy. Transient: a worker may come free any moment. */
export class HandOffRejectedError extends BaseError<"hand_off_rejected"> {
  constructor(pool: string, poolSize: number) {
    super(`No idle worker in pool "${pool}" (size ${poolSize})`, {
      code: "hand_off_rejected",
      context: { pool, poolSize },
      isRetryable: true,
    })
  }
}

export class PoolShutdownError extends BaseError<"pool_shutdown"> {
  constructor(pool: string) {
    super(`Pool "${pool}" has been shut down`, {
      code: "pool_shutdown",
      context: { pool },
    })
  }
}
