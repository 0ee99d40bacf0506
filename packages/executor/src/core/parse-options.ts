import { z } from "zod"
import type { BoundedTaskExecutorOptions } from "../ports/executor-options"

const executorOptionsSchema = z
  .object({
    corePoolSize: z.number().int().min(0),
    maxPoolSize: z.number().int().min(1),
    keepAliveMs: z.number().min(0),
    name: z.string().trim().min(1).optional(),
    daemon: z.boolean().optional(),
    slowHandOffWarnMs: z.number().positive().optional(),
  })
  .refine((o) => o.maxPoolSize >= o.corePoolSize, {
    message: "maxPoolSize must not be less than corePoolSize",
    path: ["maxPoolSize"],
  })

export type ParsedExecutorOptions = Readonly<{
  corePoolSize: number
  maxPoolSize: number
  keepAliveMs: number
  name: string
  daemon: boolean
  slowHandOffWarnMs: number | undefined
}>

export const DEFAULT_POOL_NAME = "executor"

/**
 * Validates pool and executor sizes.
 *
 * @throws RangeError when a size is negative, not an integer, or
 * `maxPoolSize < corePoolSize`.
 */
export function parseExecutorOptions(options: BoundedTaskExecutorOptions): ParsedExecutorOptions {
  const result = executorOptionsSchema.safeParse(options)

  if (!result.success) {
    throw new RangeError(`Invalid executor options:\n${z.prettifyError(result.error)}`)
  }

  const o = result.data

  return {
    corePoolSize: o.corePoolSize,
    maxPoolSize: o.maxPoolSize,
    keepAliveMs: o.keepAliveMs,
    name: o.name ?? DEFAULT_POOL_NAME,
    daemon: o.daemon ?? true,
    slowHandOffWarnMs: o.slowHandOffWarnMs,
  }
}
