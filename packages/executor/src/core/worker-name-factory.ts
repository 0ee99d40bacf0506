import type { WorkerNameFactory } from "../ports/worker-name-factory"

export type WorkerNameFactoryOptions = Readonly<{
  /** Default: true */
  daemon?: boolean
}>

export function createWorkerNameFactory(
  prefix: string,
  options: WorkerNameFactoryOptions = {},
): WorkerNameFactory {
  let counter = 1

  return {
    prefix,
    daemon: options.daemon ?? true,
    next: () => `${prefix}-${counter++}`,
  }
}
