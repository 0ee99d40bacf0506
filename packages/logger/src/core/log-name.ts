import { AsyncLocalStorage } from "node:async_hooks"

const scope = new AsyncLocalStorage<string>()

/**
 * Runs `fn` with `name` as the current log name. Everything `fn` logs,
 * including work it starts asynchronously, sees that name.
 *
 * An empty name clears the current one for the duration of `fn`.
 */
export function runWithLogName<T>(name: string, fn: () => T): T {
  return scope.run(name, fn)
}

/** The log name of the current async context, or `undefined`. */
export function currentLogName(): string | undefined {
  const name = scope.getStore()
  return name ? name : undefined
}
