import type { EnvConfig } from "./env-config"

export interface EnvConfigLoader<K extends string> {
  /** Stable view; its contents change on each successful `reload()`. */
  readonly config: EnvConfig<K>

  /**
   * Re-reads every file and the environment, then swaps the view's values in
   * one step. On failure the previous values stay in place.
   */
  reload(): Promise<void>
}
