import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Default: `process.env` */
  env?: Record<string, string | undefined>
}

/** Environment variables with a value, by their exact name. */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string>> {
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value !== undefined) values[key] = value
    }

    return values
  }
}
