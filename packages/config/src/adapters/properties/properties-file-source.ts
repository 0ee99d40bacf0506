import fs from "node:fs/promises"
import { getProperties } from "properties-file"
import { candidatePaths } from "../../core/config-location"
import { ConfigResourceError } from "../../core/errors"
import type { ConfigLocation } from "../../ports/location"
import type { ConfigSource } from "../../ports/source"

export type PropertiesFileSourceOptions = {
  /** File name, looked up in `location`. @example "devices-app.properties" */
  fileName: string

  location: ConfigLocation

  /**
   * Whether the file must exist.
   *
   * - `true`: `load()` throws `ConfigResourceError` if it is not found.
   * - `false`: a missing file loads as no values.
   */
  required: boolean
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR")
}

/**
 * Reads a `.properties` file.
 *
 * Keys and values are separated by `=`, `:` or whitespace. Lines starting with
 * `#` or `!` are comments; a `#` after a value is part of the value. Backslash
 * escapes and line continuations are applied, quotes are kept.
 */
export class PropertiesFileSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: PropertiesFileSourceOptions) {
    this.name = `properties:${opts.fileName}`
  }

  async load(): Promise<Record<string, string>> {
    const content = await this.read()
    return content === undefined ? {} : getProperties(content)
  }

  private async read(): Promise<string | undefined> {
    const candidates = candidatePaths(this.opts.location, this.opts.fileName)

    for (const path of candidates) {
      try {
        return await fs.readFile(path, "utf-8")
      } catch (err) {
        if (isNotFound(err)) continue
        throw ConfigResourceError.unreadable(this.opts.fileName, path, err)
      }
    }

    if (this.opts.required) throw ConfigResourceError.missing(this.opts.fileName, candidates)
    return undefined
  }
}
