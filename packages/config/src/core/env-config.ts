import type { EnvConfig } from "../ports/env-config"
import type { PropertyKey, PropertyKeySet } from "../ports/property-key"
import { ConfigValueParseError } from "./errors"

/** Everything one reload produced. Replaced as a whole, never mutated. */
export type ConfigSnapshot = Readonly<{
  values: ReadonlyMap<string, string>
  provenance: ReadonlyMap<string, string>
  sourcesUsed: readonly string[]
  unknownKeys: readonly string[]
}>

export const EMPTY_SNAPSHOT: ConfigSnapshot = {
  values: new Map(),
  provenance: new Map(),
  sourcesUsed: [],
  unknownKeys: [],
}

const INTEGER_PATTERN = /^[+-]?\d+$/
const INT_MIN = -(2 ** 31)
const INT_MAX = 2 ** 31 - 1
const LONG_MIN = -(2n ** 63n)
const LONG_MAX = 2n ** 63n - 1n

export function maskSecured(value: string): string {
  return Array.from(value, (ch, i) => (i % 2 === 0 ? "#" : ch)).join("")
}

export class EnvConfigView<K extends string> implements EnvConfig<K> {
  private snapshot: ConfigSnapshot = EMPTY_SNAPSHOT
  private readonly ids: readonly K[]

  constructor(private readonly keys: PropertyKeySet<K>) {
    this.ids = Object.keys(keys).filter((id): id is K => Object.hasOwn(keys, id))
  }

  /** Swaps in the result of a reload. */
  replace(next: ConfigSnapshot): void {
    this.snapshot = next
  }

  propertyKeys(): readonly K[] {
    return this.ids
  }

  propertyKey(key: K): PropertyKey {
    return this.keys[key]
  }

  getString(key: K): string | undefined {
    const property = this.keys[key]
    return this.snapshot.values.get(property.nameInFile) ?? property.defaultValue
  }

  getBoolean(key: K): boolean | undefined {
    const value = this.getString(key)
    if (value === undefined) return undefined

    switch (value.toLowerCase()) {
      case "true":
        return true
      case "false":
        return false
      default:
        throw new ConfigValueParseError(this.keys[key].nameInFile, "boolean")
    }
  }

  getInteger(key: K): number | undefined {
    const value = this.getString(key)
    if (value === undefined) return undefined

    const parsed = INTEGER_PATTERN.test(value) ? Number(value) : Number.NaN
    if (!Number.isSafeInteger(parsed) || parsed < INT_MIN || parsed > INT_MAX) {
      throw new ConfigValueParseError(this.keys[key].nameInFile, "integer")
    }
    return parsed
  }

  getLong(key: K): bigint | undefined {
    const value = this.getString(key)
    if (value === undefined) return undefined

    const parsed = INTEGER_PATTERN.test(value) ? BigInt(value) : undefined
    if (parsed === undefined || parsed < LONG_MIN || parsed > LONG_MAX) {
      throw new ConfigValueParseError(this.keys[key].nameInFile, "long")
    }
    return parsed
  }

  getValueForDisplay(key: K): string | undefined {
    const value = this.getString(key)
    if (this.keys[key].visibility !== "SECURED" || !value) return value
    return maskSecured(value)
  }

  getValuesForDisplay(): Map<string, string> {
    const entries: Array<[string, string]> = []

    for (const id of this.ids) {
      const display = this.getValueForDisplay(id)
      if (display === undefined) continue
      entries.push([this.keys[id].nameInFile, display])
    }

    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    return new Map(entries)
  }

  explain(key: K): string {
    const property = this.keys[key]
    const source = this.snapshot.provenance.get(property.nameInFile)
    if (source !== undefined) return source
    return property.defaultValue === undefined ? "unset" : "default"
  }

  sourcesUsed(): string[] {
    return [...this.snapshot.sourcesUsed]
  }

  unknownKeys(): string[] {
    return [...this.snapshot.unknownKeys]
  }
}
