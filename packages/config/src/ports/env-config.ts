import type { PropertyKey } from "./property-key"

/**
 * Read-only, typed view of the properties declared in a key set.
 *
 * Accessors consult the loaded values first, then the declared default.
 * Typed accessors parse on every call and throw `ConfigValueParseError` for
 * a malformed value.
 */
export interface EnvConfig<K extends string> {
  /** Declared key identifiers, in declaration order. */
  propertyKeys(): readonly K[]

  propertyKey(key: K): PropertyKey

  getString(key: K): string | undefined

  /** `"true"` / `"false"`, case-insensitive. */
  getBoolean(key: K): boolean | undefined

  /** 32-bit signed integer. */
  getInteger(key: K): number | undefined

  /** 64-bit signed integer. */
  getLong(key: K): bigint | undefined

  /**
   * Value safe to print: for SECURED keys every even-indexed character is
   * replaced by `#` (`"password"` becomes `"#a#s#o#d"`).
   */
  getValueForDisplay(key: K): string | undefined

  /**
   * Display values by `nameInFile`, sorted by name. Keys with neither a
   * loaded value nor a default are left out.
   */
  getValuesForDisplay(): Map<string, string>

  /**
   * Which source provided the value: `"properties:<file>"`, `"env"`,
   * `"default"`, or `"unset"` when there is no value at all.
   */
  explain(key: K): string

  /** Sources that contributed at least one value, in precedence order. */
  sourcesUsed(): string[]

  /** Undeclared keys found (and dropped) by the last reload. */
  unknownKeys(): string[]
}
