/**
 * A source of raw property values.
 *
 * A source only loads. It does not validate, trim or merge; the loader does.
 */
export interface ConfigSource {
  /**
   * Human-readable name used for provenance.
   * Example: "env", "properties:devices.properties"
   */
  readonly name: string

  /** Flat key/value pairs. Each call returns a fresh object. */
  load(): Promise<Record<string, string>>
}
