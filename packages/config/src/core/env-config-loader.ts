import { type Logger, NullLogger } from "@devicekit/logger"
import { EnvSource } from "../adapters/env/env-source"
import { PropertiesFileSource } from "../adapters/properties/properties-file-source"
import type { EnvConfig } from "../ports/env-config"
import type { EnvConfigLoader } from "../ports/env-config-loader"
import type { ConfigLocation } from "../ports/location"
import type { PropertyKeySet } from "../ports/property-key"
import type { ConfigSource } from "../ports/source"
import type { PropertyValueProcessor } from "../ports/value-processor"
import { defaultConfigLocation, describeConfigLocation } from "./config-location"
import { assertPropertyKeySet } from "./define-property-keys"
import { type ConfigSnapshot, EnvConfigView } from "./env-config"
import { ConfigDefinitionError } from "./errors"

export const GLOBAL_FILE_SUFFIX = ".properties"
export const APP_FILE_SUFFIX = "-app.properties"
export const TEST_FILE_SUFFIX = "-test.properties"

export type EnvConfigLoaderOptions = {
  /** Default: resources rooted at `<cwd>/resources` */
  location?: ConfigLocation
  valueProcessor?: PropertyValueProcessor
  /** Default: `process.env` */
  env?: Record<string, string | undefined>
  logger?: Logger
}

type Entry = { value: string; source: string }

/**
 * Creates a loader for `<prefix>.properties`, `<prefix>-app.properties` and
 * `<prefix>-test.properties`, and loads them once.
 *
 * Later files override earlier ones; an environment variable named exactly
 * like a loaded key overrides that key. Keys missing from `keys` are dropped.
 *
 * @throws ConfigDefinitionError for an invalid key set or a blank prefix.
 * @throws ConfigResourceError when `<prefix>.properties` cannot be read.
 */
export async function createEnvConfigLoader<K extends string>(
  keys: PropertyKeySet<K>,
  fileNamePrefix: string,
  options: EnvConfigLoaderOptions = {},
): Promise<EnvConfigLoader<K>> {
  const loader = new LayeredEnvConfigLoader(keys, fileNamePrefix, options)
  await loader.reload()
  return loader
}

class LayeredEnvConfigLoader<K extends string> implements EnvConfigLoader<K> {
  private readonly view: EnvConfigView<K>
  private readonly declared: ReadonlySet<string>
  private readonly files: readonly ConfigSource[]
  private readonly env: ConfigSource
  private readonly location: ConfigLocation
  private readonly logger: Logger

  constructor(
    keys: PropertyKeySet<K>,
    fileNamePrefix: string,
    private readonly options: EnvConfigLoaderOptions,
  ) {
    assertPropertyKeySet(keys)

    const prefix = fileNamePrefix.trim()
    if (!prefix) {
      throw new ConfigDefinitionError(
        `File name prefix must not be empty. Current value '${fileNamePrefix}'.`,
        { fileNamePrefix },
      )
    }

    this.location = options.location ?? defaultConfigLocation()
    this.view = new EnvConfigView(keys)
    this.declared = new Set(this.view.propertyKeys().map((id) => keys[id].nameInFile))
    this.files = [
      new PropertiesFileSource({
        fileName: prefix + GLOBAL_FILE_SUFFIX,
        location: this.location,
        required: true,
      }),
      new PropertiesFileSource({
        fileName: prefix + APP_FILE_SUFFIX,
        location: this.location,
        required: false,
      }),
      new PropertiesFileSource({
        fileName: prefix + TEST_FILE_SUFFIX,
        location: this.location,
        required: false,
      }),
    ]
    this.env = new EnvSource({ env: options.env })
    this.logger = (options.logger ?? new NullLogger()).child({ module: "config" })
  }

  get config(): EnvConfig<K> {
    return this.view
  }

  async reload(): Promise<void> {
    const merged = await this.loadFiles()
    await this.overrideWithEnvironment(merged)
    const next = await this.normalize(merged)

    this.view.replace(next)
    this.logger.info("Configuration loaded", {
      source: next.sourcesUsed.join(","),
      file: describeConfigLocation(this.location),
    })
  }

  private async loadFiles(): Promise<Map<string, Entry>> {
    const merged = new Map<string, Entry>()

    for (const source of this.files) {
      this.logger.debug("Looking for configuration file", { source: source.name })

      for (const [key, value] of Object.entries(await source.load())) {
        merged.set(key, { value, source: source.name })
      }
    }

    return merged
  }

  private async overrideWithEnvironment(merged: Map<string, Entry>): Promise<void> {
    const env = await this.env.load()

    for (const key of merged.keys()) {
      const value = env[key]
      if (value === undefined) continue

      this.logger.info("Overriding with environment variable", { key })
      merged.set(key, { value, source: this.env.name })
    }
  }

  private async normalize(merged: Map<string, Entry>): Promise<ConfigSnapshot> {
    const values = new Map<string, string>()
    const provenance = new Map<string, string>()
    const unknownKeys: string[] = []

    for (const [key, entry] of merged) {
      if (!this.declared.has(key)) {
        unknownKeys.push(key)
        this.logger.warn("Property is not declared and will be ignored", {
          key,
          source: entry.source,
        })
        continue
      }

      const trimmed = entry.value.trim()
      const value = this.options.valueProcessor
        ? await this.options.valueProcessor.processValue(key, trimmed)
        : trimmed

      values.set(key, value)
      provenance.set(key, entry.source)
    }

    const contributing = new Set(provenance.values())
    const order = [...this.files.map((f) => f.name), this.env.name]

    return {
      values,
      provenance,
      sourcesUsed: order.filter((name) => contributing.has(name)),
      unknownKeys,
    }
  }
}
