export type PropertyVisibility = "PUBLIC" | "SECURED"

/**
 * Metadata of one recognised configuration property.
 */
export type PropertyKey = Readonly<{
  /** Key as written in the properties files and the environment. */
  nameInFile: string

  /** Served when no source provides a value. */
  defaultValue?: string

  /** SECURED values are masked by the display accessors. */
  visibility: PropertyVisibility
}>

/**
 * Closed set of recognised properties, keyed by an identifier of your choice.
 *
 * @example
 * ```ts
 * const Keys = definePropertyKeys({
 *   brokerUrl: { nameInFile: "broker.url", visibility: "PUBLIC" },
 *   brokerPassword: { nameInFile: "broker.password", visibility: "SECURED" },
 * })
 * ```
 */
export type PropertyKeySet<K extends string = string> = Readonly<Record<K, PropertyKey>>
