import { type Logger, NullLogger } from "@devicekit/logger"
import { PropertiesFileSource } from "../adapters/properties/properties-file-source"
import type { ConfigLocation } from "../ports/location"
import { defaultConfigLocation } from "./config-location"
import { ConfigResourceError } from "./errors"

export const BUILD_INFO_FILE = "buildInfo.properties"
export const NOT_DEFINED = "NOT DEFINED"

export type BuildInfo = Readonly<{
  sourcesVersion: string
  buildVersion: string
  buildTimestamp: string
  /** Any other entry of the file. */
  get(key: string): string | undefined
}>

export type LoadBuildInfoOptions = {
  /** Default: resources rooted at `<cwd>/resources` */
  location?: ConfigLocation
  logger?: Logger
}

/**
 * Reads `buildInfo.properties`. A missing or unreadable file is logged and
 * every field reads {@link NOT_DEFINED}.
 */
export async function loadBuildInfo(options: LoadBuildInfoOptions = {}): Promise<BuildInfo> {
  const logger = (options.logger ?? new NullLogger()).child({ module: "build-info" })
  const values = await readBuildInfo(options.location ?? defaultConfigLocation(), logger)

  return {
    sourcesVersion: values["sources.version"] ?? NOT_DEFINED,
    buildVersion: values["build.version"] ?? NOT_DEFINED,
    buildTimestamp: values["build.timestamp"] ?? NOT_DEFINED,
    get: (key) => values[key],
  }
}

async function readBuildInfo(
  location: ConfigLocation,
  logger: Logger,
): Promise<Record<string, string>> {
  const source = new PropertiesFileSource({ fileName: BUILD_INFO_FILE, location, required: true })

  try {
    return await source.load()
  } catch (err) {
    if (!(err instanceof ConfigResourceError)) throw err

    logger.warn(
      err.code === "config_resource_missing"
        ? "Build info file cannot be found"
        : "Build info file cannot be read",
      { file: BUILD_INFO_FILE, err },
    )
    return {}
  }
}
