import path from "node:path"
import type { ConfigLocation } from "../ports/location"

/** Location value selecting resource lookup instead of a directory. */
export const RESOURCES_LOCATION = "classpath"

/** Resources rooted at `<cwd>/resources`. */
export function defaultConfigLocation(cwd: string = process.cwd()): ConfigLocation {
  return { kind: "resources", roots: [path.join(cwd, "resources")] }
}

/**
 * Maps a location setting (e.g. from a CLI flag or an environment variable)
 * to a {@link ConfigLocation}.
 *
 * `"classpath"` (any case) or an empty value selects resource lookup in
 * `roots`; anything else is a directory path.
 */
export function parseConfigLocation(
  value: string | undefined,
  options: { roots?: readonly string[]; cwd?: string } = {},
): ConfigLocation {
  const trimmed = value?.trim() ?? ""

  if (trimmed === "" || trimmed.toLowerCase() === RESOURCES_LOCATION) {
    return options.roots
      ? { kind: "resources", roots: options.roots }
      : defaultConfigLocation(options.cwd)
  }

  return { kind: "directory", path: path.resolve(options.cwd ?? process.cwd(), trimmed) }
}

/** Candidate paths for `fileName`, in lookup order. */
export function candidatePaths(location: ConfigLocation, fileName: string): string[] {
  if (location.kind === "directory") return [path.join(location.path, fileName)]

  return location.roots.map((root) => path.join(root, fileName))
}

export function describeConfigLocation(location: ConfigLocation): string {
  return location.kind === "directory" ? location.path : `resources:${location.roots.join(",")}`
}
