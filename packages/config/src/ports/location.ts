/**
 * Where the loader looks for properties files.
 *
 * - `resources`: each file is looked up in `roots` in order; the first root
 *   containing it wins. Files may be split across roots.
 * - `directory`: every file is read from `path`.
 */
export type ConfigLocation =
  | Readonly<{ kind: "resources"; roots: readonly string[] }>
  | Readonly<{ kind: "directory"; path: string }>
