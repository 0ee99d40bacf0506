import { z } from "zod"
import type { PropertyKey } from "../ports/property-key"
import { ConfigDefinitionError } from "./errors"

const propertyKeySchema = z.object({
  nameInFile: z.string().trim().min(1),
  defaultValue: z.string().optional(),
  visibility: z.enum(["PUBLIC", "SECURED"]),
})

const propertyKeySetSchema = z
  .record(z.string(), propertyKeySchema)
  .refine((set) => Object.keys(set).length > 0, { message: "At least one key is required" })
  .superRefine((set, ctx) => {
    const seen = new Map<string, string>()

    for (const [id, key] of Object.entries(set)) {
      const other = seen.get(key.nameInFile)
      if (other !== undefined) {
        ctx.addIssue({
          code: "custom",
          message: `nameInFile "${key.nameInFile}" is used by both ${other} and ${id}`,
          path: [id, "nameInFile"],
        })
      }
      seen.set(key.nameInFile, id)
    }
  })

/**
 * Checks that every entry carries property metadata and that no two entries
 * share a `nameInFile`.
 *
 * @throws ConfigDefinitionError
 */
export function assertPropertyKeySet(keys: unknown): void {
  const result = propertyKeySetSchema.safeParse(keys)

  if (!result.success) {
    throw new ConfigDefinitionError(
      `Invalid property key set:\n${z.prettifyError(result.error)}`,
    )
  }
}

/**
 * Declares the properties a loader recognises. The result is frozen.
 *
 * @throws ConfigDefinitionError
 */
export function definePropertyKeys<D extends Record<string, PropertyKey>>(
  definitions: D,
): Readonly<D> {
  assertPropertyKeySet(definitions)

  for (const key of Object.values(definitions)) Object.freeze(key)
  return Object.freeze(definitions)
}
