/**
 * Transforms each declared value after trimming, e.g. to decrypt secrets or
 * expand placeholders.
 */
export interface PropertyValueProcessor {
  processValue(nameInFile: string, value: string): string | Promise<string>
}
