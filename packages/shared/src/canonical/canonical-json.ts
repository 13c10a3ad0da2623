/**
 * Canonical JSON stringification for structural comparison.
 * - Sorts object keys alphabetically
 * - Removes undefined values
 * - Uses consistent formatting (no extra whitespace)
 */
export function canonicalStringify(obj: unknown): string {
  return JSON.stringify(obj, (_, value: unknown) => {
    if (value === undefined) {
      return undefined; // Will be omitted
    }
    if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
      // Sort object keys
      const sorted: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        if (entry !== undefined) {
          sorted[key] = entry;
        }
      }
      return sorted;
    }
    return value;
  });
}

/**
 * True when both values serialize to the same canonical JSON.
 */
export function structurallyEqual(a: unknown, b: unknown): boolean {
  return canonicalStringify(a) === canonicalStringify(b);
}
