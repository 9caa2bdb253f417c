/**
 * Encode a value to a canonical JSON string.
 * - Object keys are sorted lexicographically
 * - Maps become arrays of [key, value] pairs in insertion order
 * - bigint becomes its decimal string
 * - `meta` keys are dropped when `includeMeta` is false
 * - Arrays preserve order
 */
export function encodeCanonical(node: unknown, options?: { includeMeta?: boolean }): string {
  const encoded = JSON.stringify(node, (key, value: unknown) => {
    if (options?.includeMeta === false && key === "meta") {
      return undefined;
    }

    if (typeof value === "bigint") {
      return value.toString();
    }

    if (value instanceof Map) {
      return Array.from(value.entries());
    }

    if (value && typeof value === "object" && !Array.isArray(value)) {
      const sorted: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
        sorted[k] = v;
      }
      return sorted;
    }

    return value;
  });
  return encoded ?? "null";
}

/** Structural equality through the canonical encoding. */
export function canonicalEquals(a: unknown, b: unknown, options?: { includeMeta?: boolean }): boolean {
  return encodeCanonical(a, options) === encodeCanonical(b, options);
}
