/**
 * Deterministic JSON formatting utilities
 */

/**
 * Key ordering: "alpha" (code point order) or explicit array with alphabetical fallback
 */
export type KeyOrder = "alpha" | readonly string[];

function compareCodePoints(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Stable, deterministic JSON stringification with guaranteed key ordering
 * @param obj - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @param order - Key ordering: "alpha" or explicit array (default: "alpha")
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(obj: unknown, indent = 2, order: KeyOrder = "alpha"): string {
  const seen = new WeakSet<object>();

  const sorter = (a: string, b: string): number => {
    if (order === "alpha") {
      return compareCodePoints(a, b);
    }
    const aIndex = order.indexOf(a);
    const bIndex = order.indexOf(b);

    // If both in order array, use their positions
    if (aIndex !== -1 && bIndex !== -1) {
      return aIndex - bIndex;
    }
    // If only a is in order, it comes first
    if (aIndex !== -1) return -1;
    // If only b is in order, it comes first
    if (bIndex !== -1) return 1;
    return compareCodePoints(a, b);
  };

  const normalize = (value: unknown): unknown => {
    if (value && typeof value === "object") {
      // Detect cycles
      if (seen.has(value)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(value);

      try {
        // Arrays: preserve order but normalize contents
        if (Array.isArray(value)) {
          return value.map(normalize);
        }

        // Objects: sort keys and normalize values
        const entries = Object.entries(value).sort(([a], [b]) => sorter(a, b));
        const out: Record<string, unknown> = {};
        for (const [k, v] of entries) {
          // Plain assignment of "__proto__" would replace the prototype
          Object.defineProperty(out, k, {
            value: normalize(v),
            enumerable: true,
            writable: true,
            configurable: true,
          });
        }
        return out;
      } finally {
        seen.delete(value);
      }
    }
    return value;
  };

  return JSON.stringify(normalize(obj), null, indent) + "\n";
}

/**
 * Single-line canonical form, used as an identity key for structured values
 * @param value - JSON-compatible value
 */
export function canonicalKey(value: unknown): string {
  return stableStringify(value, 0, "alpha").trim();
}
