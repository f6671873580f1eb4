/**
 * Row comparison and matching helpers
 */

import type { Column } from "./column.js";
import type { CellValue, SortKey } from "./types.js";

function isKeyList(value: SortKey): value is readonly SortKey[] {
  return Array.isArray(value);
}

/**
 * Type precedence for mixed-type comparison:
 * null < boolean < number < string < Date < list
 */
function rank(value: SortKey): number {
  if (value === null) return 0;
  if (typeof value === "boolean") return 1;
  if (typeof value === "number") return 2;
  if (typeof value === "string") return 3;
  if (value instanceof Date) return 4;
  return 5;
}

/**
 * Compare two sort keys
 * Lists compare element by element, shorter first on a tie
 * @returns negative, 0, or positive
 */
export function compareValues(a: SortKey, b: SortKey): number {
  const rankA = rank(a);
  const rankB = rank(b);
  if (rankA !== rankB) {
    return rankA - rankB;
  }

  if (typeof a === "number" && typeof b === "number") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  if (a !== null && b !== null && isKeyList(a) && isKeyList(b)) {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
      const cmp = compareValues(a[i], b[i]);
      if (cmp !== 0) return cmp;
    }
    return a.length - b.length;
  }
  return 0;
}

/**
 * Whether a candidate value equals a stored cell under the column's identity
 * Values of the wrong type never match.
 */
export function sameValue(column: Column, stored: CellValue, candidate: unknown): boolean {
  if (candidate === null || stored === null) {
    return candidate === stored;
  }
  if (!column.dataType.is(candidate)) {
    return false;
  }
  return column.keyOf(stored) === column.keyOf(candidate);
}
