/**
 * Secondary (equality) index for one column
 *
 * Format: value key → bucket { value, primary keys holding it }
 *
 * Invariants:
 * - A bucket exists iff at least one row holds its value (no empty buckets)
 * - Within a bucket, primary keys keep insertion order
 * - Values and primary keys are compared by their column identity keys
 * - lookup() and entries() hand out copies, never the stored values
 */

import { MissingDataError } from "./errors.js";
import type { Column } from "./column.js";
import type { CellValue } from "./types.js";

interface Bucket {
  value: CellValue;
  /** primary key identity → primary key value */
  keys: Map<string, CellValue>;
}

/**
 * Maintains value → primary keys for an indexed column
 */
export class SecondaryIndex {
  #column: Column;
  #primary: Column;
  #buckets = new Map<string, Bucket>();

  /**
   * @param column - The indexed column
   * @param primary - The table's primary-key column
   */
  constructor(column: Column, primary: Column) {
    this.#column = column;
    this.#primary = primary;
  }

  /**
   * Name of the indexed column
   */
  get column(): string {
    return this.#column.name;
  }

  /**
   * Number of distinct values (buckets)
   */
  get size(): number {
    return this.#buckets.size;
  }

  /**
   * Register a primary key under a value, creating the bucket if new
   */
  add(value: CellValue, primaryKey: CellValue): void {
    const valueKey = this.#column.keyOf(value);
    let bucket = this.#buckets.get(valueKey);
    if (!bucket) {
      bucket = { value, keys: new Map() };
      this.#buckets.set(valueKey, bucket);
    }
    bucket.keys.set(this.#primary.keyOf(primaryKey), primaryKey);
  }

  /**
   * Unregister a primary key from a value, pruning the bucket once empty
   * @throws MissingDataError if the key is not registered under the value
   */
  remove(value: CellValue, primaryKey: CellValue): void {
    this.assertRegistered(value, primaryKey);
    const valueKey = this.#column.keyOf(value);
    const bucket = this.#buckets.get(valueKey);
    if (!bucket) return;
    bucket.keys.delete(this.#primary.keyOf(primaryKey));
    if (bucket.keys.size === 0) {
      this.#buckets.delete(valueKey);
    }
  }

  /**
   * Check that remove() would succeed, without mutating
   * @throws MissingDataError if the key is not registered under the value
   */
  assertRegistered(value: CellValue, primaryKey: CellValue): void {
    const bucket = this.#buckets.get(this.#column.keyOf(value));
    if (bucket?.keys.has(this.#primary.keyOf(primaryKey))) return;
    throw new MissingDataError(
      `Index on "${this.column}" has no entry for primary key ${this.#primary.format(primaryKey)} ` +
        `under value ${this.#column.format(value)}`
    );
  }

  /**
   * Move a primary key from one value's bucket to another's
   */
  move(oldValue: CellValue, newValue: CellValue, primaryKey: CellValue): void {
    this.remove(oldValue, primaryKey);
    this.add(newValue, primaryKey);
  }

  /**
   * Primary keys currently holding a value (empty if none)
   */
  lookup(value: CellValue): CellValue[] {
    const bucket = this.#buckets.get(this.#column.keyOf(value));
    return bucket ? Array.from(bucket.keys.values(), (key) => this.#primary.copy(key)) : [];
  }

  /**
   * Whether a bucket exists for a value
   */
  has(value: CellValue): boolean {
    return this.#buckets.has(this.#column.keyOf(value));
  }

  /**
   * All buckets as [value, primary keys] pairs, in bucket creation order
   */
  entries(): Array<[CellValue, CellValue[]]> {
    return Array.from(this.#buckets.values(), (bucket): [CellValue, CellValue[]] => [
      this.#column.copy(bucket.value),
      Array.from(bucket.keys.values(), (key) => this.#primary.copy(key)),
    ]);
  }
}
