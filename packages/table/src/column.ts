/**
 * Table column: schema plus constraint enforcement
 *
 * Invariants:
 * - A primary-key column is never nullable, always unique and indexed
 * - The membership set of a unique column holds the key of every non-null
 *   value committed and not yet released; nulls never enter it
 * - validate() never mutates; commit()/release() are only called by the
 *   owning table after a whole row has validated
 * - Values going in (assertValid) and out (defaultValue, copy) are detached
 *   copies, so callers cannot change a stored value's key behind the column
 */

import {
  DefaultValueError,
  DuplicateValueError,
  InvalidTypeError,
  MissingDataError,
  NullValueError,
} from "./errors.js";
import {
  cellKey,
  cloneCell,
  describeValue,
  formatCell,
  getDataType,
  type DataType,
} from "./datatypes.js";
import type { CellValue, ColumnDefinition, DataTypeTag, ValidationResult } from "./types.js";

/**
 * A named, typed column with nullability, uniqueness, index and default settings
 *
 * @example
 * ```typescript
 * const id = new Column({ name: "id", type: "integer", primaryKey: true });
 * id.validate(1);    // { ok: true, value: 1 }
 * id.validate("1");  // { ok: false, error: InvalidTypeError }
 * ```
 */
export class Column {
  readonly name: string;
  readonly type: DataTypeTag;
  readonly nullable: boolean;
  readonly primaryKey: boolean;
  readonly unique: boolean;
  readonly indexed: boolean;
  readonly hasDefault: boolean;

  #dataType: DataType;
  #default: CellValue = null;
  #members = new Set<string>();

  /**
   * @throws UnsupportedTypeError if the type tag is not supported
   * @throws InvalidTypeError | NullValueError if the default is not a valid value
   */
  constructor(definition: ColumnDefinition) {
    this.name = definition.name;
    this.#dataType = getDataType(definition.type);
    this.type = this.#dataType.tag;

    // Primary keys override whatever flags the caller passed
    const primaryKey = definition.primaryKey ?? false;
    this.primaryKey = primaryKey;
    this.nullable = primaryKey ? false : (definition.nullable ?? false);
    this.unique = primaryKey ? true : (definition.unique ?? false);
    this.indexed = primaryKey ? true : (definition.indexed ?? false);

    this.hasDefault = definition.default !== undefined;
    if (definition.default !== undefined) {
      this.#default = this.assertValid(definition.default);
    }
  }

  /**
   * Semantic type of this column
   */
  get dataType(): DataType {
    return this.#dataType;
  }

  /**
   * Default value (a fresh copy on every read)
   * @throws DefaultValueError if the column has no default
   */
  get defaultValue(): CellValue {
    if (!this.hasDefault) {
      throw new DefaultValueError(this.name);
    }
    return this.copy(this.#default);
  }

  /**
   * Number of distinct values tracked for uniqueness
   */
  get uniqueCount(): number {
    return this.#members.size;
  }

  /**
   * Check a value against type, nullability and uniqueness without mutating
   */
  validate(value: unknown): ValidationResult {
    if (value === null) {
      if (!this.nullable) {
        return { ok: false, error: new NullValueError(this.name) };
      }
      return { ok: true, value };
    }

    if (!this.#dataType.is(value)) {
      return {
        ok: false,
        error: new InvalidTypeError(this.name, this.#dataType.description, describeValue(value)),
      };
    }

    if (this.unique && this.#members.has(this.keyOf(value))) {
      return {
        ok: false,
        error: new DuplicateValueError(this.name, JSON.stringify(this.format(value))),
      };
    }

    return { ok: true, value };
  }

  /**
   * Throwing form of validate()
   * @returns A detached copy of the value, narrowed to a cell value
   */
  assertValid(value: unknown): CellValue {
    const result = this.validate(value);
    if (!result.ok) {
      throw result.error;
    }
    return this.copy(result.value);
  }

  /**
   * Record a validated value in the membership set (unique columns only)
   */
  commit(value: CellValue): void {
    if (this.unique && value !== null) {
      this.#members.add(this.keyOf(value));
    }
  }

  /**
   * Remove a value from the membership set (unique columns only)
   * @throws MissingDataError if the value was never committed
   */
  release(value: CellValue): void {
    this.assertReleasable(value);
    if (this.unique && value !== null) {
      this.#members.delete(this.keyOf(value));
    }
  }

  /**
   * Check that release() would succeed, without mutating
   * @throws MissingDataError if a unique column does not hold the value
   */
  assertReleasable(value: CellValue): void {
    if (!this.unique || value === null || this.holds(value)) return;
    throw new MissingDataError(
      `Value ${JSON.stringify(this.format(value))} cannot be released: it is not present in column "${this.name}"`
    );
  }

  /**
   * Whether a value is currently held in the membership set
   */
  holds(value: CellValue): boolean {
    return value !== null && this.#members.has(this.keyOf(value));
  }

  /**
   * Identity key of a value in this column
   */
  keyOf(value: CellValue): string {
    return cellKey(this.#dataType, value);
  }

  /**
   * Detached copy of a value in this column
   */
  copy(value: CellValue): CellValue {
    return cloneCell(this.#dataType, value);
  }

  /**
   * Display string of a value in this column
   */
  format(value: CellValue): string {
    return formatCell(this.#dataType, value);
  }

  /**
   * Plain schema of this column (flags already normalised)
   */
  toDefinition(): ColumnDefinition {
    const definition: ColumnDefinition = {
      name: this.name,
      type: this.type,
      nullable: this.nullable,
      primaryKey: this.primaryKey,
      unique: this.unique,
      indexed: this.indexed,
    };
    if (this.hasDefault) {
      definition.default = this.copy(this.#default);
    }
    return definition;
  }

  /**
   * Fresh column with the same schema and empty membership
   */
  clone(): Column {
    return new Column(this.toDefinition());
  }

  /**
   * Multi-line description of the column's schema and state
   */
  describe(): string {
    const lines = [`<Column> ${this.name}`, `  type: ${this.type}`];
    lines.push(this.hasDefault ? `  default: ${this.format(this.#default)}` : "  default: (none)");
    lines.push(`  nullable: ${this.nullable}, unique: ${this.unique}`);
    lines.push(`  primaryKey: ${this.primaryKey}, indexed: ${this.indexed}`);
    if (this.unique) {
      lines.push(`  uniqueValues: ${this.#members.size}`);
    }
    return lines.join("\n");
  }
}
