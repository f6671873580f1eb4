/**
 * In-memory table with a primary-key row store and secondary indexes
 *
 * Invariants:
 * - Exactly one primary-key column
 * - Every unique column's membership set and every secondary index reflect
 *   exactly the rows in the store, after any call that returns normally
 * - addRow/updateRow/deleteRow validate everything before mutating anything:
 *   a call that throws leaves the table as it was
 * - Stored cells are owned by the table: values are copied on the way in and
 *   every row, key or index value handed out is a copy
 * - Row order lists every stored primary key; sorting only reorders it
 *
 * Not safe for concurrent use: callers must serialise mutating calls on one
 * instance. Every operation is synchronous.
 */

import { Column } from "./column.js";
import { resolveConfig } from "./config.js";
import { MissingDataError, SchemaError, TableError } from "./errors.js";
import { SecondaryIndex } from "./indexes.js";
import { logger } from "./observability/logs.js";
import { compareValues, sameValue } from "./query.js";
import { renderTable } from "./render.js";
import type {
  AddRowOptions,
  CellValue,
  ColumnDefinition,
  RenderStyle,
  Row,
  RowPredicate,
  SortKey,
  SortOptions,
  TableOptions,
  TableStats,
} from "./types.js";

/**
 * Stored row: cell values by column position
 */
type StoredRow = readonly CellValue[];

interface CellChange {
  position: number;
  before: CellValue;
  after: CellValue;
}

/**
 * Typed in-memory table
 *
 * @example
 * ```typescript
 * const table = new Table([
 *   { name: "id", type: "integer", primaryKey: true },
 *   { name: "tag", type: "string", indexed: true },
 * ]);
 *
 * table.addRow({ id: 1, tag: "a" });
 * table.addRow({ id: 2, tag: "a" });
 * table.lookup("tag", "a"); // [1, 2]
 * ```
 */
export class Table {
  readonly name: string;

  #columns: readonly Column[];
  #positions = new Map<string, number>();
  #primary: Column;
  #primaryPosition: number;
  /** primary key identity → row */
  #store = new Map<string, StoredRow>();
  /** column name → index, for indexed non-primary columns */
  #indexes = new Map<string, SecondaryIndex>();
  /** primary key identities in display order */
  #order: string[] = [];

  /**
   * @param columns - Column definitions (or columns to clone), in display order
   * @param options - Table options
   * @throws SchemaError unless exactly one column is a primary key and names are distinct
   */
  constructor(columns: ReadonlyArray<ColumnDefinition | Column>, options: TableOptions = {}) {
    this.name = options.name ?? "table";
    this.#columns = columns.map((column) =>
      column instanceof Column ? column.clone() : new Column(column)
    );

    this.#columns.forEach((column, position) => {
      if (this.#positions.has(column.name)) {
        throw new SchemaError(`Duplicate column name "${column.name}" in table "${this.name}"`);
      }
      this.#positions.set(column.name, position);
    });

    const primaries = this.#columns.filter((column) => column.primaryKey);
    if (primaries.length === 0) {
      throw new SchemaError(
        `No primary key column in table "${this.name}": exactly one column needs primaryKey: true`
      );
    }
    if (primaries.length > 1) {
      throw new SchemaError(
        `Table "${this.name}" has ${primaries.length} primary key columns ` +
          `(${primaries.map((column) => column.name).join(", ")}); exactly one is allowed`
      );
    }
    this.#primary = primaries[0];
    this.#primaryPosition = this.#columns.indexOf(this.#primary);

    for (const column of this.#columns) {
      if (column.indexed && !column.primaryKey) {
        this.#indexes.set(column.name, new SecondaryIndex(column, this.#primary));
      }
    }
  }

  /**
   * Columns in display order
   */
  get columns(): readonly Column[] {
    return this.#columns;
  }

  /**
   * The primary-key column
   */
  get primaryColumn(): Column {
    return this.#primary;
  }

  /**
   * Number of rows
   */
  get size(): number {
    return this.#store.size;
  }

  /**
   * Look up a column by name
   * @throws SchemaError if the table has no such column
   */
  column(name: string): Column {
    return this.#columns[this.#position(name)];
  }

  /**
   * Insert a row
   * @param values - Column name → value; every column must be present unless defaults are used
   * @param options - Set useDefaults to fill omitted columns from their defaults
   * @returns Snapshot of the stored row
   * @throws MissingDataError | InvalidTypeError | NullValueError | DuplicateValueError | SchemaError
   */
  addRow(values: Readonly<Record<string, unknown>>, options: AddRowOptions = {}): Row {
    let cells: StoredRow;
    try {
      this.#assertKnownColumns(values);
      cells = this.#columns.map((column) => {
        if (Object.hasOwn(values, column.name)) {
          return column.assertValid(values[column.name]);
        }
        if (options.useDefaults) {
          return column.defaultValue;
        }
        throw new MissingDataError(`Missing value for column "${column.name}"`);
      });
    } catch (err) {
      this.#logReject("add", err);
      throw err;
    }

    const primaryKey = cells[this.#primaryPosition];
    const identity = this.#primary.keyOf(primaryKey);

    this.#columns.forEach((column, position) => column.commit(cells[position]));
    for (const [name, index] of this.#indexes) {
      index.add(cells[this.#position(name)], primaryKey);
    }
    this.#order.push(identity);
    this.#store.set(identity, cells);

    logger.debug("table.row.add", {
      table: this.name,
      details: { primaryKey: this.#primary.format(primaryKey), rows: this.#store.size },
    });
    return this.#toRow(cells);
  }

  /**
   * Remove a row
   * @returns Snapshot of the removed row
   * @throws MissingDataError if no row has this primary key, or if a unique
   *   column or index no longer holds one of its values (nothing is removed)
   */
  deleteRow(primaryKey: unknown): Row {
    const identity = this.#identityOf(primaryKey);
    const cells = this.#store.get(identity);
    if (!cells) {
      throw this.#noSuchRow(primaryKey);
    }

    const key = cells[this.#primaryPosition];
    try {
      this.#columns.forEach((column, position) => column.assertReleasable(cells[position]));
      for (const [name, index] of this.#indexes) {
        index.assertRegistered(cells[this.#position(name)], key);
      }
    } catch (err) {
      this.#logReject("delete", err);
      throw err;
    }

    this.#columns.forEach((column, position) => column.release(cells[position]));
    for (const [name, index] of this.#indexes) {
      index.remove(cells[this.#position(name)], key);
    }
    this.#order = this.#order.filter((entry) => entry !== identity);
    this.#store.delete(identity);

    logger.debug("table.row.delete", {
      table: this.name,
      details: { primaryKey: this.#primary.format(key), rows: this.#store.size },
    });
    return this.#toRow(cells);
  }

  /**
   * Change some columns of a row; the primary key and row position stay fixed
   * @param primaryKey - Row to update
   * @param changes - Column name → new value; a primary-key entry is ignored
   * @returns Snapshot of the updated row
   * @throws MissingDataError | InvalidTypeError | NullValueError | DuplicateValueError | SchemaError
   */
  updateRow(primaryKey: unknown, changes: Readonly<Record<string, unknown>>): Row {
    const identity = this.#identityOf(primaryKey);
    const current = this.#store.get(identity);
    if (!current) {
      throw this.#noSuchRow(primaryKey);
    }

    const pending: CellChange[] = [];
    try {
      this.#assertKnownColumns(changes);
      this.#columns.forEach((column, position) => {
        if (column.primaryKey || !Object.hasOwn(changes, column.name)) return;
        const before = current[position];
        const candidate = changes[column.name];
        // Unchanged values skip validation: a unique column would otherwise collide with itself
        if (sameValue(column, before, candidate)) return;
        pending.push({ position, before, after: column.assertValid(candidate) });
      });
      for (const { position, before } of pending) {
        const column = this.#columns[position];
        column.assertReleasable(before);
        this.#indexes.get(column.name)?.assertRegistered(before, current[this.#primaryPosition]);
      }
    } catch (err) {
      this.#logReject("update", err);
      throw err;
    }

    const key = current[this.#primaryPosition];
    const next = [...current];
    for (const { position, before, after } of pending) {
      const column = this.#columns[position];
      column.release(before);
      column.commit(after);
      this.#indexes.get(column.name)?.move(before, after, key);
      next[position] = after;
    }
    this.#store.set(identity, next);

    logger.debug("table.row.update", {
      table: this.name,
      details: {
        primaryKey: this.#primary.format(key),
        changed: pending.map(({ position }) => this.#columns[position].name),
      },
    });
    return this.#toRow(next);
  }

  /**
   * Reorder rows by a key computed from each row (stable)
   * Storage and indexes are untouched.
   */
  sortRows(key: (row: Readonly<Row>) => SortKey, options: SortOptions = {}): void {
    const direction = options.reverse ? -1 : 1;
    const decorated = this.#order.map((identity) => ({
      identity,
      sortKey: key(this.#toRow(this.#storedAt(identity))),
    }));
    decorated.sort((a, b) => direction * compareValues(a.sortKey, b.sortKey));
    this.#order = decorated.map(({ identity }) => identity);

    logger.debug("table.sort", {
      table: this.name,
      details: { rows: this.#order.length, reverse: options.reverse ?? false },
    });
  }

  /**
   * Select rows matching a predicate, in row order
   * @returns A new table with cloned columns (default), or a list of row snapshots
   */
  filterRows(predicate: RowPredicate): Table;
  filterRows(predicate: RowPredicate, options: { output: "table" }): Table;
  filterRows(predicate: RowPredicate, options: { output: "list" }): Row[];
  filterRows(predicate: RowPredicate, options: { output?: "table" | "list" } = {}): Table | Row[] {
    const matched = this.rows().filter((row) => predicate(row));

    logger.debug("table.filter", {
      table: this.name,
      details: { scanned: this.#order.length, matched: matched.length },
    });

    if (options.output === "list") {
      return matched;
    }

    // Rows go back through addRow so the copy re-validates every constraint
    const filtered = new Table(this.#columns, { name: this.name });
    for (const row of matched) {
      filtered.addRow(row);
    }
    return filtered;
  }

  /**
   * Rows whose columns equal every given value, in row order
   * Uses a primary or secondary index when one of the columns has one.
   * @throws SchemaError for an unknown column name
   */
  findRows(criteria: Readonly<Record<string, unknown>>): Row[] {
    this.#assertKnownColumns(criteria);
    const entries = Object.entries(criteria).map(
      ([name, value]) => [this.#position(name), value] as const
    );

    let candidates: Set<string> | undefined;
    if (Object.hasOwn(criteria, this.#primary.name)) {
      const key = criteria[this.#primary.name];
      candidates = new Set(this.hasRow(key) ? [this.#identityOf(key)] : []);
    } else {
      const indexed = Object.keys(criteria).find((name) => this.#indexes.has(name));
      if (indexed !== undefined) {
        candidates = new Set(
          this.lookup(indexed, criteria[indexed]).map((key) => this.#primary.keyOf(key))
        );
      }
    }

    return this.#order
      .filter((identity) => candidates?.has(identity) ?? true)
      .map((identity) => this.#storedAt(identity))
      .filter((cells) =>
        entries.every(([position, value]) =>
          sameValue(this.#columns[position], cells[position], value)
        )
      )
      .map((cells) => this.#toRow(cells));
  }

  /**
   * Primary keys of rows holding a value in an indexed column
   * @throws SchemaError if the column is unknown or not indexed
   */
  lookup(columnName: string, value: unknown): CellValue[] {
    const column = this.column(columnName);
    if (column.primaryKey) {
      const cells = this.#store.get(this.#identityOf(value));
      return cells ? [column.copy(cells[this.#primaryPosition])] : [];
    }
    const index = this.#indexFor(columnName);
    if (value !== null && !column.dataType.is(value)) {
      return [];
    }
    return index.lookup(value);
  }

  /**
   * Whether the secondary index of a column has a bucket for a value
   * @throws SchemaError if the column has no secondary index
   */
  hasIndexBucket(columnName: string, value: unknown): boolean {
    const index = this.#indexFor(columnName);
    const column = this.column(columnName);
    return (value === null || column.dataType.is(value)) && index.has(value);
  }

  /**
   * Buckets of a secondary index as [value, primary keys] pairs
   * @throws SchemaError if the column has no secondary index
   */
  indexEntries(columnName: string): Array<[CellValue, CellValue[]]> {
    return this.#indexFor(columnName).entries();
  }

  /**
   * Snapshot of a row, or undefined if absent
   */
  getRow(primaryKey: unknown): Row | undefined {
    const cells = this.#store.get(this.#identityOf(primaryKey));
    return cells ? this.#toRow(cells) : undefined;
  }

  /**
   * Whether a row with this primary key exists
   */
  hasRow(primaryKey: unknown): boolean {
    return this.#store.has(this.#identityOf(primaryKey));
  }

  /**
   * Row snapshots in row order
   */
  rows(): Row[] {
    return this.#order.map((identity) => this.#toRow(this.#storedAt(identity)));
  }

  /**
   * Rows in storage (insertion) order, regardless of sorting
   */
  storedRows(): Row[] {
    return Array.from(this.#store.values(), (cells) => this.#toRow(cells));
  }

  /**
   * Primary keys in row order
   */
  primaryKeys(): CellValue[] {
    return this.#order.map((identity) =>
      this.#primary.copy(this.#storedAt(identity)[this.#primaryPosition])
    );
  }

  /**
   * Replace the row order with a recorded one, taken as-is
   * @throws MissingDataError if an entry names no stored row
   */
  setRowOrder(primaryKeys: readonly unknown[]): void {
    this.#order = primaryKeys.map((key) => {
      const identity = this.#identityOf(key);
      if (!this.#store.has(identity)) {
        throw this.#noSuchRow(key);
      }
      return identity;
    });
  }

  /**
   * Row count and bucket count per secondary index
   */
  stats(): TableStats {
    const indexes: Record<string, number> = {};
    for (const [name, index] of this.#indexes) {
      indexes[name] = index.size;
    }
    return { rows: this.#store.size, columns: this.#columns.length, indexes };
  }

  /**
   * Render rows as a text grid
   * @param style - Grid style (default: ROWSTORE_RENDER_STYLE or "sql")
   */
  render(style?: RenderStyle): string {
    return renderTable(this, style ?? resolveConfig().renderStyle);
  }

  /**
   * Multi-line dump of rows, indexes and columns, for debugging
   */
  describe(): string {
    const rule = "=".repeat(60);
    const lines = [rule, `Table "${this.name}" (${this.#store.size} rows)`, `Rows ${"-".repeat(30)}`];
    for (const identity of this.#order) {
      const cells = this.#storedAt(identity);
      const fields = this.#columns.map(
        (column, position) => `${column.name}=${column.format(cells[position])}`
      );
      lines.push(`  ${fields.join(", ")}`);
    }
    lines.push(`Indexes ${"-".repeat(30)}`);
    for (const [name, index] of this.#indexes) {
      const column = this.column(name);
      lines.push(`  ${name}:`);
      for (const [value, keys] of index.entries()) {
        const members = keys.map((key) => this.#primary.format(key)).join(", ");
        lines.push(`    ${column.format(value)} -> ${members}`);
      }
    }
    lines.push(`Columns ${"-".repeat(30)}`);
    for (const column of this.#columns) {
      lines.push(column.describe());
    }
    lines.push(rule);
    return lines.join("\n");
  }

  #position(name: string): number {
    const position = this.#positions.get(name);
    if (position === undefined) {
      throw new SchemaError(`Table "${this.name}" has no column "${name}"`);
    }
    return position;
  }

  #assertKnownColumns(values: Readonly<Record<string, unknown>>): void {
    for (const name of Object.keys(values)) {
      this.#position(name);
    }
  }

  #indexFor(columnName: string): SecondaryIndex {
    const index = this.#indexes.get(columnName);
    if (!index) {
      throw new SchemaError(
        `Column "${columnName}" of table "${this.name}" has no secondary index`
      );
    }
    return index;
  }

  /**
   * Identity of a candidate primary key; values of the wrong type get an
   * identity no stored row can have
   */
  #identityOf(primaryKey: unknown): string {
    if (primaryKey === null || !this.#primary.dataType.is(primaryKey)) {
      return "";
    }
    return this.#primary.keyOf(primaryKey);
  }

  #storedAt(identity: string): StoredRow {
    const cells = this.#store.get(identity);
    if (!cells) {
      throw new MissingDataError(`Row order of table "${this.name}" references a missing row`);
    }
    return cells;
  }

  #toRow(cells: StoredRow): Row {
    return Object.fromEntries(
      this.#columns.map((column, position) => [column.name, column.copy(cells[position])])
    );
  }

  #noSuchRow(primaryKey: unknown): MissingDataError {
    const display = this.#primary.dataType.is(primaryKey)
      ? this.#primary.format(primaryKey)
      : String(primaryKey);
    return new MissingDataError(`No row with primary key ${display} in table "${this.name}"`);
  }

  #logReject(operation: "add" | "update" | "delete", err: unknown): void {
    logger.debug("table.row.reject", {
      table: this.name,
      column: err instanceof TableError && "column" in err ? String(err.column) : undefined,
      message: err instanceof Error ? err.message : String(err),
      details: { operation, code: err instanceof TableError ? err.code : undefined },
    });
  }
}
