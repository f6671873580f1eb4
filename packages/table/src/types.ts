/**
 * Core types for rowstore tables
 */

import type { TableError } from "./errors.js";

/**
 * Any value JSON can carry
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Supported column type tags
 */
export type DataTypeTag =
  | "integer"
  | "float"
  | "string"
  | "list"
  | "tuple"
  | "mapping"
  | "boolean"
  | "null"
  | "datetime"
  | "date"
  | "time"
  | "decimal"
  | "bytes"
  | "bytearray"
  | "counter"
  | "ordered_mapping";

/**
 * A value stored in a table cell
 *
 * `date`, `time` and `decimal` columns hold strings; `counter` and
 * `ordered_mapping` columns hold Maps; binaries are `Uint8Array`s.
 */
export type CellValue =
  | JsonValue
  | readonly JsonValue[]
  | Date
  | Uint8Array
  | ReadonlyMap<string, JsonValue>;

/**
 * A row as seen by callers: column name → value
 */
export type Row = Record<string, CellValue>;

/**
 * Column schema, as passed to the Table constructor
 */
export interface ColumnDefinition {
  /** Column name, unique within a table */
  name: string;
  /** Declared type tag */
  type: DataTypeTag;
  /** Default used when a row omits the column and defaults are requested */
  default?: CellValue;
  /** Whether null is accepted (default: false) */
  nullable?: boolean;
  /** Marks the primary key; forces nullable=false, unique=true, indexed=true */
  primaryKey?: boolean;
  /** Whether values must be unique across rows (nulls exempt) */
  unique?: boolean;
  /** Whether the table keeps a value → primary keys index */
  indexed?: boolean;
}

/**
 * Outcome of validating one value against a column
 */
export type ValidationResult =
  | { ok: true; value: CellValue }
  | { ok: false; error: TableError };

/**
 * Grid style for rendering
 */
export type RenderStyle = "simple" | "sql";

/**
 * Table construction options
 */
export interface TableOptions {
  /** Name used in logs and snapshots (default: "table") */
  name?: string;
}

/**
 * Options for addRow
 */
export interface AddRowOptions {
  /** Fill omitted columns from their defaults instead of failing */
  useDefaults?: boolean;
}

/**
 * Value a sort key function may return
 */
export type SortKey = null | boolean | number | string | Date | readonly SortKey[];

/**
 * Options for sortRows
 */
export interface SortOptions {
  /** Sort descending; equal keys keep their relative order */
  reverse?: boolean;
}

/**
 * Row predicate used by filterRows
 */
export type RowPredicate = (row: Readonly<Row>) => boolean;

/**
 * Table statistics
 */
export interface TableStats {
  rows: number;
  columns: number;
  /** Bucket count per indexed non-primary column */
  indexes: Record<string, number>;
}

/**
 * Serialized column schema
 */
export interface ColumnSnapshot {
  name: string;
  data_type: string;
  is_nullable: boolean;
  is_primary_key: boolean;
  is_unique: boolean;
  is_indexed: boolean;
  has_default: boolean;
  default_data?: JsonValue;
}

/**
 * Serialized table: schema, rows and display order
 */
export interface TableSnapshot {
  name?: string;
  columns: ColumnSnapshot[];
  rows: Array<Record<string, JsonValue>>;
  row_order: JsonValue[];
}
