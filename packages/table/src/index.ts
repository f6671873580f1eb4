/**
 * rowstore table
 *
 * Typed in-memory tables with a primary-key store, incrementally maintained
 * secondary indexes, explicit row order and JSON snapshots
 */

// Re-export types
export type {
  JsonValue,
  DataTypeTag,
  CellValue,
  Row,
  ColumnDefinition,
  ValidationResult,
  RenderStyle,
  TableOptions,
  AddRowOptions,
  SortKey,
  SortOptions,
  RowPredicate,
  TableStats,
  ColumnSnapshot,
  TableSnapshot,
} from "./types.js";

// Core
export { Column } from "./column.js";
export { Table } from "./table.js";
export { SecondaryIndex } from "./indexes.js";
export type { DataType } from "./datatypes.js";
export { DATA_TYPE_TAGS, getDataType, isDataTypeTag, isJsonValue } from "./datatypes.js";

// Utilities
export { stableStringify, canonicalKey } from "./format.js";
export { compareValues } from "./query.js";
export { renderTable } from "./render.js";
export { resolveConfig, isDebugEnabled, DEFAULT_CONFIG } from "./config.js";
export type { TableConfig } from "./config.js";
export { logger } from "./observability/logs.js";
export type { LogLevel, LogEntry } from "./observability/logs.js";

// Snapshots
export {
  toSnapshot,
  fromSnapshot,
  serializeTable,
  deserializeTable,
  columnToSnapshot,
  columnFromSnapshot,
} from "./snapshot.js";
export { saveTable, loadTable, readSnapshotFile, writeSnapshotFile } from "./io.js";
export type { SaveOptions } from "./io.js";

// Errors
export {
  TableError,
  UnsupportedTypeError,
  InvalidTypeError,
  NullValueError,
  DuplicateValueError,
  MissingDataError,
  DefaultValueError,
  SchemaError,
  SnapshotNotFoundError,
  SnapshotReadError,
  SnapshotWriteError,
  SnapshotFormatError,
  ConfigError,
} from "./errors.js";
