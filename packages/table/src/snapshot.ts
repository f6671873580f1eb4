/**
 * Snapshot (de)serialization
 *
 * Format:
 * {
 *   "columns": [{ "name", "data_type", "is_nullable", "is_primary_key",
 *                 "is_unique", "is_indexed", "has_default", "default_data"? }],
 *   "rows": [{ <column>: <encoded value> }],
 *   "row_order": [<encoded primary key>]
 * }
 *
 * Invariants:
 * - Rows are re-inserted through addRow, so constraint violations in stored
 *   data surface as the usual validation errors
 * - row_order is restored as recorded, after all rows are in
 */

import { z } from "zod";
import { Column } from "./column.js";
import { getDataType, type DataType } from "./datatypes.js";
import { SnapshotFormatError } from "./errors.js";
import { stableStringify } from "./format.js";
import { Table } from "./table.js";
import type {
  CellValue,
  ColumnDefinition,
  ColumnSnapshot,
  JsonValue,
  TableSnapshot,
} from "./types.js";

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const ColumnSnapshotSchema = z
  .object({
    name: z.string().min(1, "column name must be non-empty"),
    data_type: z.string(),
    is_nullable: z.boolean(),
    is_primary_key: z.boolean(),
    is_unique: z.boolean(),
    is_indexed: z.boolean(),
    has_default: z.boolean(),
    default_data: JsonValueSchema.optional(),
  })
  .superRefine((column, ctx) => {
    if (column.has_default && column.default_data === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["default_data"],
        message: "has_default is true but default_data is missing",
      });
    }
  });

export const TableSnapshotSchema = z.object({
  name: z.string().optional(),
  columns: z.array(ColumnSnapshotSchema),
  rows: z.array(z.record(z.string(), JsonValueSchema)),
  row_order: z.array(JsonValueSchema),
});

/**
 * Key order for snapshot JSON; unlisted keys (column names) follow alphabetically
 */
const SNAPSHOT_KEY_ORDER = [
  "name",
  "columns",
  "rows",
  "row_order",
  "data_type",
  "is_nullable",
  "is_primary_key",
  "is_unique",
  "is_indexed",
  "has_default",
  "default_data",
];

function encodeCell(type: DataType, value: CellValue): JsonValue {
  return value === null ? null : type.encode(value);
}

function decodeCell(type: DataType, json: JsonValue): CellValue {
  return json === null ? null : type.decode(json);
}

/**
 * Serialize a column's schema
 */
export function columnToSnapshot(column: Column): ColumnSnapshot {
  const snapshot: ColumnSnapshot = {
    name: column.name,
    data_type: column.type,
    is_nullable: column.nullable,
    is_primary_key: column.primaryKey,
    is_unique: column.unique,
    is_indexed: column.indexed,
    has_default: column.hasDefault,
  };
  if (column.hasDefault) {
    snapshot.default_data = encodeCell(column.dataType, column.defaultValue);
  }
  return snapshot;
}

/**
 * Rebuild a column from its serialized schema
 * @throws UnsupportedTypeError for an unknown data_type
 */
export function columnFromSnapshot(snapshot: ColumnSnapshot): Column {
  const dataType = getDataType(snapshot.data_type);
  const definition: ColumnDefinition = {
    name: snapshot.name,
    type: dataType.tag,
    nullable: snapshot.is_nullable,
    primaryKey: snapshot.is_primary_key,
    unique: snapshot.is_unique,
    indexed: snapshot.is_indexed,
  };
  if (snapshot.has_default && snapshot.default_data !== undefined) {
    definition.default = decodeCell(dataType, snapshot.default_data);
  }
  return new Column(definition);
}

/**
 * Capture a table's schema, rows and row order
 */
export function toSnapshot(table: Table): TableSnapshot {
  const columns = table.columns;
  const primary = table.primaryColumn;
  return {
    name: table.name,
    columns: columns.map(columnToSnapshot),
    rows: table
      .storedRows()
      .map((row) =>
        Object.fromEntries(
          columns.map((column) => [column.name, encodeCell(column.dataType, row[column.name])])
        )
      ),
    row_order: table.primaryKeys().map((key) => encodeCell(primary.dataType, key)),
  };
}

/**
 * Rebuild a table from a snapshot object
 * @throws SnapshotFormatError if the structure is invalid
 * @throws UnsupportedTypeError | SchemaError | validation errors from the stored data
 */
export function fromSnapshot(input: unknown): Table {
  const parsed = TableSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SnapshotFormatError(issues, { cause: parsed.error });
  }

  const snapshot = parsed.data;
  const table = new Table(snapshot.columns.map(columnFromSnapshot), { name: snapshot.name });
  const byName = new Map(table.columns.map((column) => [column.name, column]));

  for (const stored of snapshot.rows) {
    const values: Record<string, unknown> = {};
    for (const [name, json] of Object.entries(stored)) {
      const column = byName.get(name);
      // Unknown names pass through so addRow reports them
      values[name] = column ? decodeCell(column.dataType, json) : json;
    }
    table.addRow(values);
  }

  const primaryType = table.primaryColumn.dataType;
  table.setRowOrder(snapshot.row_order.map((json) => decodeCell(primaryType, json)));
  return table;
}

/**
 * Serialize a table to deterministic JSON text
 * @param indent - Spaces per indentation level (default: 2)
 */
export function serializeTable(table: Table, indent = 2): string {
  return stableStringify(toSnapshot(table), indent, SNAPSHOT_KEY_ORDER);
}

/**
 * Parse JSON text produced by serializeTable
 * @throws SnapshotFormatError if the text is not valid JSON or not a snapshot
 */
export function deserializeTable(text: string): Table {
  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (err) {
    throw new SnapshotFormatError("not valid JSON", { cause: err });
  }
  return fromSnapshot(input);
}
