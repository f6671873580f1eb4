/**
 * Snapshot file I/O
 *
 * Writes go straight to the target file: there is no temp-file/rename step,
 * so a crash mid-write can leave a truncated snapshot behind.
 * Reads are UTF-8 only; missing files throw SnapshotNotFoundError.
 */

import { Buffer } from "node:buffer";
import * as fs from "node:fs/promises";
import { dirname } from "node:path";
import { resolveConfig } from "./config.js";
import { SnapshotNotFoundError, SnapshotReadError, SnapshotWriteError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { deserializeTable, serializeTable } from "./snapshot.js";
import type { Table } from "./table.js";

export interface SaveOptions {
  /** Spaces per indentation level (default: ROWSTORE_SNAPSHOT_INDENT or 2) */
  indent?: number;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Read a snapshot file
 * @returns File contents as UTF-8 string
 * @throws SnapshotNotFoundError if file doesn't exist
 * @throws SnapshotReadError for other read failures
 */
export async function readSnapshotFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      throw new SnapshotNotFoundError(filePath, { cause: err });
    }
    throw new SnapshotReadError(filePath, { cause: err });
  }
}

/**
 * Write a snapshot file, creating parent directories as needed
 * @throws SnapshotWriteError if the directory or file cannot be written
 */
export async function writeSnapshotFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.mkdir(dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");
  } catch (err) {
    throw new SnapshotWriteError(filePath, { cause: err });
  }
}

/**
 * Save a table snapshot as JSON
 * @param table - Table to save
 * @param filePath - Target file
 * @param options - Formatting options
 */
export async function saveTable(table: Table, filePath: string, options: SaveOptions = {}): Promise<void> {
  const indent = options.indent ?? resolveConfig().snapshotIndent;
  const content = serializeTable(table, indent);
  await writeSnapshotFile(filePath, content);

  logger.info("snapshot.save", {
    table: table.name,
    details: { path: filePath, rows: table.size, bytes: Buffer.byteLength(content) },
  });
}

/**
 * Load a table from a JSON snapshot
 * @throws SnapshotNotFoundError | SnapshotReadError | SnapshotFormatError
 * @throws UnsupportedTypeError | SchemaError | validation errors from the stored data
 */
export async function loadTable(filePath: string): Promise<Table> {
  const content = await readSnapshotFile(filePath);
  const table = deserializeTable(content);

  logger.info("snapshot.load", {
    table: table.name,
    details: { path: filePath, rows: table.size },
  });
  return table;
}
