/**
 * Text grid rendering
 */

import type { Table } from "./table.js";
import type { RenderStyle } from "./types.js";

interface GridStyle {
  /** Builds the horizontal rule from the total inner width */
  rule(widths: readonly number[]): string;
}

const CELL_OPEN = "| ";
const CELL_SEP = " | ";
const CELL_CLOSE = " |";

const sum = (values: readonly number[]): number => values.reduce((total, value) => total + value, 0);

const STYLES: Record<RenderStyle, GridStyle> = {
  simple: {
    rule: (widths) => ` ${"=".repeat(sum(widths) + CELL_SEP.length * widths.length - 1)} `,
  },
  sql: {
    rule: (widths) => `+-${"-".repeat(sum(widths) + CELL_SEP.length * widths.length - 3)}-+`,
  },
};

function line(cells: readonly string[], widths: readonly number[]): string {
  return CELL_OPEN + cells.map((cell, i) => cell.padEnd(widths[i])).join(CELL_SEP) + CELL_CLOSE;
}

/**
 * Render a table's rows (in row order) as a left-aligned text grid
 *
 * Each column is as wide as its header or its widest cell. A table without
 * rows renders its header between rules.
 *
 * @example
 * ```text
 * +----------+
 * | id | tag |
 * +----------+
 * | 1  | a   |
 * +----------+
 * ```
 */
export function renderTable(table: Table, style: RenderStyle = "sql"): string {
  const headers = table.columns.map((column) => column.name);
  const body = table
    .rows()
    .map((row) => table.columns.map((column) => column.format(row[column.name])));

  const widths = headers.map((header, i) =>
    body.reduce((width, cells) => Math.max(width, cells[i].length), header.length)
  );

  const rule = STYLES[style].rule(widths);
  return [rule, line(headers, widths), rule, ...body.map((cells) => line(cells, widths)), rule].join(
    "\n"
  );
}
