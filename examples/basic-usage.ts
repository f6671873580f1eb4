/**
 * Basic Usage Example
 *
 * Demonstrates row operations, sorting and filtering on a typed table.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { DuplicateValueError, Table } from "@rowstore/table";

function main() {
  console.log("📋 Creating table...");
  const tasks = new Table(
    [
      { name: "id", type: "integer", primaryKey: true },
      { name: "title", type: "string", unique: true },
      { name: "status", type: "string", default: "open" },
      { name: "priority", type: "integer", default: 5 },
      { name: "due", type: "date", nullable: true, default: null },
    ],
    { name: "tasks" }
  );

  // CREATE
  console.log("\n✏️  Adding rows...");
  tasks.addRow({ id: 1, title: "Write docs", status: "open", priority: 8, due: "2024-06-01" });
  tasks.addRow({ id: 2, title: "Fix login" }, { useDefaults: true });
  tasks.addRow({ id: 3, title: "Plan sprint", priority: 9 }, { useDefaults: true });
  console.log(`✅ ${tasks.size} rows`);

  // Constraints are checked before anything changes
  try {
    tasks.addRow({ id: 4, title: "Fix login" }, { useDefaults: true });
  } catch (err) {
    if (!(err instanceof DuplicateValueError)) throw err;
    console.log(`⚠️  Rejected: ${err.message}`);
  }

  // UPDATE
  console.log("\n✏️  Updating row 2...");
  const updated = tasks.updateRow(2, { status: "in-progress", priority: 7 });
  console.log(`✅ ${updated.title} is now ${updated.status}`);

  // SORT
  console.log("\n🔃 Sorting by priority, highest first...");
  tasks.sortRows((row) => (typeof row.priority === "number" ? row.priority : null), { reverse: true });
  console.log(tasks.render());

  // FILTER
  console.log("\n🔍 Open tasks:");
  const open = tasks.filterRows((row) => row.status === "open");
  console.log(open.render("simple"));

  // DELETE
  console.log("\n🗑️  Deleting row 1...");
  const removed = tasks.deleteRow(1);
  console.log(`✅ Removed "${removed.title}", ${tasks.size} rows left`);
}

main();
