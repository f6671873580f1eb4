/**
 * Indexes Example
 *
 * Demonstrates secondary index lookups and snapshot persistence.
 * Run with: npx tsx examples/with-indexes.ts
 */

import { loadTable, saveTable, Table } from "@rowstore/table";
import { rm } from "node:fs/promises";

async function main() {
  const dataDir = "./examples-data/indexes";
  await rm(dataDir, { recursive: true, force: true });

  const tasks = new Table(
    [
      { name: "id", type: "integer", primaryKey: true },
      { name: "status", type: "string", indexed: true },
      { name: "priority", type: "integer", indexed: true },
      { name: "tags", type: "tuple" },
    ],
    { name: "tasks" }
  );

  // Create sample data
  console.log("✏️  Creating sample data...");
  const statuses = ["open", "in-progress", "blocked", "closed"];
  for (let i = 1; i <= 100; i++) {
    tasks.addRow({
      id: i,
      status: statuses[i % statuses.length],
      priority: 5 + (i % 6),
      tags: Object.freeze(i % 2 === 0 ? ["even"] : ["odd"]),
    });
  }
  console.log(`✅ Created ${tasks.size} tasks\n`);

  // Index lookups return primary keys without scanning rows
  console.log("🔍 Looking up open tasks...");
  console.log(`✅ ${tasks.lookup("status", "open").length} open tasks`);

  console.log("🔍 Finding blocked tasks with priority 9...");
  const urgent = tasks.findRows({ status: "blocked", priority: 9 });
  console.log(`✅ ${urgent.length} matches: ${urgent.map((row) => row.id).join(", ")}\n`);

  // Updates move keys between buckets
  tasks.updateRow(4, { status: "closed" });
  console.log("📊 Stats:", tasks.stats());

  // Persist and restore
  const filePath = `${dataDir}/tasks.json`;
  console.log(`\n💾 Saving to ${filePath}...`);
  await saveTable(tasks, filePath);

  const restored = await loadTable(filePath);
  console.log(`✅ Restored ${restored.size} rows, ${restored.lookup("status", "closed").length} closed`);

  await rm(dataDir, { recursive: true, force: true });
}

main().catch((err) => {
  console.error("❌ Error:", err);
  process.exit(1);
});
