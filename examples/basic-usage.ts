/**
 * Basic Usage Example
 *
 * Issues, scans and edits tickets, then saves and reloads the table.
 * Run with: npx tsx examples/basic-usage.ts
 */

import {
  createTable,
  decodeTicketId,
  encodeTicketId,
  loadTable,
  saveTable,
  EntryAlreadyExistsError,
} from "@ticketdesk/sdk";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";

async function main(): Promise<void> {
  // Setup: Create temporary data directory
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });
  await mkdir(dataDir, { recursive: true });
  const tablePath = join(dataDir, "tickets.yaml");

  console.log("📂 Creating table...");
  const table = createTable({ name: "Spring Ball" });

  // Issue tickets; names and class letters are canonicalised on the way in
  console.log("\n🎟️  Issuing tickets...");
  const john = table.insert({ firstName: "john", lastName: "o  doe", grade: 10, gradeCategory: "b" });
  const ana = table.insert({ firstName: "ANA", lastName: "pop", grade: 12, gradeCategory: "a" });
  console.log(`✅ ${encodeTicketId(john)}: ${table.get(john).firstName} ${table.get(john).lastName}`);
  console.log(`✅ ${encodeTicketId(ana)}: ${table.get(ana).firstName} ${table.get(ana).lastName}`);

  // The same person in the same class is refused
  try {
    table.insert({ firstName: "John", lastName: "O Doe", grade: 10, gradeCategory: "B" });
  } catch (err) {
    if (!(err instanceof EntryAlreadyExistsError)) {
      throw err;
    }
    console.log(`⚠️  Duplicate refused (existing ticket ${err.existingTicketId})`);
  }

  // Two-step issuing: reserve nothing, commit while the table is unchanged
  const candidate = table.generateTicketId();
  const eva = table.commit(candidate, { firstName: "eva", lastName: "ionescu", grade: 9, gradeCategory: "c" });
  console.log(`✅ ${encodeTicketId(eva)}: committed generated ID`);

  // Scan at the door
  console.log("\n🚪 Scanning...");
  table.rescan(john);
  const scanned = table.get(john).metadata;
  console.log(`✅ Scanned ${encodeTicketId(john)} (${scanned.scanCount}x, last ${scanned.lastScanDate})`);

  // Persist and reload
  console.log("\n💾 Saving...");
  await saveTable(table, tablePath);
  const reloaded = await loadTable(tablePath);
  console.log(`✅ Reloaded "${reloaded.name}" with ${reloaded.count()} tickets`);

  // Look up by the printed code
  const code = encodeTicketId(ana);
  console.log(`\n🔎 ${code} -> ${reloaded.get(decodeTicketId(code)).lastName}`);

  console.log("\n📊 Stats:");
  console.log(reloaded.stats());

  console.log("\n✨ Example completed successfully!");
}

main().catch((error: unknown) => {
  console.error("❌ Error:", error);
  process.exit(1);
});
