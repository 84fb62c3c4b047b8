// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic_logging.ts: records a short engagement session and exports it.
 *
 * Shows how to:
 * - Create a logger for one engagement and operator
 * - Log actions with their results and authorizations
 * - Persist records to a storage sink
 * - Export the session as CSV
 *
 * Run: npx tsx examples/basic_logging.ts
 */

import { AuditLogger, MemoryStorage, exportRecords, verifyChain } from "../src/index.js";
import type { AuditRecord } from "../src/index.js";

async function main(): Promise<void> {
  console.log("=== Audit Chain: Basic Logging Example ===\n");

  const logger = new AuditLogger("eng-001", "op-alice");
  const storage = new MemoryStorage();

  const steps = [
    { action: "scan_hosts", result: { hosts: 5, open_ports: [22, 443] }, authorization: "approval-17", taskId: "task-3" },
    { action: "enumerate_services", result: { services: ["ssh", "https"] }, authorization: "approval-17", taskId: "task-3" },
    { action: "write_report", result: { pages: 4 }, authorization: "approval-18" },
  ];

  const records: AuditRecord[] = [];
  for (const step of steps) {
    const record = logger.log(step);
    await storage.append(record);
    records.push(record);
    console.log(`  #${record.sequence} ${record.action.padEnd(20)} result_hash=${record.result_hash}`);
  }

  const state = logger.state();
  console.log(`\nChain tip after ${state.sequence} records: ${state.chainTip}`);

  console.log(`Stored chain intact: ${verifyChain(await storage.all())}`);

  console.log("\nCSV export:");
  console.log(exportRecords(records, "csv"));
}

main().catch((error: unknown) => {
  console.error("Error:", error);
  process.exit(1);
});
