// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * hash_chain_verification.ts: detects tampering in a stored audit chain.
 *
 * Shows how to:
 * - Write records to an NDJSON file and reopen it in a later session
 * - Continue the chain from the last stored record
 * - Verify the chain, then detect an edited and a deleted record
 *
 * Run: npx tsx examples/hash_chain_verification.ts
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { AuditLogger, FileStorage, verifyChainDetailed } from "../src/index.js";
import type { ChainVerificationResult } from "../src/index.js";

function printVerificationResult(result: ChainVerificationResult): void {
  if (result.valid) {
    console.log(`  VALID: ${result.recordCount} records verified`);
  } else {
    console.log(`  INVALID: chain broken at index ${result.brokenAt} (${result.failure})`);
    console.log(`  Reason: ${result.reason}`);
  }
}

async function main(): Promise<void> {
  console.log("=== Audit Chain: Hash Chain Verification Example ===\n");

  const directory = mkdtempSync(join(tmpdir(), "audit-chain-example-"));
  const filePath = join(directory, "eng-001.jsonl");

  try {
    // Session one writes two records.
    const first = new FileStorage(filePath);
    const logger = new AuditLogger("eng-001", "op-alice");
    await first.append(logger.logEvent("scan_hosts", { hosts: 5 }, "approval-17", "task-3"));
    await first.append(logger.logEvent("probe_service", { port: 443, tls: true }, "approval-17", "task-3"));
    await first.close();

    // Session two picks up where the file ends.
    const second = new FileStorage(filePath);
    const resumed = AuditLogger.resume("eng-001", "op-alice", await second.lastRecord());
    await second.append(resumed.logEvent("write_report", { pages: 4 }, "approval-18"));
    const stored = await second.all();
    await second.close();

    console.log("[Step 1] Verifying the stored chain:");
    printVerificationResult(verifyChainDetailed(stored));

    console.log("\n[Step 2] Verifying after an action was rewritten:");
    const edited = stored.map((entry, index) =>
      index === 1 && typeof entry === "object" && entry !== null ? { ...entry, action: "noop" } : entry,
    );
    printVerificationResult(verifyChainDetailed(edited));

    console.log("\n[Step 3] Verifying after the middle record was deleted:");
    printVerificationResult(verifyChainDetailed([stored[0], stored[2]]));
  } finally {
    rmSync(directory, { recursive: true, force: true });
  }
}

main().catch((error: unknown) => {
  console.error("Error:", error);
  process.exit(1);
});
