// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from "vitest";
import { AuditLogger } from "../src/logger.js";
import { exportCsv, exportJson, exportJsonl, exportRecords } from "../src/export.js";
import { verifyChain } from "../src/verify.js";
import { GENESIS_HASH } from "../src/types.js";
import type { AuditRecord } from "../src/types.js";

const fixedClock = (): Date => new Date("2024-01-01T00:00:00Z");

const SCAN_CHAIN_HASH = "16249508a2ccb23d87b2ac7df7175bee5689f9b22321d032869c65ec1af1f338";

function sampleRecords(): AuditRecord[] {
  const logger = new AuditLogger("eng-001", "op-alice", { clock: fixedClock });
  return [
    logger.logEvent("scan_hosts", { hosts: 5, open_ports: [22, 443] }, "approval-17", "task-3"),
    logger.logEvent("read, then write", {}, 'ticket "42"'),
  ];
}

describe("exportJson", () => {
  it("writes a pretty-printed array that parses back to the records", () => {
    const records = sampleRecords();
    const output = exportJson(records);
    expect(output.startsWith("[\n  {\n")).toBe(true);
    expect(JSON.parse(output)).toEqual(records);
  });

  it("writes an empty array for no records", () => {
    expect(exportJson([])).toBe("[]");
  });
});

describe("exportJsonl", () => {
  it("writes one compact record per line", () => {
    const records = sampleRecords();
    const lines = exportJsonl(records).split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe(JSON.stringify(records[0]));
    expect(lines[0]).not.toContain(" ");
  });

  it("produces lines that still verify after parsing", () => {
    const parsed = exportJsonl(sampleRecords())
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    expect(verifyChain(parsed)).toBe(true);
  });

  it("writes an empty string for no records", () => {
    expect(exportJsonl([])).toBe("");
  });
});

describe("exportCsv", () => {
  it("writes a header in wire field order", () => {
    expect(exportCsv([])).toBe(
      "schema_version,engagement_id,operator_id,sequence,timestamp,action,task_id," +
        "authorization,result_hash,prev_chain_hash,chain_hash",
    );
  });

  it("writes each record as a row", () => {
    const rows = exportCsv(sampleRecords()).split("\n");
    expect(rows).toHaveLength(3);
    expect(rows[1]).toBe(
      `1.0,eng-001,op-alice,1,2024-01-01T00:00:00Z,scan_hosts,task-3,approval-17,add599a2b0be4218,${GENESIS_HASH},${SCAN_CHAIN_HASH}`,
    );
  });

  it("leaves a null task id empty and quotes fields with commas or quotes", () => {
    const records = sampleRecords();
    const second = records[1]!;
    const rows = exportCsv(records).split("\n");
    expect(rows[2]).toBe(
      `1.0,eng-001,op-alice,2,2024-01-01T00:00:00Z,"read, then write",,"ticket ""42""",` +
        `${second.result_hash},${SCAN_CHAIN_HASH},${second.chain_hash}`,
    );
  });
});

describe("exportRecords", () => {
  it.each(["json", "jsonl", "csv"] as const)("dispatches %s to its handler", (format) => {
    const records = sampleRecords();
    const expected = { json: exportJson, jsonl: exportJsonl, csv: exportCsv }[format](records);
    expect(exportRecords(records, format)).toBe(expected);
  });
});
