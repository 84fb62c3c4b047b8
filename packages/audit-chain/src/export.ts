// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { AuditRecord, ExportFormat } from "./types.js";

// ---------------------------------------------------------------------------
// JSON export
// ---------------------------------------------------------------------------

/**
 * Serialise records to a JSON array string with 2-space indentation.
 */
export function exportJson(records: readonly AuditRecord[]): string {
  return JSON.stringify(records, null, 2);
}

/**
 * Serialise records as JSON Lines, one compact record per line. This is the
 * format {@link FileStorage} reads back.
 */
export function exportJsonl(records: readonly AuditRecord[]): string {
  return records.map((record) => JSON.stringify(record)).join("\n");
}

// ---------------------------------------------------------------------------
// CSV export
// ---------------------------------------------------------------------------

const CSV_COLUMNS = [
  "schema_version",
  "engagement_id",
  "operator_id",
  "sequence",
  "timestamp",
  "action",
  "task_id",
  "authorization",
  "result_hash",
  "prev_chain_hash",
  "chain_hash",
] as const satisfies ReadonlyArray<keyof AuditRecord>;

/**
 * Escape a value for CSV embedding:
 * - Wrap in double quotes if the value contains commas, newlines, or quotes.
 * - Double any embedded double-quote characters.
 */
function escapeCsvField(value: string): string {
  if (value.includes(",") || value.includes("\n") || value.includes("\r") || value.includes('"')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function recordToCsvRow(record: AuditRecord): string {
  return CSV_COLUMNS.map((column) => {
    const raw = record[column];
    return raw === null ? "" : escapeCsvField(String(raw));
  }).join(",");
}

/**
 * Serialise records to CSV. The first row holds the column headers, in wire
 * field order; a `null` task id becomes an empty cell.
 */
export function exportCsv(records: readonly AuditRecord[]): string {
  const header = CSV_COLUMNS.join(",");
  const rows = records.map(recordToCsvRow);
  return [header, ...rows].join("\n");
}

// ---------------------------------------------------------------------------
// Unified dispatcher
// ---------------------------------------------------------------------------

/**
 * Route export to the appropriate format handler.
 */
export function exportRecords(records: readonly AuditRecord[], format: ExportFormat): string {
  switch (format) {
    case "json":
      return exportJson(records);
    case "jsonl":
      return exportJsonl(records);
    case "csv":
      return exportCsv(records);
    default: {
      // Exhaustive check: TypeScript errors here if a new format is added
      // to ExportFormat without a corresponding case above.
      const unreachable: never = format;
      throw new Error(`Unsupported export format: ${String(unreachable)}`);
    }
  }
}
