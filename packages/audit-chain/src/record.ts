// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { sha256Hex } from "./canonical.js";
import { RESULT_HASH_LENGTH, SCHEMA_VERSION } from "./types.js";
import type { AuditRecord, PendingRecord } from "./types.js";

/** Fields of a pending record that the chain itself assigns. */
export type ChainAssignedField = "sequence" | "prev_chain_hash";

/** Everything the chain needs from the logger to link a new record. */
export type RecordContent = Omit<PendingRecord, ChainAssignedField>;

/**
 * Format a date as a UTC timestamp with second precision and a literal `Z`,
 * e.g. `2024-01-01T00:00:00Z`. Sub-second precision is truncated.
 */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/**
 * Commit to a result payload: the first {@link RESULT_HASH_LENGTH} hex
 * characters of SHA-256 over the canonical form of `{ result }`.
 *
 * Wrapping the payload in a single-key object keeps scalar and array payloads
 * distinct from object-shaped ones. The digest depends on nothing but the
 * payload, so identical results hash identically across loggers.
 */
export function hashResult(result: unknown): string {
  return sha256Hex({ result }).slice(0, RESULT_HASH_LENGTH);
}

/**
 * Build the content of a record from logger identity and caller input.
 * `sequence` and `prev_chain_hash` are left to {@link HashChain.append}.
 */
export function buildRecordContent(fields: {
  engagementId: string;
  operatorId: string;
  timestamp: string;
  action: string;
  taskId: string | null;
  authorization: string;
  resultHash: string;
}): RecordContent {
  return {
    schema_version: SCHEMA_VERSION,
    engagement_id: fields.engagementId,
    operator_id: fields.operatorId,
    timestamp: fields.timestamp,
    action: fields.action,
    task_id: fields.taskId,
    authorization: fields.authorization,
    result_hash: fields.resultHash,
  };
}

/**
 * Attach the computed `chain_hash` to a pending record, producing a frozen
 * AuditRecord.
 */
export function finaliseRecord(pending: PendingRecord, chainHash: string): AuditRecord {
  return Object.freeze({ ...pending, chain_hash: chainHash });
}
