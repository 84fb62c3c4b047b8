// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { AuditChainTelemetry } from "./otel-exporter.js";

/** Literal written to `schema_version` on every record. */
export const SCHEMA_VERSION = "1.0";

/** `prev_chain_hash` of the first record in every chain. */
export const GENESIS_HASH = "0".repeat(64);

/** Number of hex characters kept from the SHA-256 digest of a result. */
export const RESULT_HASH_LENGTH = 16;

/**
 * An immutable, hash-chained audit record. Field names are the wire format
 * and must not be renamed: every one of them (except `chain_hash`) is part of
 * the hashed content.
 */
export interface AuditRecord {
  readonly schema_version: typeof SCHEMA_VERSION;
  readonly engagement_id: string;
  readonly operator_id: string;
  readonly sequence: number;
  readonly timestamp: string;
  readonly action: string;
  readonly task_id: string | null;
  readonly authorization: string;
  readonly result_hash: string;
  readonly prev_chain_hash: string;
  readonly chain_hash: string;
}

/** A record before its own hash has been computed. */
export type PendingRecord = Omit<AuditRecord, "chain_hash">;

/**
 * Input for logging one event. `result` is committed to by hash only and is
 * never stored on the record.
 */
export interface AuditEventInput {
  readonly action: string;
  readonly result: unknown;
  readonly authorization: string;
  readonly taskId?: string | null;
}

/**
 * Position of a chain: the hash of the last appended record and the number
 * of records appended so far.
 */
export interface ChainState {
  readonly chainTip: string;
  readonly sequence: number;
}

/** Why a chain failed verification. */
export type ChainFailureKind =
  | "malformed_record"
  | "missing_link_fields"
  | "link_mismatch"
  | "hash_mismatch";

/**
 * Result returned after verifying the integrity of a hash chain.
 */
export type ChainVerificationResult =
  | { readonly valid: true; readonly recordCount: number }
  | {
      readonly valid: false;
      readonly recordCount: number;
      readonly brokenAt: number;
      readonly failure: ChainFailureKind;
      readonly reason: string;
    };

/**
 * Export format identifiers.
 */
export type ExportFormat = "json" | "jsonl" | "csv";

/**
 * Options for constructing an AuditLogger.
 */
export interface AuditLoggerOptions {
  /** Time source for record timestamps. Defaults to the system clock. */
  readonly clock?: () => Date;
  /**
   * Receives every record right after it is appended. Errors it throws never
   * reach the `logEvent` caller; they go to `onTelemetryError` instead.
   */
  readonly telemetry?: AuditChainTelemetry;
  /** Called with any error thrown by `telemetry`. Defaults to dropping it. */
  readonly onTelemetryError?: (error: unknown) => void;
  /** Continue an existing chain instead of starting from genesis. */
  readonly resumeFrom?: ChainState;
}
