// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * audit-chain: tamper-evident, hash-chained audit logging.
 *
 * Public API surface:
 *
 *   Classes:
 *     AuditLogger            Per-session logger: logEvent(), log(), state(), resume()
 *     HashChain              Low-level chain state (tip + sequence) and append
 *     MemoryStorage          Volatile in-memory record sink
 *     FileStorage            Append-only NDJSON record sink
 *     AuditChainOTelExporter OTel spans and counters for appends and verifications
 *
 *   Functions:
 *     verifyChain, verifyChainDetailed, verifyWithTelemetry
 *     encodeCanonical, canonicalBytes, sha256Hex
 *     hashResult, formatTimestamp, computeChainHash
 *     parseAuditRecord, parseLoggerConfig
 *     exportJson, exportJsonl, exportCsv, exportRecords
 *
 *   Errors:
 *     AuditChainError, CanonicalEncodingError, InvalidConfigError,
 *     InvalidRecordError, ChainResumeError
 */

// Core
export { AuditLogger } from "./logger.js";
export { HashChain, computeChainHash } from "./chain.js";
export { verifyChain, verifyChainDetailed, verifyWithTelemetry } from "./verify.js";

// Canonical encoding and hashing
export { encodeCanonical, canonicalBytes, sha256Hex, isPlainObject } from "./canonical.js";
export type { CanonicalValue } from "./canonical.js";
export { hashResult, formatTimestamp, buildRecordContent, finaliseRecord } from "./record.js";
export type { RecordContent } from "./record.js";

// Validation
export { AuditRecordSchema, ChainStateSchema, parseAuditRecord } from "./schema.js";
export { LoggerConfigSchema, parseLoggerConfig } from "./config.js";
export type { LoggerConfig } from "./config.js";

// Errors
export {
  AuditChainError,
  CanonicalEncodingError,
  InvalidConfigError,
  InvalidRecordError,
  ChainResumeError,
} from "./errors.js";

// Storage
export { MemoryStorage } from "./storage/memory.js";
export { FileStorage } from "./storage/file.js";
export type { AuditStorage } from "./storage/interface.js";

// Export helpers
export { exportJson, exportJsonl, exportCsv, exportRecords } from "./export.js";

// Constants and types
export { SCHEMA_VERSION, GENESIS_HASH, RESULT_HASH_LENGTH } from "./types.js";
export type {
  AuditRecord,
  PendingRecord,
  AuditEventInput,
  AuditLoggerOptions,
  ChainState,
  ChainFailureKind,
  ChainVerificationResult,
  ExportFormat,
} from "./types.js";

// OpenTelemetry
export { AUDIT_CHAIN_SEMANTIC_CONVENTIONS } from "./otel-conventions.js";
export type { AuditChainAttributeKey } from "./otel-conventions.js";
export { AuditChainOTelExporter } from "./otel-exporter.js";
export type {
  AuditChainTelemetry,
  AuditChainOTelExporterOptions,
  OTelTracer,
  OTelSpan,
  OTelMeterProvider,
  OTelMeter,
  OTelCounter,
} from "./otel-exporter.js";
