// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * OpenTelemetry attribute keys, span names and metric names for audit-chain
 * observability.
 *
 * Keys follow the OpenTelemetry naming scheme
 * (`namespace.sub_namespace.attribute`) and can be set on any span:
 *
 * ```typescript
 * span.setAttribute(AUDIT_CHAIN_SEMANTIC_CONVENTIONS.AUDIT_SEQUENCE, record.sequence);
 * ```
 */
export const AUDIT_CHAIN_SEMANTIC_CONVENTIONS = {
  // ---------------------------------------------------------------------------
  // Record attributes
  // ---------------------------------------------------------------------------

  AUDIT_ENGAGEMENT_ID: "audit.engagement.id",

  AUDIT_OPERATOR_ID: "audit.operator.id",

  /** Position of the record within its chain, starting at 1. */
  AUDIT_SEQUENCE: "audit.record.sequence",

  AUDIT_ACTION: "audit.record.action",

  AUDIT_TASK_ID: "audit.record.task_id",

  /**
   * SHA-256 chain hash of the record. Lets a trace be cross-checked against
   * the stored chain.
   */
  AUDIT_CHAIN_HASH: "audit.record.chain_hash",

  // ---------------------------------------------------------------------------
  // Verification attributes
  // ---------------------------------------------------------------------------

  AUDIT_VERIFY_RECORD_COUNT: "audit.verify.record_count",

  /** `true` when the chain verified intact. */
  AUDIT_VERIFY_VALID: "audit.verify.valid",

  /** Index of the first record that failed verification. */
  AUDIT_VERIFY_BROKEN_AT: "audit.verify.broken_at",

  /** One of `malformed_record`, `missing_link_fields`, `link_mismatch`, `hash_mismatch`. */
  AUDIT_VERIFY_FAILURE: "audit.verify.failure",

  // ---------------------------------------------------------------------------
  // Span names
  // ---------------------------------------------------------------------------

  SPAN_APPEND: "audit_chain.append",

  SPAN_VERIFY: "audit_chain.verify",

  // ---------------------------------------------------------------------------
  // Metric names
  // ---------------------------------------------------------------------------

  METRIC_RECORDS: "audit_chain.records",

  METRIC_VERIFICATIONS: "audit_chain.verifications",
} as const;

/**
 * Union of every key and name defined above.
 */
export type AuditChainAttributeKey =
  (typeof AUDIT_CHAIN_SEMANTIC_CONVENTIONS)[keyof typeof AUDIT_CHAIN_SEMANTIC_CONVENTIONS];
