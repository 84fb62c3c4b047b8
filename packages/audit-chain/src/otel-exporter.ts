// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * OpenTelemetry exporter for audit-chain activity.
 *
 * Emits one span per appended record and per chain verification, and keeps
 * two counters. The OTel API is not a dependency: the exporter only needs
 * objects with the methods below, which real OTel tracers and meters have.
 *
 * ```typescript
 * import { metrics, trace } from '@opentelemetry/api';
 *
 * const exporter = new AuditChainOTelExporter({
 *   tracer: trace.getTracer('audit-chain'),
 *   meterProvider: metrics,
 * });
 * const logger = new AuditLogger('eng-001', 'op-alice', { telemetry: exporter });
 * ```
 */

import { AUDIT_CHAIN_SEMANTIC_CONVENTIONS as CONVENTIONS } from "./otel-conventions.js";
import type { AuditRecord, ChainVerificationResult } from "./types.js";

// ---------------------------------------------------------------------------
// Minimal OTel interface subset
//
// We declare only the methods we actually call.  Real OTel objects satisfy
// these interfaces; a stub object also works for testing or opt-out use.
// ---------------------------------------------------------------------------

/**
 * Minimal tracer interface, a strict subset of `@opentelemetry/api` Tracer.
 */
export interface OTelTracer {
  startSpan(name: string, options?: Record<string, unknown>): OTelSpan;
}

/**
 * Minimal span interface, a strict subset of `@opentelemetry/api` Span.
 */
export interface OTelSpan {
  setAttribute(key: string, value: string | number | boolean): void;
  setStatus(status: { code: number; message?: string }): void;
  end(): void;
}

/**
 * Minimal meter provider interface.
 */
export interface OTelMeterProvider {
  getMeter(name: string, version?: string): OTelMeter;
}

/**
 * Minimal meter interface, a strict subset of `@opentelemetry/api` Meter.
 */
export interface OTelMeter {
  createCounter(name: string, options?: Record<string, unknown>): OTelCounter;
}

/**
 * Minimal counter instrument interface.
 */
export interface OTelCounter {
  add(value: number, attributes?: Record<string, string | number | boolean>): void;
}

// Mirrors @opentelemetry/api SpanStatusCode.
const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

/**
 * Anything that wants to observe records as a logger appends them.
 * {@link AuditChainOTelExporter} is the bundled implementation.
 */
export interface AuditChainTelemetry {
  exportRecord(record: AuditRecord): void;
}

/**
 * Construction options for {@link AuditChainOTelExporter}.
 */
export interface AuditChainOTelExporterOptions {
  /**
   * OTel tracer to use for span creation.  When omitted no spans are
   * emitted.
   */
  readonly tracer?: OTelTracer;

  /**
   * OTel meter provider for the record and verification counters.  When
   * omitted no metrics are recorded.
   */
  readonly meterProvider?: OTelMeterProvider;

  /**
   * Instrumentation scope name passed to `getMeter`.
   * Defaults to `"audit-chain"`.
   */
  readonly instrumentationName?: string;
}

/**
 * Converts appended records and verification results into OTel spans and
 * counter increments.
 *
 * All methods are synchronous. Record spans never carry the result payload;
 * records only hold its hash in the first place.
 */
export class AuditChainOTelExporter implements AuditChainTelemetry {
  private readonly tracer: OTelTracer | undefined;
  private readonly recordCounter: OTelCounter | undefined;
  private readonly verificationCounter: OTelCounter | undefined;

  constructor(options: AuditChainOTelExporterOptions = {}) {
    this.tracer = options.tracer;

    const meter = options.meterProvider?.getMeter(options.instrumentationName ?? "audit-chain");
    this.recordCounter = meter?.createCounter(CONVENTIONS.METRIC_RECORDS, {
      description: "Audit records appended to a chain",
    });
    this.verificationCounter = meter?.createCounter(CONVENTIONS.METRIC_VERIFICATIONS, {
      description: "Audit chain verifications performed",
    });
  }

  /**
   * Emit an `audit_chain.append` span for a record returned by
   * `AuditLogger.logEvent()` and count it.
   */
  exportRecord(record: AuditRecord): void {
    this.recordCounter?.add(1, {
      [CONVENTIONS.AUDIT_ENGAGEMENT_ID]: record.engagement_id,
      [CONVENTIONS.AUDIT_ACTION]: record.action,
    });

    const span = this.tracer?.startSpan(CONVENTIONS.SPAN_APPEND);
    if (span === undefined) {
      return;
    }

    try {
      span.setAttribute(CONVENTIONS.AUDIT_ENGAGEMENT_ID, record.engagement_id);
      span.setAttribute(CONVENTIONS.AUDIT_OPERATOR_ID, record.operator_id);
      span.setAttribute(CONVENTIONS.AUDIT_SEQUENCE, record.sequence);
      span.setAttribute(CONVENTIONS.AUDIT_ACTION, record.action);
      if (record.task_id !== null) {
        span.setAttribute(CONVENTIONS.AUDIT_TASK_ID, record.task_id);
      }
      span.setAttribute(CONVENTIONS.AUDIT_CHAIN_HASH, record.chain_hash);
      span.setStatus({ code: SPAN_STATUS_OK });
    } finally {
      span.end();
    }
  }

  /**
   * Emit an `audit_chain.verify` span for a verification result. A broken
   * chain sets the span status to ERROR with the failure reason.
   */
  exportVerification(result: ChainVerificationResult): void {
    this.verificationCounter?.add(1, { [CONVENTIONS.AUDIT_VERIFY_VALID]: result.valid });

    const span = this.tracer?.startSpan(CONVENTIONS.SPAN_VERIFY);
    if (span === undefined) {
      return;
    }

    try {
      span.setAttribute(CONVENTIONS.AUDIT_VERIFY_RECORD_COUNT, result.recordCount);
      span.setAttribute(CONVENTIONS.AUDIT_VERIFY_VALID, result.valid);
      if (result.valid) {
        span.setStatus({ code: SPAN_STATUS_OK });
      } else {
        span.setAttribute(CONVENTIONS.AUDIT_VERIFY_BROKEN_AT, result.brokenAt);
        span.setAttribute(CONVENTIONS.AUDIT_VERIFY_FAILURE, result.failure);
        span.setStatus({ code: SPAN_STATUS_ERROR, message: result.reason });
      }
    } finally {
      span.end();
    }
  }
}
