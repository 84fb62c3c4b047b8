// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { HashChain, computeChainHash } from "./chain.js";
import { parseLoggerConfig } from "./config.js";
import { ChainResumeError } from "./errors.js";
import type { AuditChainTelemetry } from "./otel-exporter.js";
import { buildRecordContent, formatTimestamp, hashResult } from "./record.js";
import { parseAuditRecord } from "./schema.js";
import type { AuditEventInput, AuditLoggerOptions, AuditRecord, ChainState } from "./types.js";
import { verifyChain } from "./verify.js";

/**
 * Primary entry point for recording events into a tamper-evident chain.
 *
 * One AuditLogger belongs to one engagement/operator session. It owns the
 * chain tip and the sequence counter for that session and nothing else:
 * records are returned to the caller, who decides where to persist them.
 *
 * Usage:
 * ```typescript
 * const logger = new AuditLogger('eng-001', 'op-alice');
 * const record = logger.logEvent('scan_hosts', { hosts: 5 }, 'approval-17', 'task-3');
 * AuditLogger.verifyChain([record]); // true
 * ```
 *
 * Not safe for concurrent use: `logEvent` reads and advances the chain state
 * as one unit, so callers sharing an instance must serialise calls.
 */
export class AuditLogger {
  readonly engagementId: string;
  readonly operatorId: string;
  private readonly chain: HashChain;
  private readonly clock: () => Date;
  private readonly telemetry: AuditChainTelemetry | undefined;
  private readonly onTelemetryError: ((error: unknown) => void) | undefined;

  constructor(engagementId: string, operatorId: string, options: AuditLoggerOptions = {}) {
    const config = parseLoggerConfig({
      engagementId,
      operatorId,
      resumeFrom: options.resumeFrom,
    });
    this.engagementId = config.engagementId;
    this.operatorId = config.operatorId;
    this.chain = new HashChain(config.resumeFrom);
    this.clock = options.clock ?? (() => new Date());
    this.telemetry = options.telemetry;
    this.onTelemetryError = options.onTelemetryError;
  }

  /**
   * Continue a chain from the last record persisted by an earlier session.
   *
   * The record must be well-formed, belong to the same engagement and
   * operator, and carry a `chain_hash` that recomputes from its own fields.
   * The new logger's first record gets `sequence + 1` and links to it.
   *
   * @throws {InvalidRecordError} when `lastRecord` is not a valid record.
   * @throws {ChainResumeError} on an identity or hash mismatch.
   */
  static resume(
    engagementId: string,
    operatorId: string,
    lastRecord: unknown,
    options: Omit<AuditLoggerOptions, "resumeFrom"> = {},
  ): AuditLogger {
    const record = parseAuditRecord(lastRecord);

    if (record.engagement_id !== engagementId || record.operator_id !== operatorId) {
      throw new ChainResumeError(
        `Record ${record.sequence} belongs to engagement "${record.engagement_id}" and operator "${record.operator_id}", not "${engagementId}" and "${operatorId}".`,
      );
    }

    const { chain_hash: chainHash, ...pending } = record;
    if (computeChainHash(pending) !== chainHash) {
      throw new ChainResumeError(
        `Record ${record.sequence} has a chain_hash that does not match its content.`,
      );
    }

    return new AuditLogger(engagementId, operatorId, {
      ...options,
      resumeFrom: { chainTip: chainHash, sequence: record.sequence },
    });
  }

  /**
   * True when `records` form an intact chain. Needs no logger instance.
   * See {@link verifyChain}.
   */
  static verifyChain(records: readonly unknown[]): boolean {
    return verifyChain(records);
  }

  /**
   * Record one event and append it to the chain.
   *
   * `result` is committed to by its hash only. It is hashed before any state
   * changes, so a payload the canonical encoder rejects leaves the chain
   * untouched and does not consume a sequence number.
   *
   * @param taskId - Optional task identifier; stored as `null` when absent.
   * @returns The frozen record, including its `chain_hash`.
   * @throws {CanonicalEncodingError} when `result` cannot be canonically encoded.
   */
  logEvent(
    action: string,
    result: unknown,
    authorization: string,
    taskId: string | null = null,
  ): AuditRecord {
    const resultHash = hashResult(result);
    const content = buildRecordContent({
      engagementId: this.engagementId,
      operatorId: this.operatorId,
      timestamp: formatTimestamp(this.clock()),
      action,
      taskId,
      authorization,
      resultHash,
    });
    const record = this.chain.append(content);
    this.report(record);
    return record;
  }

  // The record is already linked into the chain here, so a telemetry failure
  // must not stop it from reaching the caller.
  private report(record: AuditRecord): void {
    if (this.telemetry === undefined) {
      return;
    }
    try {
      this.telemetry.exportRecord(record);
    } catch (error: unknown) {
      this.onTelemetryError?.(error);
    }
  }

  /** Object form of {@link logEvent}. */
  log(input: AuditEventInput): AuditRecord {
    return this.logEvent(input.action, input.result, input.authorization, input.taskId ?? null);
  }

  /**
   * Current chain tip and sequence. Persist this next to the records to
   * resume the chain later with `resumeFrom`.
   */
  state(): ChainState {
    return this.chain.state();
  }
}
