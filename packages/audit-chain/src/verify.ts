// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { isPlainObject } from "./canonical.js";
import { computeChainHash } from "./chain.js";
import type { AuditChainOTelExporter } from "./otel-exporter.js";
import { GENESIS_HASH } from "./types.js";
import type { ChainFailureKind, ChainVerificationResult } from "./types.js";

function describeValue(value: unknown): string {
  if (typeof value === "string") {
    return `"${value}"`;
  }
  return value === null ? "null" : `a ${typeof value}`;
}

function broken(
  recordCount: number,
  brokenAt: number,
  failure: ChainFailureKind,
  reason: string,
): ChainVerificationResult {
  return { valid: false, recordCount, brokenAt, failure, reason };
}

/**
 * Walk `records` from index 0, re-deriving every link and hash from the
 * records alone, and report the first discrepancy.
 *
 * For each record the previous record's `chain_hash` (the genesis hash for
 * index 0) must equal `prev_chain_hash`, and SHA-256 over the canonical
 * encoding of the record minus `chain_hash` must equal the stored
 * `chain_hash`. Every other field is hashed exactly as stored, including
 * fields this package never writes.
 *
 * Input is treated as untrusted: values that are not plain objects, or lack
 * the link fields, produce a failed result rather than an exception.
 *
 * @throws {CanonicalEncodingError} when a record holds a value that cannot be
 *         canonically encoded.
 */
export function verifyChainDetailed(records: readonly unknown[]): ChainVerificationResult {
  const recordCount = records.length;
  let expectedPrevious = GENESIS_HASH;

  for (let index = 0; index < recordCount; index++) {
    const record = records[index];

    if (!isPlainObject(record)) {
      return broken(recordCount, index, "malformed_record", `Record at index ${index} is not an object.`);
    }

    if (!Object.hasOwn(record, "chain_hash") || !Object.hasOwn(record, "prev_chain_hash")) {
      return broken(
        recordCount,
        index,
        "missing_link_fields",
        `Record at index ${index} lacks chain_hash or prev_chain_hash.`,
      );
    }

    const { chain_hash: storedHash, ...pending } = record;

    if (pending["prev_chain_hash"] !== expectedPrevious) {
      return broken(
        recordCount,
        index,
        "link_mismatch",
        `Record at index ${index} has prev_chain_hash ${describeValue(pending["prev_chain_hash"])} but expected "${expectedPrevious}".`,
      );
    }

    const expectedHash = computeChainHash(pending);
    if (storedHash !== expectedHash) {
      return broken(
        recordCount,
        index,
        "hash_mismatch",
        `Record at index ${index} has chain_hash ${describeValue(storedHash)} but recomputed hash is "${expectedHash}". Record content may have been altered.`,
      );
    }

    expectedPrevious = expectedHash;
  }

  return { valid: true, recordCount };
}

/**
 * True when `records` form an intact chain starting at genesis. An empty
 * sequence is valid.
 */
export function verifyChain(records: readonly unknown[]): boolean {
  return verifyChainDetailed(records).valid;
}

/**
 * Run {@link verifyChainDetailed} and report the outcome to `exporter`.
 */
export function verifyWithTelemetry(
  records: readonly unknown[],
  exporter: Pick<AuditChainOTelExporter, "exportVerification">,
): ChainVerificationResult {
  const result = verifyChainDetailed(records);
  exporter.exportVerification(result);
  return result;
}
