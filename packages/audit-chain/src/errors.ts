// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Base class for all audit-chain errors.
 *
 * Every error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class AuditChainError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "AuditChainError";
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when a value cannot be canonically encoded: cyclic references,
 * `undefined`, functions, symbols, non-finite numbers or objects that are
 * neither plain objects nor arrays.
 *
 * `path` points at the offending value using JSON-path notation, e.g.
 * `$.result.items[2]`.
 */
export class CanonicalEncodingError extends AuditChainError {
  readonly path: string;

  constructor(path: string, detail: string) {
    super("NON_CANONICAL_VALUE", `Cannot canonically encode value at ${path}: ${detail}.`);
    this.name = "CanonicalEncodingError";
    this.path = path;
  }
}

/**
 * Thrown when logger options are structurally or semantically invalid.
 *
 * The `details` array carries one entry per validation error, formatted as
 * `path: message` from Zod's `ZodError.issues`.
 */
export class InvalidConfigError extends AuditChainError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super("INVALID_CONFIG", `Audit logger configuration is invalid: ${details.join("; ")}`);
    this.name = "InvalidConfigError";
    this.details = details;
  }
}

/**
 * Thrown by {@link parseAuditRecord} when a value does not have the shape of
 * an audit record.
 */
export class InvalidRecordError extends AuditChainError {
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super("INVALID_RECORD", `Value is not a well-formed audit record: ${details.join("; ")}`);
    this.name = "InvalidRecordError";
    this.details = details;
  }
}

/**
 * Thrown when a logger cannot continue a chain from a stored record, either
 * because the record belongs to a different engagement or operator, or
 * because its own chain hash does not recompute.
 */
export class ChainResumeError extends AuditChainError {
  constructor(message: string) {
    super("CHAIN_RESUME_MISMATCH", message);
    this.name = "ChainResumeError";
  }
}
