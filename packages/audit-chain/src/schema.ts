// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from "zod";
import type { ZodError } from "zod";
import { InvalidRecordError } from "./errors.js";
import { GENESIS_HASH, RESULT_HASH_LENGTH, SCHEMA_VERSION } from "./types.js";
import type { AuditRecord } from "./types.js";

const ChainHashSchema = z.string().regex(/^[0-9a-f]{64}$/, "must be 64 lowercase hex characters");

/**
 * Zod schema for a schema-version 1.0 audit record as written by this
 * package. Unknown fields are rejected.
 */
export const AuditRecordSchema = z
  .object({
    schema_version: z.literal(SCHEMA_VERSION),
    engagement_id: z.string(),
    operator_id: z.string(),
    sequence: z.number().int().positive(),
    timestamp: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/, "must be YYYY-MM-DDTHH:MM:SSZ"),
    action: z.string(),
    task_id: z.string().nullable(),
    authorization: z.string(),
    result_hash: z
      .string()
      .regex(
        new RegExp(`^[0-9a-f]{${RESULT_HASH_LENGTH}}$`),
        `must be ${RESULT_HASH_LENGTH} lowercase hex characters`,
      ),
    prev_chain_hash: ChainHashSchema,
    chain_hash: ChainHashSchema,
  })
  .strict();

/**
 * Zod schema for a chain position. The genesis hash and a zero sequence go
 * together: an empty chain has no tip, and a non-empty one never has the
 * genesis hash as its tip.
 */
export const ChainStateSchema = z
  .object({
    chainTip: ChainHashSchema,
    sequence: z.number().int().nonnegative(),
  })
  .refine((state) => (state.sequence === 0) === (state.chainTip === GENESIS_HASH), {
    message: "sequence 0 must be paired with the genesis hash, and only with it",
    path: ["chainTip"],
  });

/** Flatten Zod issues into `path: message` strings. */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
}

/**
 * Validate that `raw` is a well-formed audit record, typically one read back
 * from storage, throwing InvalidRecordError on failure.
 *
 * Shape checks say nothing about integrity; run {@link verifyChain} for that.
 */
export function parseAuditRecord(raw: unknown): AuditRecord {
  const result = AuditRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidRecordError(formatIssues(result.error));
  }
  return result.data;
}
