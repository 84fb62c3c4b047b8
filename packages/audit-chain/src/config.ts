// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from "zod";
import { InvalidConfigError } from "./errors.js";
import { ChainStateSchema, formatIssues } from "./schema.js";

/**
 * Zod schema for the data half of the logger configuration. Function-valued
 * options (`clock`, `telemetry`) are checked by the type system only.
 */
export const LoggerConfigSchema = z.object({
  /** Engagement the records belong to. Fixed for the logger's lifetime. */
  engagementId: z.string(),
  /** Operator acting within the engagement. Fixed for the logger's lifetime. */
  operatorId: z.string(),
  /** Chain position to continue from. Omit to start at genesis. */
  resumeFrom: ChainStateSchema.optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

/**
 * Parse and validate a raw logger config, throwing InvalidConfigError on
 * failure.
 */
export function parseLoggerConfig(raw: unknown): LoggerConfig {
  const result = LoggerConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(formatIssues(result.error));
  }
  return result.data;
}
