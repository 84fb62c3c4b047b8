// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { AuditRecord } from "../types.js";

/**
 * Contract for a place to keep records between logging and verification.
 * Implementations must be append-only: records written through `append` are
 * never altered, reordered or deleted by the storage layer.
 *
 * Reads return `unknown[]` on purpose. Whatever comes back from disk or the
 * network is untrusted until {@link verifyChain} has checked it.
 */
export interface AuditStorage {
  /**
   * Persist a record returned by `AuditLogger.logEvent`, after any records
   * already stored.
   */
  append(record: AuditRecord): Promise<void>;

  /**
   * Return every stored entry in append order.
   */
  all(): Promise<unknown[]>;

  /**
   * Return the number of stored entries.
   */
  count(): Promise<number>;
}
