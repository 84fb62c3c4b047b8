// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import type { AuditRecord } from "../types.js";
import type { AuditStorage } from "./interface.js";

/**
 * Volatile in-memory storage backend.
 *
 * Records are held in a plain array in insertion order.  Suitable for
 * testing and short-lived processes.  Data is lost when the process exits.
 */
export class MemoryStorage implements AuditStorage {
  private readonly records: AuditRecord[] = [];

  async append(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }

  async all(): Promise<unknown[]> {
    return this.records.slice();
  }

  async count(): Promise<number> {
    return this.records.length;
  }

  /** The most recently appended record, if any. */
  async lastRecord(): Promise<AuditRecord | undefined> {
    return this.records[this.records.length - 1];
  }
}
