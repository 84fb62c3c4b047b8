// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { sha256Hex } from "./canonical.js";
import { finaliseRecord } from "./record.js";
import type { RecordContent } from "./record.js";
import { GENESIS_HASH } from "./types.js";
import type { AuditRecord, ChainState, PendingRecord } from "./types.js";

/**
 * Full SHA-256 hex digest over the canonical encoding of a record without
 * its `chain_hash`. Shared by the append path and the verifier.
 */
export function computeChainHash(pending: Readonly<Record<string, unknown>>): string {
  return sha256Hex(pending);
}

/**
 * Maintains the running state of an append-only audit chain: the hash of the
 * last record (the tip) and the sequence counter.
 *
 * Each record is linked to its predecessor through `prev_chain_hash`, so any
 * later modification, deletion or reordering is detectable.
 *
 * Thread safety: this class is not thread-safe. `append` reads and advances
 * the tip and counter as one unit; callers must serialise calls.
 */
export class HashChain {
  private tip: string;
  private sequence: number;

  constructor(initial?: ChainState) {
    this.tip = initial?.chainTip ?? GENESIS_HASH;
    this.sequence = initial?.sequence ?? 0;
  }

  /**
   * Link new content into the chain.
   *
   * Assigns the next sequence number and the current tip as
   * `prev_chain_hash`, hashes the pending record, then advances the tip and
   * returns the finished record.
   */
  append(content: RecordContent): AuditRecord {
    const sequence = this.sequence + 1;
    const pending: PendingRecord = {
      ...content,
      sequence,
      prev_chain_hash: this.tip,
    };
    const chainHash = computeChainHash(pending);

    this.sequence = sequence;
    this.tip = chainHash;
    return finaliseRecord(pending, chainHash);
  }

  /** Hash of the most recent record, or the genesis hash for an empty chain. */
  lastHash(): string {
    return this.tip;
  }

  state(): ChainState {
    return { chainTip: this.tip, sequence: this.sequence };
  }
}
