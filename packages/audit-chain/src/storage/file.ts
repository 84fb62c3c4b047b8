// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { createWriteStream, existsSync } from "node:fs";
import type { WriteStream } from "node:fs";
import { readFile } from "node:fs/promises";
import type { AuditRecord } from "../types.js";
import type { AuditStorage } from "./interface.js";

/**
 * Append-only file storage backend.
 *
 * Records are stored one JSON object per line (NDJSON / JSON Lines format).
 * The file is opened in append mode on construction and never truncated or
 * rewritten; callers relying on immutability should secure the file with
 * OS-level permissions.
 *
 * Reads parse the entire file from disk on every call, so records appended
 * by other processes are included.
 */
export class FileStorage implements AuditStorage {
  private readonly filePath: string;
  private readonly writeStream: WriteStream;
  /** First error the stream reported, e.g. the file could not be opened. */
  private streamError: Error | undefined;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.writeStream = createWriteStream(filePath, { flags: "a", encoding: "utf8" });
    this.writeStream.on("error", (error) => {
      if (this.streamError === undefined) {
        this.streamError = error;
      }
    });
  }

  /**
   * Append one record as a JSON line. Rejects with the stream's error when
   * the file cannot be opened or written.
   */
  async append(record: AuditRecord): Promise<void> {
    if (this.streamError !== undefined) {
      throw this.streamError;
    }

    const line = JSON.stringify(record) + "\n";
    await new Promise<void>((resolve, reject) => {
      this.writeStream.write(line, (error) => {
        if (error !== null && error !== undefined) {
          reject(this.streamError ?? error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Parse every non-empty line. A line that is not valid JSON is returned as
   * its raw text, so chain verification fails at that position instead of
   * skipping over the damage.
   */
  async all(): Promise<unknown[]> {
    if (!existsSync(this.filePath)) {
      return [];
    }

    const content = await readFile(this.filePath, "utf8");
    return content
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map(parseLine);
  }

  async count(): Promise<number> {
    const entries = await this.all();
    return entries.length;
  }

  /**
   * The last stored entry, or undefined for an empty file. Pass it to
   * `AuditLogger.resume` to continue the chain in a new session.
   */
  async lastRecord(): Promise<unknown> {
    const entries = await this.all();
    return entries[entries.length - 1];
  }

  /**
   * Close the underlying write stream. Call this when the storage is no
   * longer needed to release the file handle.
   */
  close(): Promise<void> {
    if (this.streamError !== undefined) {
      return Promise.reject(this.streamError);
    }

    return new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(error);
      };
      this.writeStream.once("error", onError);
      this.writeStream.end(() => {
        this.writeStream.off("error", onError);
        resolve();
      });
    });
  }
}

function parseLine(line: string): unknown {
  try {
    const parsed: unknown = JSON.parse(line);
    return parsed;
  } catch (error) {
    if (error instanceof SyntaxError) {
      return line;
    }
    throw error;
  }
}
