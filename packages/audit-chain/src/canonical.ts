// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { createHash } from "node:crypto";
import { CanonicalEncodingError } from "./errors.js";

/**
 * Values the canonical encoder accepts. Anything else (functions, `undefined`,
 * class instances, Maps, Dates, cycles) is rejected with a
 * {@link CanonicalEncodingError}.
 */
export type CanonicalValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue };

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const EXPONENTIAL = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;
const NON_PRINTABLE_ASCII = /[^\x20-\x7e]/g;

/**
 * True for objects created by an object literal, `JSON.parse` or
 * `Object.create(null)`. Arrays and class instances are excluded.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Order two strings by Unicode code point. The default `Array.prototype.sort`
 * compares UTF-16 code units, which puts astral characters before
 * U+E000..U+FFFF.
 */
function compareCodePoints(a: string, b: string): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(j) ?? 0;
    if (left !== right) {
      return left - right;
    }
    i += left > 0xffff ? 2 : 1;
    j += right > 0xffff ? 2 : 1;
  }
  return a.length - i - (b.length - j);
}

function childPath(path: string, key: string): string {
  return IDENTIFIER.test(key) ? `${path}.${key}` : `${path}[${JSON.stringify(key)}]`;
}

/**
 * Quote a string as JSON, then escape every code unit outside printable ASCII
 * as `\uXXXX` (lowercase hex). Characters above the BMP come out as two
 * escaped surrogates.
 */
function encodeString(value: string): string {
  return JSON.stringify(value).replace(
    NON_PRINTABLE_ASCII,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );
}

/**
 * Render a non-integer finite number from its shortest round-trip digits.
 * Positional notation is used while the decimal exponent stays within
 * [-4, 16); beyond that the form is `d.ddde±XX`.
 */
function formatFraction(value: number): string {
  const match = EXPONENTIAL.exec(value.toExponential());
  if (match === null) {
    return String(value);
  }
  const sign = match[1] ?? "";
  const digits = (match[2] ?? "") + (match[3] ?? "");
  const exponent = Number(match[4]);

  if (exponent >= -4 && exponent < 16) {
    if (exponent < 0) {
      return `${sign}0.${"0".repeat(-exponent - 1)}${digits}`;
    }
    const whole = digits.slice(0, exponent + 1).padEnd(exponent + 1, "0");
    const fraction = digits.slice(exponent + 1);
    return `${sign}${whole}.${fraction.length > 0 ? fraction : "0"}`;
  }

  const mantissa = digits.length > 1 ? `${digits[0]}.${digits.slice(1)}` : digits;
  const exponentSign = exponent < 0 ? "-" : "+";
  return `${sign}${mantissa}e${exponentSign}${String(Math.abs(exponent)).padStart(2, "0")}`;
}

function encodeNumber(value: number, path: string): string {
  if (!Number.isFinite(value)) {
    throw new CanonicalEncodingError(path, `non-finite number ${String(value)}`);
  }
  if (Number.isInteger(value)) {
    return BigInt(value).toString();
  }
  return formatFraction(value);
}

function encodeValue(value: unknown, path: string, ancestors: Set<object>): string {
  switch (typeof value) {
    case "string":
      return encodeString(value);
    case "number":
      return encodeNumber(value, path);
    case "bigint":
      return value.toString();
    case "boolean":
      return value ? "true" : "false";
    case "undefined":
    case "function":
    case "symbol":
      throw new CanonicalEncodingError(path, `unsupported type ${typeof value}`);
    default:
      break;
  }

  if (value === null) {
    return "null";
  }
  if (typeof value !== "object") {
    throw new CanonicalEncodingError(path, `unsupported type ${typeof value}`);
  }
  if (ancestors.has(value)) {
    throw new CanonicalEncodingError(path, "cyclic reference");
  }

  if (Array.isArray(value)) {
    const items: readonly unknown[] = value;
    ancestors.add(items);
    const parts: string[] = [];
    for (let index = 0; index < items.length; index++) {
      if (!(index in items)) {
        throw new CanonicalEncodingError(`${path}[${index}]`, "sparse array hole");
      }
      parts.push(encodeValue(items[index], `${path}[${index}]`, ancestors));
    }
    ancestors.delete(items);
    return `[${parts.join(",")}]`;
  }

  if (!isPlainObject(value)) {
    const kind = value.constructor?.name ?? "unknown";
    throw new CanonicalEncodingError(path, `unsupported object type ${kind}`);
  }

  ancestors.add(value);
  const members = Object.keys(value)
    .sort(compareCodePoints)
    .map((key) => `${encodeString(key)}:${encodeValue(value[key], childPath(path, key), ancestors)}`);
  ancestors.delete(value);
  return `{${members.join(",")}}`;
}

/**
 * Serialise `value` to its canonical text form: keys sorted at every level,
 * no whitespace, `,` and `:` separators, ASCII-only output.
 *
 * Two structurally equal values always produce the same string, whatever the
 * insertion order of their keys. The log path and the verify path both hash
 * this output, so it must not change between releases.
 *
 * @throws {CanonicalEncodingError} for values outside {@link CanonicalValue}.
 */
export function encodeCanonical(value: unknown): string {
  return encodeValue(value, "$", new Set());
}

/** UTF-8 bytes of {@link encodeCanonical}. */
export function canonicalBytes(value: unknown): Uint8Array {
  return new TextEncoder().encode(encodeCanonical(value));
}

/** Full SHA-256 hex digest of the canonical encoding of `value`. */
export function sha256Hex(value: unknown): string {
  return createHash("sha256").update(encodeCanonical(value), "utf8").digest("hex");
}
