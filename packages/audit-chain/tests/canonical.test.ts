// SPDX-License-Identifier: Apache-2.0
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from "vitest";
import { canonicalBytes, encodeCanonical, isPlainObject, sha256Hex } from "../src/canonical.js";
import { CanonicalEncodingError } from "../src/errors.js";

function captureEncodingError(fn: () => unknown): CanonicalEncodingError {
  try {
    fn();
  } catch (error) {
    if (error instanceof CanonicalEncodingError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a CanonicalEncodingError");
}

describe("encodeCanonical", () => {
  describe("structure", () => {
    it("sorts keys at every nesting level and drops whitespace", () => {
      expect(encodeCanonical({ b: [1, { d: null, c: true }], a: "x" })).toBe(
        '{"a":"x","b":[1,{"c":true,"d":null}]}',
      );
    });

    it("produces the same output regardless of key insertion order", () => {
      const first = { alpha: 1, beta: { y: 2, x: 3 } };
      const second = { beta: { x: 3, y: 2 }, alpha: 1 };
      expect(encodeCanonical(first)).toBe(encodeCanonical(second));
    });

    it("keeps array order", () => {
      expect(encodeCanonical([3, 1, 2])).toBe("[3,1,2]");
    });

    it("encodes empty containers and top-level scalars", () => {
      expect(encodeCanonical({})).toBe("{}");
      expect(encodeCanonical([])).toBe("[]");
      expect(encodeCanonical(null)).toBe("null");
      expect(encodeCanonical(false)).toBe("false");
      expect(encodeCanonical("plain")).toBe('"plain"');
    });

    it("orders keys by code point rather than UTF-16 code unit", () => {
      expect(encodeCanonical({ "\u{1F600}": 1, "\uffff": 2 })).toBe(
        '{"\\uffff":2,"\\ud83d\\ude00":1}',
      );
    });

    it("accepts objects without a prototype", () => {
      const bare: Record<string, unknown> = Object.create(null);
      bare["k"] = "v";
      expect(encodeCanonical(bare)).toBe('{"k":"v"}');
    });

    it("accepts the same object referenced twice without a cycle", () => {
      const shared = { n: 1 };
      expect(encodeCanonical({ a: shared, b: [shared] })).toBe('{"a":{"n":1},"b":[{"n":1}]}');
    });
  });

  describe("strings", () => {
    it("escapes everything outside printable ASCII with lowercase \\u escapes", () => {
      expect(encodeCanonical({ s: 'café \u{1F600} \x7f\n\t"\\ /' })).toBe(
        '{"s":"caf\\u00e9 \\ud83d\\ude00 \\u007f\\n\\t\\"\\\\ /"}',
      );
    });

    it("escapes control characters without a short form", () => {
      expect(encodeCanonical("\u0001")).toBe('"\\u0001"');
    });

    it("returns pure ASCII bytes", () => {
      const bytes = canonicalBytes({ name: "Zoë" });
      expect(Array.from(bytes).every((byte) => byte < 0x80)).toBe(true);
      expect(new TextDecoder().decode(bytes)).toBe('{"name":"Zo\\u00eb"}');
    });
  });

  describe("numbers", () => {
    it("renders integers without a fractional part", () => {
      expect(encodeCanonical([0, -7, 42, 1e21, -0])).toBe("[0,-7,42,1000000000000000000000,0]");
    });

    it("renders fractions with the shortest round-trip digits", () => {
      expect(encodeCanonical([1.5, 0.1, -2.5, 123.456, 0.0001, 0.00012])).toBe(
        "[1.5,0.1,-2.5,123.456,0.0001,0.00012]",
      );
    });

    it("switches to a two-digit exponent below 1e-4", () => {
      expect(encodeCanonical([1e-5, 1e-7, 2.5e-10, -3e-100])).toBe(
        "[1e-05,1e-07,2.5e-10,-3e-100]",
      );
    });

    it("renders bigints as decimal integers", () => {
      expect(encodeCanonical({ big: 12345678901234567890n })).toBe('{"big":12345678901234567890}');
    });
  });

  describe("rejection", () => {
    it.each([
      ["undefined", { a: undefined }, "$.a"],
      ["function", { fn: () => 1 }, "$.fn"],
      ["symbol", [Symbol("s")], "$[0]"],
      ["NaN", { n: Number.NaN }, "$.n"],
      ["Infinity", { n: Number.POSITIVE_INFINITY }, "$.n"],
      ["Date", { when: new Date(0) }, "$.when"],
      ["Map", { m: new Map() }, "$.m"],
      ["class instance", { u: new URL("https://example.test") }, "$.u"],
      ["non-identifier key", { "with space": undefined }, '$["with space"]'],
    ])("rejects %s with the JSON path of the value", (_label, value, path) => {
      const error = captureEncodingError(() => encodeCanonical(value));
      expect(error.path).toBe(path);
      expect(error.code).toBe("NON_CANONICAL_VALUE");
    });

    it("rejects cyclic references instead of recursing forever", () => {
      const node: Record<string, unknown> = { name: "root" };
      node["self"] = node;
      const error = captureEncodingError(() => encodeCanonical({ tree: node }));
      expect(error.path).toBe("$.tree.self");
      expect(error.message).toBe(
        "Cannot canonically encode value at $.tree.self: cyclic reference.",
      );
    });

    it("rejects cycles through arrays", () => {
      const list: unknown[] = [];
      list.push(list);
      expect(() => encodeCanonical(list)).toThrow(CanonicalEncodingError);
    });

    it("rejects sparse array holes", () => {
      const sparse: unknown[] = [1];
      sparse[2] = 3;
      expect(captureEncodingError(() => encodeCanonical(sparse)).path).toBe("$[1]");
    });
  });
});

describe("sha256Hex", () => {
  it("hashes the canonical encoding", () => {
    expect(sha256Hex({ a: 1 })).toBe(
      "015abd7f5cc57a2dd94b7590f04ad8084273905ee33ec5cebeae62276a97f862",
    );
  });

  it("is independent of key order", () => {
    expect(sha256Hex({ x: 1, y: [true, null] })).toBe(sha256Hex({ y: [true, null], x: 1 }));
  });
});

describe("isPlainObject", () => {
  it("accepts literals and JSON output only", () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject(JSON.parse('{"a":1}'))).toBe(true);
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject("text")).toBe(false);
    expect(isPlainObject(new Date())).toBe(false);
  });
});
