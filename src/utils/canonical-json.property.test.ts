import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { canonicalStringify, type JsonObject, type JsonValue, jsonEquals } from "./canonical-json.js";

/** Rebuild every object with its keys inserted in reverse order. */
function reverseKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(reverseKeys);
  if (typeof value === "object" && value !== null) {
    const out: JsonObject = Object.fromEntries(
      Object.keys(value)
        .reverse()
        .map((key) => [key, reverseKeys(value[key])]),
    );
    return out;
  }
  return value;
}

// Normalised through JSON text so -0 and similar collapse the way they would on the wire.
const jsonValue = fc.jsonValue({ maxDepth: 4 }).map((v): JsonValue => JSON.parse(JSON.stringify(v)));

describe("canonicalStringify property tests", () => {
  it("is independent of key insertion order", () => {
    fc.assert(
      fc.property(jsonValue, (value) => {
        expect(canonicalStringify(reverseKeys(value))).toBe(canonicalStringify(value));
      }),
    );
  });

  it("round-trips through JSON.parse to a structurally equal value", () => {
    fc.assert(
      fc.property(jsonValue, (value) => {
        const parsed: JsonValue = JSON.parse(canonicalStringify(value));
        expect(jsonEquals(parsed, value)).toBe(true);
      }),
    );
  });

  it("agrees with jsonEquals", () => {
    fc.assert(
      fc.property(jsonValue, jsonValue, (a, b) => {
        expect(canonicalStringify(a) === canonicalStringify(b)).toBe(jsonEquals(a, b));
      }),
    );
  });
});
