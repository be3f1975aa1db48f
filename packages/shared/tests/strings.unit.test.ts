import { describe, it, expect } from "vitest";
import { compareStrings, formatUnknown, sortedKeys, trimmedOrUndefined } from "../src/lib/strings.js";

describe("strings", () => {
  it("trimmedOrUndefined drops blank values", () => {
    expect(trimmedOrUndefined("  x ")).toBe("x");
    expect(trimmedOrUndefined("   ")).toBeUndefined();
    expect(trimmedOrUndefined(undefined)).toBeUndefined();
    expect(trimmedOrUndefined(8200)).toBe("8200");
  });

  it("compareStrings orders by code unit", () => {
    expect(["b", "B", "a"].sort(compareStrings)).toEqual(["B", "a", "b"]);
    expect(compareStrings("x", "x")).toBe(0);
  });

  it("sortedKeys returns map keys in order", () => {
    const map = new Map([
      ["zeta", 1],
      ["alpha", 2],
    ]);
    expect(sortedKeys(map)).toEqual(["alpha", "zeta"]);
  });

  it("formatUnknown prefers error messages", () => {
    expect(formatUnknown(new Error(" boom "))).toBe("boom");
    expect(formatUnknown(new Error(""), "fallback")).toBe("fallback");
    expect(formatUnknown({}, "fallback")).toBe("fallback");
  });
});
