import { inspect } from "node:util";
import { describe, expect, it } from "vitest";
import { isSet, revealOrNull, SecretValue, secretValue } from "../src/lib/secrets/secret-value.js";

describe("SecretValue", () => {
  it("reveals the plaintext only on request", () => {
    const value = new SecretValue("test-secret");
    expect(value.reveal()).toBe("test-secret");
    expect(String(value)).toBe("**********");
    expect(`${value}`).toBe("**********");
  });

  it("masks itself in JSON and inspect output", () => {
    const value = new SecretValue("test-secret");
    expect(JSON.stringify({ value })).toBe('{"value":"**********"}');
    expect(inspect({ value })).toBe("{ value: SecretValue(**********) }");
  });

  it("treats empty plaintext as unset", () => {
    expect(isSet(new SecretValue(""))).toBe(false);
    expect(isSet(undefined)).toBe(false);
    expect(isSet(new SecretValue("x"))).toBe(true);
  });

  it("secretValue maps null and undefined to undefined", () => {
    expect(secretValue(null)).toBeUndefined();
    expect(secretValue(undefined)).toBeUndefined();
    expect(secretValue("x")?.reveal()).toBe("x");
  });

  it("revealOrNull distinguishes absent from empty", () => {
    expect(revealOrNull(undefined)).toBeNull();
    expect(revealOrNull(new SecretValue(""))).toBe("");
  });
});
