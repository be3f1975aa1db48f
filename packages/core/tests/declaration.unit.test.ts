import { describe, expect, it } from "vitest";
import { ApplicationSecretsSchema, secretStrategy } from "../src/lib/secrets/declaration.js";

describe("secretStrategy", () => {
  it("picks static over copy and generate", () => {
    const strategy = secretStrategy({
      description: "d",
      value: "v",
      copy: { application: "a", key: "x" },
      generate: { type: "password" },
    });
    expect(strategy.kind).toBe("static");
    expect(strategy.kind === "static" && strategy.value.reveal()).toBe("v");
  });

  it("picks copy over generate", () => {
    expect(
      secretStrategy({ description: "d", copy: { application: "a", key: "x" }, generate: { type: "password" } }),
    ).toEqual({ kind: "copy", from: { application: "a", key: "x" } });
  });

  it("treats an empty static value as absent", () => {
    expect(secretStrategy({ description: "d", value: "", generate: { type: "token" } })).toEqual({
      kind: "generate",
      generator: { kind: "independent", type: "token" },
    });
  });

  it("builds a derived generator rule from a source", () => {
    expect(secretStrategy({ description: "d", generate: { type: "sha256-hex", source: "password" } })).toEqual({
      kind: "generate",
      generator: { kind: "derived", type: "sha256-hex", source: "password" },
    });
  });

  it("falls back to the store", () => {
    expect(secretStrategy({ description: "d" })).toEqual({ kind: "store" });
  });
});

describe("ApplicationSecretsSchema", () => {
  it("rejects a derived generator without a source", () => {
    const result = ApplicationSecretsSchema.safeParse({ hash: { description: "d", generate: { type: "sha256-hex" } } });
    expect(result.success).toBe(false);
  });

  it("rejects a source on an independent generator", () => {
    const result = ApplicationSecretsSchema.safeParse({
      session: { description: "d", generate: { type: "password", source: "other" } },
    });
    expect(result.success).toBe(false);
  });

  it("rejects unknown fields", () => {
    const result = ApplicationSecretsSchema.safeParse({ token: { description: "d", onepassword: true } });
    expect(result.success).toBe(false);
  });

  it("accepts copy rules", () => {
    const result = ApplicationSecretsSchema.safeParse({
      token: { description: "Shared token", copy: { application: "auth", key: "bootstrap-token" } },
    });
    expect(result.success).toBe(true);
  });
});
