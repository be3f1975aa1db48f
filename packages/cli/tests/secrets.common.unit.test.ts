import { describe, expect, it } from "vitest";
import { UnresolvedSecretsError } from "@secretplan/core/lib/secrets/errors";
import { buildSecretRequirement } from "@secretplan/core/lib/secrets/declaration";
import { argString, handleUnresolved, renderUnresolvedSecrets } from "../src/commands/secrets/common.js";

const hash = buildSecretRequirement({
  application: "portal",
  key: "admin-password-hash",
  declaration: { description: "Hash.", generate: { type: "sha256-hex", source: "admin-password" } },
});

describe("secrets command helpers", () => {
  it("trims string args", () => {
    expect(argString("  dev ")).toBe("dev");
    expect(argString("   ")).toBeUndefined();
    expect(argString(true)).toBeUndefined();
  });

  it("renders stuck secrets with references and reasons", () => {
    const err = new UnresolvedSecretsError([
      { requirement: hash, reference: { application: "portal", key: "admin-password" }, reason: "unset-source" },
    ]);
    expect(renderUnresolvedSecrets(err)).toBe(
      "Unresolved secrets:\n• portal admin-password-hash (generate from portal admin-password: unset-source)\n",
    );
  });

  it("rethrows errors other than unresolved secrets", () => {
    const err = new Error("boom");
    expect(() => handleUnresolved(err)).toThrow(err);
  });
});
