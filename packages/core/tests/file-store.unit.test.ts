import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { snapshotFromRecord } from "../src/lib/secrets/snapshot.js";
import { writeSnapshotFiles } from "../src/lib/store/export.js";
import { FileSecretStore } from "../src/lib/store/file-store.js";
import { makeTempDir } from "./helpers/repo.js";

describe("FileSecretStore", () => {
  it("reads per-application JSON files and treats absent ones as empty", async () => {
    const dir = makeTempDir("file-store");
    fs.writeFileSync(path.join(dir, "auth.json"), JSON.stringify({ token: "abc", unset: null }), "utf8");
    const snapshot = await new FileSecretStore(dir).getEnvironmentSecrets(["auth", "portal"]);
    expect(snapshot.get("auth")?.get("token")?.reveal()).toBe("abc");
    expect(snapshot.get("auth")?.has("unset")).toBe(true);
    expect(snapshot.get("auth")?.get("unset")).toBeUndefined();
    expect(snapshot.get("portal")?.size).toBe(0);
  });

  it("rejects invalid JSON", async () => {
    const dir = makeTempDir("file-store");
    fs.writeFileSync(path.join(dir, "auth.json"), "{", "utf8");
    await expect(new FileSecretStore(dir).getEnvironmentSecrets(["auth"])).rejects.toThrow(/^invalid JSON: /);
  });

  it("rejects non-string values", async () => {
    const dir = makeTempDir("file-store");
    fs.writeFileSync(path.join(dir, "auth.json"), JSON.stringify({ token: 1 }), "utf8");
    await expect(new FileSecretStore(dir).getEnvironmentSecrets(["auth"])).rejects.toThrow(/invalid store file/);
  });
});

describe("writeSnapshotFiles", () => {
  it("writes sorted per-application files readable by FileSecretStore", async () => {
    const dir = path.join(makeTempDir("export"), "out");
    const snapshot = snapshotFromRecord({ portal: { b: "2", a: null }, auth: { token: "abc" } });
    const written = await writeSnapshotFiles(snapshot, dir);

    expect(written).toEqual([path.join(dir, "auth.json"), path.join(dir, "portal.json")]);
    expect(fs.readFileSync(path.join(dir, "portal.json"), "utf8")).toBe('{\n  "a": null,\n  "b": "2"\n}\n');
    expect(fs.statSync(path.join(dir, "auth.json")).mode & 0o777).toBe(0o600);

    const reread = await new FileSecretStore(dir).getEnvironmentSecrets(["auth", "portal"]);
    expect(reread.get("auth")?.get("token")?.reveal()).toBe("abc");
    expect(reread.get("portal")?.has("a")).toBe(true);
  });
});
