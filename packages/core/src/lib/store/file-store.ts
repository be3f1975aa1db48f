import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { assertSafeApplicationName } from "@secretplan/shared/lib/identifiers";
import { pathExists } from "../storage/fs-safe.js";
import { secretValue, type SecretValue } from "../secrets/secret-value.js";
import type { StoreSnapshot } from "../secrets/types.js";
import type { SecretStore } from "./types.js";

const ApplicationFileSchema = z.record(z.string(), z.string().nullable());

export function getApplicationStoreFile(dir: string, application: string): string {
  assertSafeApplicationName(application);
  return path.join(dir, `${application}.json`);
}

/**
 * Store kept as one `<application>.json` file per application, in the format
 * written by `writeSnapshotFiles`. `null` marks a key with no value.
 */
export class FileSecretStore implements SecretStore {
  constructor(private readonly dir: string) {}

  async getEnvironmentSecrets(applications: readonly string[]): Promise<StoreSnapshot> {
    const out = new Map<string, Map<string, SecretValue | undefined>>();
    for (const application of applications) {
      out.set(application, await this.readApplication(application));
    }
    return out;
  }

  private async readApplication(application: string): Promise<Map<string, SecretValue | undefined>> {
    const filePath = getApplicationStoreFile(this.dir, application);
    const values = new Map<string, SecretValue | undefined>();
    if (!(await pathExists(filePath))) return values;

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(filePath, "utf8"));
    } catch {
      throw new Error(`invalid JSON: ${filePath}`);
    }
    const parsed = ApplicationFileSchema.safeParse(raw);
    if (!parsed.success) throw new Error(`invalid store file (expected string or null values): ${filePath}`);

    for (const [key, value] of Object.entries(parsed.data)) {
      values.set(key, secretValue(value));
    }
    return values;
  }
}
