import path from "node:path";

import { sortedKeys } from "@secretplan/shared/lib/strings";
import { revealSnapshotApplication } from "../secrets/snapshot.js";
import type { StoreSnapshot } from "../secrets/types.js";
import { ensureDir, writeFileAtomic } from "../storage/fs-safe.js";
import { getApplicationStoreFile } from "./file-store.js";

/**
 * Dumps store contents as one `<application>.json` per application (keys
 * sorted, unset values as `null`, mode 0600). Returns the written paths.
 */
export async function writeSnapshotFiles(snapshot: StoreSnapshot, dir: string): Promise<string[]> {
  await ensureDir(path.resolve(dir), 0o700);
  const written: string[] = [];
  for (const application of sortedKeys(snapshot)) {
    const values = snapshot.get(application);
    if (!values) continue;
    const filePath = getApplicationStoreFile(dir, application);
    await writeFileAtomic(filePath, `${JSON.stringify(revealSnapshotApplication(values), null, 2)}\n`, { mode: 0o600 });
    written.push(filePath);
  }
  return written;
}
