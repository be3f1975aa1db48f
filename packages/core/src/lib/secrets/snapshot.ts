import { sortedKeys } from "@secretplan/shared/lib/strings";
import { secretValue, type SecretValue } from "./secret-value.js";
import type { StoreSnapshot } from "./types.js";

export type StoreSnapshotRecord = Record<string, Record<string, string | null>>;

// An application the store has never seen reads as empty.
export function getStoredValue(snapshot: StoreSnapshot, application: string, key: string): SecretValue | undefined {
  return snapshot.get(application)?.get(key);
}

export function snapshotFromRecord(record: StoreSnapshotRecord): StoreSnapshot {
  const out = new Map<string, Map<string, SecretValue | undefined>>();
  for (const [application, values] of Object.entries(record)) {
    const app = new Map<string, SecretValue | undefined>();
    for (const [key, value] of Object.entries(values)) {
      app.set(key, secretValue(value));
    }
    out.set(application, app);
  }
  return out;
}

/** Plaintext view with sorted keys, for export files. */
export function revealSnapshotApplication(
  values: ReadonlyMap<string, SecretValue | undefined>,
): Record<string, string | null> {
  const out: Record<string, string | null> = {};
  for (const key of sortedKeys(values)) {
    const value = values.get(key);
    out[key] = value ? value.reveal() : null;
  }
  return out;
}
