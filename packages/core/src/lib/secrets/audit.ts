import { formatSecretId } from "@secretplan/shared/lib/identifiers";
import { sortedKeys } from "@secretplan/shared/lib/strings";
import { revealOrNull, type SecretValue } from "./secret-value.js";
import type { AuditReport, ResolvedSet, StoreSnapshot } from "./types.js";

function copySnapshot(snapshot: StoreSnapshot): Map<string, Map<string, SecretValue | undefined>> {
  const out = new Map<string, Map<string, SecretValue | undefined>>();
  for (const [application, values] of snapshot) out.set(application, new Map(values));
  return out;
}

/**
 * Classifies resolved secrets against the store contents.
 *
 * Visits applications and keys in sorted order so the report does not depend
 * on the order requirements were declared in. Never throws.
 */
export function auditSecrets(resolved: ResolvedSet, snapshot: StoreSnapshot): AuditReport {
  const working = copySnapshot(snapshot);
  const report: AuditReport = { missing: [], mismatched: [], unknown: [] };

  for (const application of sortedKeys(resolved)) {
    const secrets = resolved.get(application);
    if (!secrets) continue;
    const stored = working.get(application);
    for (const key of sortedKeys(secrets)) {
      const secret = secrets.get(key);
      if (!secret) continue;
      const id = formatSecretId(application, key);
      if (stored?.has(key)) {
        if (revealOrNull(secret.value) !== revealOrNull(stored.get(key))) report.mismatched.push(id);
        stored.delete(key);
      } else {
        report.missing.push(id);
      }
    }
  }

  for (const application of sortedKeys(working)) {
    const leftover = working.get(application);
    if (!leftover) continue;
    for (const key of sortedKeys(leftover)) report.unknown.push(formatSecretId(application, key));
  }

  return report;
}

export function isCleanAuditReport(report: AuditReport): boolean {
  return report.missing.length === 0 && report.mismatched.length === 0 && report.unknown.length === 0;
}
