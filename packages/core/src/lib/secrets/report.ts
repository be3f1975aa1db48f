import type { AuditReport } from "./types.js";

const SECTIONS = [
  ["missing", "Missing secrets"],
  ["mismatched", "Incorrect secrets"],
  ["unknown", "Unknown secrets in Vault"],
] as const satisfies ReadonlyArray<readonly [keyof AuditReport, string]>;

export function formatAuditReport(report: AuditReport): string {
  let out = "";
  for (const [field, heading] of SECTIONS) {
    const entries = report[field];
    if (entries.length === 0) continue;
    out += `${heading}:\n${entries.map((entry) => `• ${entry}\n`).join("")}`;
  }
  return out;
}
