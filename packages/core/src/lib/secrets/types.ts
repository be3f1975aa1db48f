import type { SecretValue } from "./secret-value.js";

export type SecretRef = {
  application: string;
  key: string;
};

export type GeneratorRule =
  | { kind: "independent"; type: string }
  // `source` names a key in the same application.
  | { kind: "derived"; type: string; source: string };

export type SecretStrategy =
  | { kind: "static"; value: SecretValue }
  | { kind: "copy"; from: SecretRef }
  | { kind: "generate"; generator: GeneratorRule }
  | { kind: "store" };

export type SecretRequirement = SecretRef & {
  description?: string;
  strategy: SecretStrategy;
};

export type ResolvedSecret = SecretRef & {
  // Absent: required but no value known yet. Audit reports it, resolution does not fail.
  value?: SecretValue;
};

export type ResolvedSet = Map<string, Map<string, ResolvedSecret>>;

export type StoreSnapshot = ReadonlyMap<string, ReadonlyMap<string, SecretValue | undefined>>;

export type AuditReport = {
  missing: string[];
  mismatched: string[];
  unknown: string[];
};
