import { formatSecretId } from "@secretplan/shared/lib/identifiers";
import type { SecretRef, SecretRequirement } from "./types.js";

export type StuckReason =
  // The referenced application/key is not declared by any requirement.
  | "missing-reference"
  // A derived generator's source resolved, but without a value.
  | "unset-source"
  // The reference is declared but never resolved (a cycle, or a chain ending in a broken entry).
  | "unresolved-dependency";

export type StuckSecret = {
  requirement: SecretRequirement;
  reference: SecretRef;
  reason: StuckReason;
};

function describeStuck(entry: StuckSecret): string {
  const id = formatSecretId(entry.requirement.application, entry.requirement.key);
  const ref = formatSecretId(entry.reference.application, entry.reference.key);
  return `${id} (${entry.requirement.strategy.kind} ${ref}: ${entry.reason})`;
}

export class UnresolvedSecretsError extends Error {
  readonly stuck: readonly StuckSecret[];

  constructor(stuck: readonly StuckSecret[]) {
    super(`unresolved secrets: ${stuck.map(describeStuck).join(", ")}`);
    this.name = "UnresolvedSecretsError";
    this.stuck = stuck;
  }

  get secretIds(): string[] {
    return this.stuck.map((entry) => formatSecretId(entry.requirement.application, entry.requirement.key));
  }
}

export class UnknownGeneratorError extends Error {
  readonly application: string;
  readonly key: string;
  readonly generatorType: string;

  constructor(params: { application: string; key: string; generatorType: string }) {
    super(`unknown generator ${params.generatorType} for ${formatSecretId(params.application, params.key)}`);
    this.name = "UnknownGeneratorError";
    this.application = params.application;
    this.key = params.key;
    this.generatorType = params.generatorType;
  }
}
