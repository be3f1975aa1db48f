import { DEFAULT_SECRET_GENERATORS, type SecretGenerators } from "./generators.js";
import { UnknownGeneratorError, UnresolvedSecretsError, type StuckSecret } from "./errors.js";
import { isSet, SecretValue } from "./secret-value.js";
import { getStoredValue } from "./snapshot.js";
import type { ResolvedSecret, ResolvedSet, SecretRef, SecretRequirement, StoreSnapshot } from "./types.js";

function lookupResolved(resolved: ResolvedSet, ref: SecretRef): ResolvedSecret | undefined {
  return resolved.get(ref.application)?.get(ref.key);
}

function placeResolved(resolved: ResolvedSet, secret: ResolvedSecret): void {
  let app = resolved.get(secret.application);
  if (!app) {
    app = new Map();
    resolved.set(secret.application, app);
  }
  if (app.has(secret.key)) return;
  app.set(secret.key, secret);
}

function resolvedAs(requirement: SecretRequirement, value: SecretValue | undefined): ResolvedSecret {
  const out: ResolvedSecret = { application: requirement.application, key: requirement.key };
  if (value !== undefined) out.value = value;
  return out;
}

/**
 * One resolution step for a single requirement.
 *
 * Returns `null` when the requirement depends on a secret that is not resolved yet.
 */
export function tryResolveSecret(params: {
  requirement: SecretRequirement;
  resolved: ResolvedSet;
  currentValue: SecretValue | undefined;
  generators?: SecretGenerators;
}): ResolvedSecret | null {
  const { requirement, resolved, currentValue } = params;
  const generators = params.generators ?? DEFAULT_SECRET_GENERATORS;
  const strategy = requirement.strategy;

  switch (strategy.kind) {
    case "static":
      return resolvedAs(requirement, strategy.value);
    case "copy": {
      const source = lookupResolved(resolved, strategy.from);
      if (!source) return null;
      return resolvedAs(requirement, source.value);
    }
    case "generate": {
      // Never regenerate a secret the store already holds.
      if (isSet(currentValue)) return resolvedAs(requirement, currentValue);
      const rule = strategy.generator;
      if (rule.kind === "independent") {
        const generate = generators.independent[rule.type];
        if (!generate) {
          throw new UnknownGeneratorError({ application: requirement.application, key: requirement.key, generatorType: rule.type });
        }
        return resolvedAs(requirement, new SecretValue(generate()));
      }
      const derive = generators.derived[rule.type];
      if (!derive) {
        throw new UnknownGeneratorError({ application: requirement.application, key: requirement.key, generatorType: rule.type });
      }
      const source = lookupResolved(resolved, { application: requirement.application, key: rule.source });
      if (!source || !isSet(source.value)) return null;
      return resolvedAs(requirement, new SecretValue(derive(source.value.reveal())));
    }
    case "store":
      return resolvedAs(requirement, currentValue);
  }
}

function requirementReference(requirement: SecretRequirement): SecretRef | null {
  const strategy = requirement.strategy;
  if (strategy.kind === "copy") return strategy.from;
  if (strategy.kind === "generate" && strategy.generator.kind === "derived") {
    return { application: requirement.application, key: strategy.generator.source };
  }
  return null;
}

function refId(ref: SecretRef): string {
  return `${ref.application}\u0000${ref.key}`;
}

function classifyStuck(params: {
  requirements: readonly SecretRequirement[];
  pending: readonly number[];
  resolved: ResolvedSet;
}): StuckSecret[] {
  const declared = new Set(params.requirements.map(refId));
  const stuck: StuckSecret[] = [];
  for (const index of params.pending) {
    const requirement = params.requirements[index];
    if (!requirement) continue;
    const reference = requirementReference(requirement);
    if (!reference) continue;
    const reason = !declared.has(refId(reference))
      ? "missing-reference"
      : lookupResolved(params.resolved, reference)
        ? "unset-source"
        : "unresolved-dependency";
    stuck.push({ requirement, reference, reason });
  }
  return stuck;
}

/**
 * Resolves every requirement by repeated passes until nothing is pending.
 *
 * Each pass retries all pending requirements in input order, so forward
 * references resolve on a later pass. A pass that resolves nothing fails with
 * every requirement still pending.
 */
export function resolveSecrets(params: {
  requirements: readonly SecretRequirement[];
  snapshot: StoreSnapshot;
  generators?: SecretGenerators;
}): ResolvedSet {
  const { requirements, snapshot, generators } = params;
  const resolved: ResolvedSet = new Map();
  let pending = requirements.map((_, index) => index);

  while (pending.length > 0) {
    const next: number[] = [];
    for (const index of pending) {
      const requirement = requirements[index];
      if (!requirement) continue;
      const secret = tryResolveSecret({
        requirement,
        resolved,
        currentValue: getStoredValue(snapshot, requirement.application, requirement.key),
        generators,
      });
      if (secret) placeResolved(resolved, secret);
      else next.push(index);
    }
    if (next.length >= pending.length) {
      throw new UnresolvedSecretsError(classifyStuck({ requirements, pending: next, resolved }));
    }
    pending = next;
  }

  return resolved;
}
