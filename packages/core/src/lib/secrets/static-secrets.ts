import YAML from "yaml";
import { z } from "zod";

import { ApplicationNameSchema, SecretKeySchema } from "@secretplan/shared/lib/identifiers";
import { SecretValue } from "./secret-value.js";
import type { SecretRequirement } from "./types.js";

export const StaticSecretEntrySchema = z
  .object({
    description: z.string().optional(),
    value: z.string().nullable().default(null),
  })
  .strict();

export const StaticSecretsSchema = z.record(ApplicationNameSchema, z.record(SecretKeySchema, StaticSecretEntrySchema));

export type StaticSecrets = z.infer<typeof StaticSecretsSchema>;

/**
 * YAML template with an empty slot for every secret that only the store (or
 * an operator) can provide.
 */
export function renderStaticSecretsTemplate(requirements: readonly SecretRequirement[]): string {
  const template: Record<string, Record<string, { description: string; value: null }>> = {};
  for (const requirement of requirements) {
    if (requirement.strategy.kind !== "store") continue;
    const app = (template[requirement.application] ??= {});
    app[requirement.key] = { description: requirement.description ?? "", value: null };
  }
  return YAML.stringify(template, { lineWidth: 72 });
}

export function parseStaticSecrets(text: string): StaticSecrets {
  const parsed: unknown = YAML.parse(text);
  return StaticSecretsSchema.parse(parsed ?? {});
}

/** Turns store-only requirements with a supplied value into static ones. */
export function applyStaticSecrets(
  requirements: readonly SecretRequirement[],
  staticSecrets: StaticSecrets,
): SecretRequirement[] {
  return requirements.map((requirement) => {
    if (requirement.strategy.kind !== "store") return requirement;
    const value = staticSecrets[requirement.application]?.[requirement.key]?.value;
    if (typeof value !== "string" || value === "") return requirement;
    return { ...requirement, strategy: { kind: "static", value: new SecretValue(value) } };
  });
}
