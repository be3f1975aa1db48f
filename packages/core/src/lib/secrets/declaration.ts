import { z } from "zod";

import { ApplicationNameSchema, SecretKeySchema } from "@secretplan/shared/lib/identifiers";
import { DERIVED_GENERATOR_TYPES, INDEPENDENT_GENERATOR_TYPES } from "./generators.js";
import { SecretValue } from "./secret-value.js";
import type { SecretRequirement, SecretStrategy } from "./types.js";

export const SecretCopyRulesSchema = z
  .object({
    application: ApplicationNameSchema,
    key: SecretKeySchema,
  })
  .strict();

export const IndependentGenerateRulesSchema = z
  .object({
    type: z.enum(INDEPENDENT_GENERATOR_TYPES),
  })
  .strict();

export const DerivedGenerateRulesSchema = z
  .object({
    type: z.enum(DERIVED_GENERATOR_TYPES),
    source: SecretKeySchema,
  })
  .strict();

export const SecretGenerateRulesSchema = z.union([IndependentGenerateRulesSchema, DerivedGenerateRulesSchema]);

export const SecretDeclarationSchema = z
  .object({
    description: z.string().trim().min(1),
    value: z.string().optional(),
    copy: SecretCopyRulesSchema.optional(),
    generate: SecretGenerateRulesSchema.optional(),
  })
  .strict();

export type SecretDeclaration = z.infer<typeof SecretDeclarationSchema>;

export const ApplicationSecretsSchema = z.record(SecretKeySchema, SecretDeclarationSchema);

export type ApplicationSecrets = z.infer<typeof ApplicationSecretsSchema>;

/** Picks the single active strategy: static value, then copy, then generate, then store. */
export function secretStrategy(declaration: SecretDeclaration): SecretStrategy {
  if (declaration.value) return { kind: "static", value: new SecretValue(declaration.value) };
  if (declaration.copy) {
    return { kind: "copy", from: { application: declaration.copy.application, key: declaration.copy.key } };
  }
  const generate = declaration.generate;
  if (generate) {
    if ("source" in generate) {
      return { kind: "generate", generator: { kind: "derived", type: generate.type, source: generate.source } };
    }
    return { kind: "generate", generator: { kind: "independent", type: generate.type } };
  }
  return { kind: "store" };
}

export function buildSecretRequirement(params: {
  application: string;
  key: string;
  declaration: SecretDeclaration;
}): SecretRequirement {
  return {
    application: params.application,
    key: params.key,
    description: params.declaration.description,
    strategy: secretStrategy(params.declaration),
  };
}
