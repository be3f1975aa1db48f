import { z } from "zod";
import { ApplicationNameSchema, EnvironmentNameSchema } from "@secretplan/shared/lib/identifiers";

export const VaultStoreConfigSchema = z
  .object({
    type: z.literal("vault"),
    // Falls back to VAULT_ADDR when unset.
    url: z.string().trim().url().optional(),
    mount: z.string().trim().min(1).default("secret"),
    path: z.string().trim().min(1),
  })
  .strict();

export const FileStoreConfigSchema = z
  .object({
    type: z.literal("file"),
    dir: z.string().trim().min(1),
  })
  .strict();

export const StoreConfigSchema = z.discriminatedUnion("type", [VaultStoreConfigSchema, FileStoreConfigSchema]);

export type StoreConfig = z.infer<typeof StoreConfigSchema>;

export const EnvironmentConfigSchema = z
  .object({
    name: EnvironmentNameSchema,
    store: StoreConfigSchema,
    applications: z.array(ApplicationNameSchema).default(() => []),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    const seen = new Set<string>();
    cfg.applications.forEach((application, index) => {
      if (seen.has(application)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["applications", index],
          message: `duplicate application: ${application}`,
        });
      }
      seen.add(application);
    });
  });

