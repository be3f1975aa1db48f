import { z } from "zod";

import { detectKnownToken } from "./token-patterns.js";

const SAFE_APPLICATION_NAME_RE = /^[a-z0-9][a-z0-9-]*$/;
const SAFE_ENVIRONMENT_NAME_RE = /^[a-z0-9][a-z0-9._-]*$/;
const SAFE_SECRET_KEY_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export const ApplicationNameSchema = z
  .string()
  .trim()
  .min(1)
  .refine((v) => SAFE_APPLICATION_NAME_RE.test(v), { message: "invalid application name (use [a-z0-9][a-z0-9-]*)" });

export const EnvironmentNameSchema = z
  .string()
  .trim()
  .min(1)
  .refine((v) => SAFE_ENVIRONMENT_NAME_RE.test(v), { message: "invalid environment name (use [a-z0-9][a-z0-9._-]*)" })
  .refine((v) => v !== "." && v !== "..", { message: "invalid environment name" });

export const SecretKeySchema = z
  .string()
  .trim()
  .min(1)
  .refine((v) => SAFE_SECRET_KEY_RE.test(v), { message: "invalid secret key (use [A-Za-z0-9][A-Za-z0-9._-]*)" })
  .refine((v) => !detectKnownToken(v), {
    message: "invalid secret key (looks like a token; expected identifier like session-secret)",
  });

export function assertSafeApplicationName(name: string): void {
  void ApplicationNameSchema.parse(name);
}

export function assertSafeEnvironmentName(name: string): void {
  void EnvironmentNameSchema.parse(name);
}

/** `"application key"`, the only form in which a secret is ever named in output. */
export function formatSecretId(application: string, key: string): string {
  return `${application} ${key}`;
}
