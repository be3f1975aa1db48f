import fs from "node:fs";
import YAML from "yaml";
import type { z } from "zod";

import { formatUnknown } from "@secretplan/shared/lib/strings";
import {
  getApplicationEnvironmentSecretsPath,
  getApplicationSecretsPath,
  getEnvironmentConfigPath,
  type RepoLayout,
} from "../../repo-layout.js";
import { ApplicationSecretsSchema, buildSecretRequirement, type ApplicationSecrets } from "../secrets/declaration.js";
import type { SecretRequirement } from "../secrets/types.js";
import { ConfigError, formatZodIssues } from "./errors.js";
import { EnvironmentConfigSchema, type StoreConfig } from "./schema.js";

export type Environment = {
  name: string;
  store: StoreConfig;
  applications: string[];
  requirements: SecretRequirement[];
};

function readYamlFile(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, "utf8");
  try {
    return YAML.parse(raw);
  } catch (err) {
    throw new ConfigError(filePath, [`invalid YAML: ${formatUnknown(err, "parse failed")}`]);
  }
}

function parseConfigFile<S extends z.ZodTypeAny>(schema: S, filePath: string): z.output<S> {
  const result = schema.safeParse(readYamlFile(filePath) ?? {});
  if (!result.success) throw new ConfigError(filePath, formatZodIssues(result.error.issues));
  return result.data;
}

/**
 * Secret declarations for one application in one environment.
 *
 * `secrets-<env>.yaml` entries replace base entries with the same key and add
 * new ones after them. An application without a secrets file declares nothing.
 */
export function loadApplicationSecrets(layout: RepoLayout, application: string, environment: string): ApplicationSecrets {
  const basePath = getApplicationSecretsPath(layout, application);
  const overridePath = getApplicationEnvironmentSecretsPath(layout, application, environment);
  const base = fs.existsSync(basePath) ? parseConfigFile(ApplicationSecretsSchema, basePath) : {};
  const overrides = fs.existsSync(overridePath) ? parseConfigFile(ApplicationSecretsSchema, overridePath) : {};
  return { ...base, ...overrides };
}

export function loadEnvironment(layout: RepoLayout, name: string): Environment {
  const configPath = getEnvironmentConfigPath(layout, name);
  if (!fs.existsSync(configPath)) throw new Error(`missing environment config: ${configPath}`);
  const config = parseConfigFile(EnvironmentConfigSchema, configPath);
  if (config.name !== name) {
    throw new ConfigError(configPath, [`name: expected ${name}, got ${config.name}`]);
  }

  const requirements: SecretRequirement[] = [];
  for (const application of config.applications) {
    const declarations = loadApplicationSecrets(layout, application, name);
    for (const [key, declaration] of Object.entries(declarations)) {
      requirements.push(buildSecretRequirement({ application, key, declaration }));
    }
  }

  return {
    name: config.name,
    store: config.store,
    applications: config.applications,
    requirements,
  };
}
