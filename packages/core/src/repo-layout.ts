import path from "node:path";
import {
  assertSafeApplicationName,
  assertSafeEnvironmentName,
} from "@secretplan/shared/lib/identifiers";

export type RepoLayout = {
  repoRoot: string;

  // Local runtime dir (gitignored). Defaults to <repoRoot>/.secretplan.
  runtimeDir: string;

  // Local store creds env file (gitignored). Defaults to <runtimeDir>/env.
  envFilePath: string;

  environmentsDir: string;
  applicationsDir: string;
};

export function getRepoLayout(repoRoot: string, runtimeDir?: string): RepoLayout {
  const resolvedRuntimeDir = runtimeDir ?? path.join(repoRoot, ".secretplan");
  return {
    repoRoot,
    runtimeDir: resolvedRuntimeDir,
    envFilePath: path.join(resolvedRuntimeDir, "env"),
    environmentsDir: path.join(repoRoot, "environments"),
    applicationsDir: path.join(repoRoot, "applications"),
  };
}

export function getEnvironmentConfigPath(layout: RepoLayout, environment: string): string {
  assertSafeEnvironmentName(environment);
  return path.join(layout.environmentsDir, `${environment}.yaml`);
}

export function getApplicationSecretsPath(layout: RepoLayout, application: string): string {
  assertSafeApplicationName(application);
  return path.join(layout.applicationsDir, application, "secrets.yaml");
}

export function getApplicationEnvironmentSecretsPath(layout: RepoLayout, application: string, environment: string): string {
  assertSafeApplicationName(application);
  assertSafeEnvironmentName(environment);
  return path.join(layout.applicationsDir, application, `secrets-${environment}.yaml`);
}
