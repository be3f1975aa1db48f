import path from "node:path";
import process from "node:process";
import type { Logger } from "pino";

import { findRepoRoot } from "@secretplan/core/lib/project/repo";
import { loadStoreCreds } from "@secretplan/core/lib/runtime/store-creds";
import { SecretsService } from "@secretplan/core/lib/secrets/service";
import { createSecretStore } from "@secretplan/core/lib/store/index";
import { getRepoLayout, type RepoLayout } from "@secretplan/core/repo-layout";
import { createCliLogger, parseLogLevel } from "./logging/logger.js";

export type SecretsContext = {
  layout: RepoLayout;
  logger: Logger;
  service: SecretsService;
};

export function loadSecretsContext(params: {
  cwd: string;
  repoRoot?: string;
  runtimeDir?: string;
  logLevel?: string;
  env?: NodeJS.ProcessEnv;
}): SecretsContext {
  const env = params.env ?? process.env;
  const repoRoot = params.repoRoot ? path.resolve(params.cwd, params.repoRoot) : findRepoRoot(params.cwd);
  const layout = getRepoLayout(repoRoot, params.runtimeDir);
  const logger = createCliLogger({ level: parseLogLevel(params.logLevel ?? env.SECRETPLAN_LOG_LEVEL, "warn") });
  const service = new SecretsService({
    layout,
    logger,
    // Credentials are read lazily so file-backed stores never need them.
    storeFactory: (environment) =>
      createSecretStore({
        config: environment.store,
        repoRoot: layout.repoRoot,
        creds: environment.store.type === "vault" ? loadStoreCreds({ envFilePath: layout.envFilePath, env }).values : {},
      }),
  });
  return { layout, logger, service };
}
