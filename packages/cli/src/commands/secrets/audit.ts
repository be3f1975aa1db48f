import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { defineCommand } from "citty";

import { isCleanAuditReport } from "@secretplan/core/lib/secrets/audit";
import type { SecretsAuditResult, SecretsService } from "@secretplan/core/lib/secrets/service";
import { parseStaticSecrets } from "@secretplan/core/lib/secrets/static-secrets";
import { loadSecretsContext } from "../../lib/context.js";
import { argString, contextArgs, envArg, handleUnresolved } from "./common.js";

export async function runSecretsAudit(params: {
  service: SecretsService;
  envName: string;
  staticSecretsFile?: string;
  json: boolean;
}): Promise<number> {
  const staticSecrets = params.staticSecretsFile
    ? parseStaticSecrets(fs.readFileSync(params.staticSecretsFile, "utf8"))
    : undefined;

  let result: SecretsAuditResult;
  try {
    result = await params.service.audit(params.envName, { staticSecrets });
  } catch (err) {
    return handleUnresolved(err);
  }

  if (params.json) {
    console.log(JSON.stringify({ environment: result.environment, ...result.report }, null, 2));
  } else if (result.text) {
    process.stdout.write(result.text);
  }
  return isCleanAuditReport(result.report) ? 0 : 1;
}

export const secretsAudit = defineCommand({
  meta: {
    name: "audit",
    description: "Compare resolved secrets with the store (missing / incorrect / unknown).",
  },
  args: {
    ...contextArgs,
    ...envArg,
    secrets: { type: "string", description: "Static secrets YAML (filled-in output of static-template)." },
    json: { type: "boolean", description: "Output JSON.", default: false },
  },
  async run({ args }) {
    const cwd = process.cwd();
    const { service } = loadSecretsContext({
      cwd,
      repoRoot: argString(args.repoRoot),
      runtimeDir: argString(args.runtimeDir),
      logLevel: argString(args.logLevel),
    });
    const secretsFile = argString(args.secrets);
    process.exitCode = await runSecretsAudit({
      service,
      envName: args.env,
      staticSecretsFile: secretsFile ? path.resolve(cwd, secretsFile) : undefined,
      json: Boolean(args.json),
    });
  },
});
