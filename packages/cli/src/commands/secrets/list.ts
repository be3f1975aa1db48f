import process from "node:process";
import { defineCommand } from "citty";

import type { SecretsService } from "@secretplan/core/lib/secrets/service";
import type { SecretRequirement } from "@secretplan/core/lib/secrets/types";
import { formatSecretId } from "@secretplan/shared/lib/identifiers";
import { loadSecretsContext } from "../../lib/context.js";
import { argString, contextArgs, envArg } from "./common.js";

export function describeStrategy(requirement: SecretRequirement): string {
  const strategy = requirement.strategy;
  switch (strategy.kind) {
    case "static":
      return "static";
    case "copy":
      return `copy from ${formatSecretId(strategy.from.application, strategy.from.key)}`;
    case "generate":
      return strategy.generator.kind === "derived"
        ? `generate ${strategy.generator.type} from ${strategy.generator.source}`
        : `generate ${strategy.generator.type}`;
    case "store":
      return "store";
  }
}

export function runSecretsList(params: { service: SecretsService; envName: string; json: boolean }): void {
  const requirements = params.service.listSecrets(params.envName);
  if (params.json) {
    const rows = requirements.map((requirement) => ({
      application: requirement.application,
      key: requirement.key,
      description: requirement.description ?? "",
      strategy: describeStrategy(requirement),
    }));
    console.log(JSON.stringify(rows, null, 2));
    return;
  }
  for (const requirement of requirements) {
    console.log(`${formatSecretId(requirement.application, requirement.key)} (${describeStrategy(requirement)})`);
  }
}

export const secretsList = defineCommand({
  meta: {
    name: "list",
    description: "List the secrets an environment requires.",
  },
  args: {
    ...contextArgs,
    ...envArg,
    json: { type: "boolean", description: "Output JSON.", default: false },
  },
  async run({ args }) {
    const { service } = loadSecretsContext({
      cwd: process.cwd(),
      repoRoot: argString(args.repoRoot),
      runtimeDir: argString(args.runtimeDir),
      logLevel: argString(args.logLevel),
    });
    runSecretsList({ service, envName: args.env, json: Boolean(args.json) });
  },
});
