import path from "node:path";
import process from "node:process";
import { defineCommand } from "citty";

import { loadSecretsContext } from "../../lib/context.js";
import { argString, contextArgs, envArg } from "./common.js";

export const secretsExport = defineCommand({
  meta: {
    name: "export",
    description: "Write the store's current secrets to <output>/<application>.json.",
  },
  args: {
    ...contextArgs,
    ...envArg,
    output: { type: "string", description: "Output directory.", required: true },
  },
  async run({ args }) {
    const cwd = process.cwd();
    const { service } = loadSecretsContext({
      cwd,
      repoRoot: argString(args.repoRoot),
      runtimeDir: argString(args.runtimeDir),
      logLevel: argString(args.logLevel),
    });
    const written = await service.exportStoreSecrets(args.env, path.resolve(cwd, args.output));
    for (const filePath of written) console.log(filePath);
  },
});
