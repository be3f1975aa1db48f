import path from "node:path";
import process from "node:process";
import { defineCommand } from "citty";

import { writeFileAtomic } from "@secretplan/core/lib/storage/fs-safe";
import { loadSecretsContext } from "../../lib/context.js";
import { argString, contextArgs, envArg } from "./common.js";

export const secretsStaticTemplate = defineCommand({
  meta: {
    name: "static-template",
    description: "Print a YAML template for the secrets only an operator can provide.",
  },
  args: {
    ...contextArgs,
    ...envArg,
    output: { type: "string", description: "Write the template to this file instead of stdout." },
  },
  async run({ args }) {
    const cwd = process.cwd();
    const { service, logger } = loadSecretsContext({
      cwd,
      repoRoot: argString(args.repoRoot),
      runtimeDir: argString(args.runtimeDir),
      logLevel: argString(args.logLevel),
    });
    const template = service.generateStaticTemplate(args.env);
    const output = argString(args.output);
    if (!output) {
      process.stdout.write(template);
      return;
    }
    const filePath = path.resolve(cwd, output);
    await writeFileAtomic(filePath, template, { mode: 0o600 });
    logger.info({ file: filePath }, "wrote static secrets template");
  },
});
