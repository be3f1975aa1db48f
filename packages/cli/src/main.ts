#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import process from "node:process";
import { pathToFileURL } from "node:url";
import { defineCommand, runMain } from "citty";

import { formatUnknown } from "@secretplan/shared/lib/strings";
import { baseCommands } from "./commands/registry.js";
import { readCliVersion } from "./lib/version.js";

export const main = defineCommand({
  meta: {
    name: "secretplan",
    description: "Resolve declared environment secrets and audit them against the secret store.",
  },
  subCommands: baseCommands,
});

export async function mainEntry(): Promise<void> {
  const [nodeBin = "node", script = "secretplan", ...rest] = process.argv;
  const normalized = rest.filter((a) => a !== "--");
  if (normalized.includes("--version") || normalized.includes("-v")) {
    console.log(readCliVersion());
    return;
  }
  process.argv = [nodeBin, script, ...normalized];
  await runMain(main);
}

// npm links the bin into node_modules/.bin, so compare real paths.
export function isMainModule(entry: string | undefined, moduleUrl: string): boolean {
  if (!entry) return false;
  const resolved = path.resolve(entry);
  const real = fs.existsSync(resolved) ? fs.realpathSync(resolved) : resolved;
  return pathToFileURL(real).href === moduleUrl;
}

if (isMainModule(process.argv[1], import.meta.url)) {
  mainEntry().catch((err: unknown) => {
    console.error(formatUnknown(err, "secretplan failed"));
    if (process.env.SECRETPLAN_DEBUG === "1" && err instanceof Error && err.stack) {
      console.error(err.stack);
    }
    process.exitCode = 1;
  });
}
