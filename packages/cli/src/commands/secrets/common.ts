import process from "node:process";
import { UnresolvedSecretsError } from "@secretplan/core/lib/secrets/errors";
import { formatSecretId } from "@secretplan/shared/lib/identifiers";

export const contextArgs = {
  repoRoot: { type: "string", description: "Repository root (default: nearest parent with environments/)." },
  runtimeDir: { type: "string", description: "Runtime directory (default: <repoRoot>/.secretplan)." },
  logLevel: { type: "string", description: "Log level (fatal|error|warn|info|debug|trace|silent)." },
} as const;

export const envArg = {
  env: { type: "string", description: "Environment name (environments/<env>.yaml).", required: true },
} as const;

export function argString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** One line per stuck secret; never includes values. */
export function renderUnresolvedSecrets(err: UnresolvedSecretsError): string {
  const lines = ["Unresolved secrets:"];
  for (const entry of err.stuck) {
    const id = formatSecretId(entry.requirement.application, entry.requirement.key);
    const ref = formatSecretId(entry.reference.application, entry.reference.key);
    lines.push(`• ${id} (${entry.requirement.strategy.kind} from ${ref}: ${entry.reason})`);
  }
  return `${lines.join("\n")}\n`;
}

/** Prints resolution failures and returns exit code 1; rethrows anything else. */
export function handleUnresolved(err: unknown): number {
  if (!(err instanceof UnresolvedSecretsError)) throw err;
  process.stderr.write(renderUnresolvedSecrets(err));
  return 1;
}
