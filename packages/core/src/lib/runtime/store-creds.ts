import fs from "node:fs";
import dotenv from "dotenv";

import { trimmedOrUndefined } from "@secretplan/shared/lib/strings";

type StoreCredsKey = "VAULT_ADDR" | "VAULT_TOKEN";

export type StoreCreds = Partial<Record<StoreCredsKey, string>>;
export type StoreCredsSource = "env" | "file" | "unset";

export type StoreCredsResult = {
  envFilePath: string;
  values: StoreCreds;
  sources: Record<StoreCredsKey, StoreCredsSource>;
};

export function validateEnvFileSecurity(
  filePath: string,
  options: { expectedUid?: number } = {},
): { ok: true } | { ok: false; error: string } {
  let st: fs.Stats;
  try {
    st = fs.lstatSync(filePath);
  } catch (e) {
    return { ok: false, error: `cannot stat: ${e instanceof Error ? e.message : String(e)}` };
  }

  if (st.isSymbolicLink()) return { ok: false, error: "refusing to load: is a symlink" };
  if (!st.isFile()) return { ok: false, error: "refusing to load: not a regular file" };

  if ((st.mode & 0o077) !== 0) {
    return { ok: false, error: `refusing to load: insecure permissions (mode ${(st.mode & 0o777).toString(8)}; expected 600)` };
  }

  const expectedUid = options.expectedUid ?? (typeof process.getuid === "function" ? process.getuid() : undefined);
  if (typeof expectedUid === "number" && st.uid !== expectedUid) {
    return { ok: false, error: `refusing to load: wrong owner (uid ${st.uid}; expected ${expectedUid})` };
  }

  return { ok: true };
}

function readEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) return {};
  const check = validateEnvFileSecurity(filePath);
  if (!check.ok) throw new Error(`${check.error}: ${filePath}`);
  return dotenv.parse(fs.readFileSync(filePath, "utf8"));
}

function pickCred(
  key: StoreCredsKey,
  env: NodeJS.ProcessEnv,
  fromFile: Record<string, string>,
): { value?: string; source: StoreCredsSource } {
  const fromEnv = trimmedOrUndefined(env[key]);
  if (fromEnv) return { value: fromEnv, source: "env" };
  const fileValue = trimmedOrUndefined(fromFile[key]);
  if (fileValue) return { value: fileValue, source: "file" };
  return { source: "unset" };
}

/** Store credentials from the process environment, falling back to the runtime env file. */
export function loadStoreCreds(params: { envFilePath: string; env?: NodeJS.ProcessEnv }): StoreCredsResult {
  const env = params.env ?? process.env;
  const fromFile = readEnvFile(params.envFilePath);
  const addr = pickCred("VAULT_ADDR", env, fromFile);
  const token = pickCred("VAULT_TOKEN", env, fromFile);
  const values: StoreCreds = {};
  if (addr.value) values.VAULT_ADDR = addr.value;
  if (token.value) values.VAULT_TOKEN = token.value;
  return {
    envFilePath: params.envFilePath,
    values,
    sources: { VAULT_ADDR: addr.source, VAULT_TOKEN: token.source },
  };
}
