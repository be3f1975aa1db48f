import path from "node:path";

import type { StoreConfig } from "../config/schema.js";
import type { StoreCreds } from "../runtime/store-creds.js";
import { FileSecretStore } from "./file-store.js";
import type { SecretStore } from "./types.js";
import { VaultSecretStore, type FetchLike } from "./vault-store.js";

export type { SecretStore } from "./types.js";
export { FileSecretStore } from "./file-store.js";
export { StoreHttpError, VaultSecretStore } from "./vault-store.js";

export function createSecretStore(params: {
  config: StoreConfig;
  repoRoot: string;
  creds: StoreCreds;
  fetchImpl?: FetchLike;
}): SecretStore {
  const { config } = params;
  switch (config.type) {
    case "file":
      return new FileSecretStore(path.resolve(params.repoRoot, config.dir));
    case "vault": {
      const url = config.url ?? params.creds.VAULT_ADDR;
      if (!url) throw new Error("missing vault url (set store.url or VAULT_ADDR)");
      const token = params.creds.VAULT_TOKEN;
      if (!token) throw new Error("missing VAULT_TOKEN");
      return new VaultSecretStore({ url, token, mount: config.mount, path: config.path, fetchImpl: params.fetchImpl });
    }
  }
}
