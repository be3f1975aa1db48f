import { z } from "zod";

import { mapWithConcurrency } from "../runtime/concurrency.js";
import { SecretValue } from "../secrets/secret-value.js";
import type { StoreSnapshot } from "../secrets/types.js";
import type { SecretStore } from "./types.js";

export const VAULT_REQUEST_TIMEOUT_MS = 15_000;
const VAULT_ERROR_BODY_LIMIT_BYTES = 4 * 1024;
const VAULT_READ_CONCURRENCY = 4;

export class StoreHttpError extends Error {
  readonly status: number;
  readonly path: string;
  readonly bodyText: string;

  constructor(message: string, params: { status: number; path: string; bodyText: string }) {
    super(`${message}: ${params.path}: HTTP ${params.status}: ${params.bodyText}`);
    this.name = "StoreHttpError";
    this.status = params.status;
    this.path = params.path;
    this.bodyText = params.bodyText;
  }
}

const VaultKvReadResponseSchema = z.object({
  data: z.object({
    data: z.record(z.string(), z.unknown()).nullable(),
  }),
});

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

async function readResponseTextLimited(res: Response, limitBytes: number): Promise<string> {
  const text = await res.text();
  const bytes = Buffer.from(text, "utf8");
  if (bytes.byteLength <= limitBytes) return text;
  return `${bytes.subarray(0, limitBytes).toString("utf8")}...(truncated)`;
}

function joinVaultPath(...segments: string[]): string {
  return segments
    .flatMap((segment) => segment.split("/"))
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join("/");
}

// Vault keeps JSON values; scalars compare by their string form.
function storedValue(value: unknown): SecretValue | undefined {
  if (typeof value === "string") return new SecretValue(value);
  if (typeof value === "number" || typeof value === "boolean") return new SecretValue(String(value));
  return undefined;
}

/**
 * KV version 2 client; one Vault secret per application under `<mount>/<path>/<application>`.
 *
 * Numbers and booleans are read as their string form. Nulls, arrays and nested
 * objects are read as present with no value.
 */
export class VaultSecretStore implements SecretStore {
  private readonly url: string;
  private readonly token: string;
  private readonly mount: string;
  private readonly path: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(params: {
    url: string;
    token: string;
    mount: string;
    path: string;
    fetchImpl?: FetchLike;
    timeoutMs?: number;
  }) {
    this.url = params.url.replace(/\/+$/, "");
    this.token = params.token;
    this.mount = params.mount;
    this.path = params.path;
    this.fetchImpl = params.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = params.timeoutMs ?? VAULT_REQUEST_TIMEOUT_MS;
  }

  async getEnvironmentSecrets(applications: readonly string[]): Promise<StoreSnapshot> {
    const entries = await mapWithConcurrency({
      items: applications,
      concurrency: VAULT_READ_CONCURRENCY,
      fn: async (application) => [application, await this.readApplication(application)] as const,
    });
    return new Map(entries);
  }

  async readApplication(application: string): Promise<Map<string, SecretValue | undefined>> {
    const apiPath = `/v1/${joinVaultPath(this.mount, "data", this.path, application)}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeoutMs);

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.url}${apiPath}`, {
        method: "GET",
        headers: { "X-Vault-Token": this.token, Accept: "application/json" },
        signal: controller.signal,
      });
    } catch (err) {
      const bodyText = controller.signal.aborted
        ? `request timed out after ${this.timeoutMs}ms`
        : err instanceof Error
          ? err.message
          : String(err);
      throw new StoreHttpError("vault read failed", { status: 0, path: apiPath, bodyText });
    } finally {
      clearTimeout(timeoutId);
    }

    // Nothing stored yet for a newly added application.
    if (res.status === 404) return new Map();
    if (!res.ok) {
      const bodyText = await readResponseTextLimited(res, VAULT_ERROR_BODY_LIMIT_BYTES);
      throw new StoreHttpError("vault read failed", { status: res.status, path: apiPath, bodyText });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new StoreHttpError("vault read failed", { status: res.status, path: apiPath, bodyText: "response is not JSON" });
    }
    const parsed = VaultKvReadResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new StoreHttpError("vault read failed", { status: res.status, path: apiPath, bodyText: "unexpected response shape" });
    }

    const out = new Map<string, SecretValue | undefined>();
    for (const [key, value] of Object.entries(parsed.data.data.data ?? {})) {
      out.set(key, storedValue(value));
    }
    return out;
  }
}
