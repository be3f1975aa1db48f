import type { StoreSnapshot } from "../secrets/types.js";

export interface SecretStore {
  /** Current contents for the given applications; an application with nothing stored maps to an empty map. */
  getEnvironmentSecrets(applications: readonly string[]): Promise<StoreSnapshot>;
}
