import type { Logger } from "pino";

import type { RepoLayout } from "../../repo-layout.js";
import { loadEnvironment, type Environment } from "../config/io.js";
import { writeSnapshotFiles } from "../store/export.js";
import type { SecretStore } from "../store/types.js";
import { auditSecrets } from "./audit.js";
import type { SecretGenerators } from "./generators.js";
import { formatAuditReport } from "./report.js";
import { resolveSecrets } from "./resolve.js";
import { applyStaticSecrets, renderStaticSecretsTemplate, type StaticSecrets } from "./static-secrets.js";
import type { AuditReport, SecretRequirement } from "./types.js";

export type SecretStoreFactory = (environment: Environment) => SecretStore;

export type SecretsAuditResult = {
  environment: string;
  report: AuditReport;
  text: string;
};

/** Environment-level secret operations over the repository config and a secret store. */
export class SecretsService {
  private readonly layout: RepoLayout;
  private readonly storeFactory: SecretStoreFactory;
  private readonly generators?: SecretGenerators;
  private readonly logger?: Logger;

  constructor(params: {
    layout: RepoLayout;
    storeFactory: SecretStoreFactory;
    generators?: SecretGenerators;
    logger?: Logger;
  }) {
    this.layout = params.layout;
    this.storeFactory = params.storeFactory;
    this.generators = params.generators;
    this.logger = params.logger?.child({ component: "secrets" });
  }

  listSecrets(envName: string): SecretRequirement[] {
    return loadEnvironment(this.layout, envName).requirements;
  }

  generateStaticTemplate(envName: string): string {
    return renderStaticSecretsTemplate(this.listSecrets(envName));
  }

  /** Resolves the environment's secrets against the store and classifies the differences. */
  async audit(envName: string, opts: { staticSecrets?: StaticSecrets } = {}): Promise<SecretsAuditResult> {
    const environment = loadEnvironment(this.layout, envName);
    const requirements = opts.staticSecrets
      ? applyStaticSecrets(environment.requirements, opts.staticSecrets)
      : environment.requirements;

    const store = this.storeFactory(environment);
    const snapshot = await store.getEnvironmentSecrets(environment.applications);
    this.logger?.debug(
      { environment: envName, applications: environment.applications.length, requirements: requirements.length },
      "loaded store snapshot",
    );

    const resolved = resolveSecrets({ requirements, snapshot, generators: this.generators });
    const report = auditSecrets(resolved, snapshot);
    this.logger?.info(
      {
        environment: envName,
        missing: report.missing.length,
        mismatched: report.mismatched.length,
        unknown: report.unknown.length,
      },
      "audit complete",
    );
    return { environment: envName, report, text: formatAuditReport(report) };
  }

  /** Writes the store's current contents to `<dir>/<application>.json`. */
  async exportStoreSecrets(envName: string, dir: string): Promise<string[]> {
    const environment = loadEnvironment(this.layout, envName);
    const snapshot = await this.storeFactory(environment).getEnvironmentSecrets(environment.applications);
    const written = await writeSnapshotFiles(snapshot, dir);
    this.logger?.info({ environment: envName, files: written.length, dir }, "exported store secrets");
    return written;
  }
}
