import { defineCommand } from "citty";
import { secretsAudit } from "./audit.js";
import { secretsExport } from "./export.js";
import { secretsList } from "./list.js";
import { secretsStaticTemplate } from "./static-template.js";

export const secrets = defineCommand({
  meta: {
    name: "secrets",
    description: "Resolve, audit and export environment secrets.",
  },
  subCommands: {
    audit: secretsAudit,
    list: secretsList,
    "static-template": secretsStaticTemplate,
    export: secretsExport,
  },
});
