import fs from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";

export function makeRepo(files: Record<string, string>): string {
  const repoRoot = fs.mkdtempSync(path.join(tmpdir(), "secretplan-cli-"));
  for (const [relPath, contents] of Object.entries(files)) {
    const filePath = path.join(repoRoot, relPath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, contents, "utf8");
  }
  return repoRoot;
}

export const CLI_REPO: Record<string, string> = {
  "environments/dev.yaml": "name: dev\nstore:\n  type: file\n  dir: store/dev\napplications: [svc]\n",
  "applications/svc/secrets.yaml": [
    "token:",
    "  description: API token.",
    "api-key:",
    "  description: Upstream API key.",
    "mirror:",
    "  description: Copy of token.",
    "  copy:",
    "    application: svc",
    "    key: token",
    "",
  ].join("\n"),
  "store/dev/svc.json": JSON.stringify({ token: "abc", mirror: "xyz", legacy: "old" }),
};
