import fs from "node:fs";
import path from "node:path";

/** Nearest ancestor of `startDir` (inclusive) with an `environments/` directory; `startDir` when none. */
export function findRepoRoot(startDir: string): string {
  let current = path.resolve(startDir);
  for (;;) {
    const environmentsDir = path.join(current, "environments");
    if (fs.existsSync(environmentsDir) && fs.statSync(environmentsDir).isDirectory()) return current;
    const parent = path.dirname(current);
    if (parent === current) return path.resolve(startDir);
    current = parent;
  }
}
