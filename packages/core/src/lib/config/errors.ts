import type { ZodIssue } from "zod";

export function formatZodIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

export class ConfigError extends Error {
  readonly filePath: string;
  readonly issues: readonly string[];

  constructor(filePath: string, issues: readonly string[]) {
    super(`invalid config ${filePath}: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.filePath = filePath;
    this.issues = issues;
  }
}
