import type { ConfigIssue } from "./types.js";

export class ConfigError extends Error {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[], source?: string) {
    const where = source ? ` in ${source}` : "";
    super(
      `Invalid configuration${where}: ${issues
        .map((issue) => issue.message)
        .join("; ")}`,
    );
    this.name = "ConfigError";
    this.issues = issues;
  }

  /** First offending key. */
  get key(): string | undefined {
    return this.issues[0]?.key;
  }
}
