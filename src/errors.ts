export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class IssueNotFoundError extends Error {
  constructor(repo: string, issueNumber: number) {
    super(`Issue #${issueNumber} not found in ${repo}`);
    this.name = "IssueNotFoundError";
  }
}

export class RateLimitError extends Error {
  readonly resetAt: Date;

  constructor(resetAt: Date) {
    super(
      `GitHub API rate limit exceeded. Resets at ${resetAt.toISOString()}. ` +
        "Pass a GitHub token for higher limits.",
    );
    this.name = "RateLimitError";
    this.resetAt = resetAt;
  }
}

export class AnalysisError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AnalysisError";
  }
}

/** HTTP status carried by Octokit request errors and fetch wrappers, if any. */
export function errorStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/** A response header carried by an Octokit request error, if any. Header names are lower-case. */
export function errorHeader(err: unknown, name: string): string | undefined {
  if (typeof err !== "object" || err === null || !("response" in err)) return undefined;
  const { response } = err;
  if (typeof response !== "object" || response === null || !("headers" in response)) return undefined;
  const { headers } = response;
  if (typeof headers !== "object" || headers === null) return undefined;
  const value: unknown = Reflect.get(headers, name);
  return typeof value === "string" || typeof value === "number" ? String(value) : undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
