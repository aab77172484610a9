import type { Logger } from "pino";
import { errorMessage } from "./errors.js";
import type { RateLimitStatus } from "./github.js";

export interface HealthDeps {
  logger: Logger;
  checkRateLimit(token?: string): Promise<RateLimitStatus>;
  llmConfigured: boolean;
}

export interface DependencyHealth {
  openai_api_configured: boolean;
  github_api_accessible: boolean;
}

/** Never throws: an unreachable GitHub API is reported, not raised. */
export async function checkDependencies(deps: HealthDeps): Promise<DependencyHealth> {
  let githubAccessible = true;
  try {
    await deps.checkRateLimit();
  } catch (err) {
    deps.logger.warn({ err: errorMessage(err) }, "Health check: GitHub API unreachable");
    githubAccessible = false;
  }
  return { openai_api_configured: deps.llmConfigured, github_api_accessible: githubAccessible };
}
