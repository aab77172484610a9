import { Octokit } from "@octokit/rest";
import type { Logger } from "pino";
import { IssueNotFoundError, RateLimitError, errorHeader, errorStatus } from "./errors.js";
import type { GitHubIssue, IssueRecord, IssueSource, RateLimitInfo } from "./types.js";

const MAX_TEXT_LENGTH = 10_000;
export const RATE_LIMIT_TIMEOUT_MS = 5_000;

export interface GitHubClientOptions {
  logger?: Logger;
  maxRetries?: number;
  /** Base delay for exponential backoff on rate limiting. */
  retryDelayMs?: number;
}

export interface RateLimitStatus {
  limit: number;
  remaining: number;
  reset_at: number;
}

type LabelLike = string | { name?: string | null };

/** Strip control characters (keeping newlines and tabs) and cap the length. */
export function sanitizeInput(text: string | null | undefined): string {
  if (!text) return "";
  return text.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, "").slice(0, MAX_TEXT_LENGTH);
}

export function labelNames(labels: LabelLike[]): string[] {
  return labels.map((l) => (typeof l === "string" ? l : l.name || "")).filter(Boolean);
}

/** 429 always; 403 only when the budget is spent, since GitHub also answers 403 for missing permissions. */
export function isRateLimited(err: unknown): boolean {
  const status = errorStatus(err);
  if (status === 429) return true;
  return status === 403 && errorHeader(err, "x-ratelimit-remaining") === "0";
}

export function toIssueRecord(raw: { number: number; title: string; body?: string | null; html_url: string }): IssueRecord {
  return {
    number: raw.number,
    title: sanitizeInput(raw.title),
    body: sanitizeInput(raw.body),
    url: raw.html_url,
  };
}

export class GitHubClient implements IssueSource {
  private octokit: Octokit;
  private owner: string;
  private repo: string;
  private logger?: Logger;
  private maxRetries: number;
  private retryDelayMs: number;
  private rateLimit: RateLimitInfo = { remaining: 5000, limit: 5000, resetAt: new Date() };

  constructor(token: string | undefined, owner: string, repo: string, opts: GitHubClientOptions = {}) {
    this.octokit = new Octokit({ auth: token, userAgent: "issue-sieve" });
    this.owner = owner;
    this.repo = repo;
    this.logger = opts.logger;
    this.maxRetries = opts.maxRetries ?? 3;
    this.retryDelayMs = opts.retryDelayMs ?? 1000;
  }

  get fullName(): string {
    return `${this.owner}/${this.repo}`;
  }

  getRateLimit(): RateLimitInfo {
    return { ...this.rateLimit };
  }

  private updateRateLimit(headers: Record<string, string | number | undefined>) {
    const remaining = headers["x-ratelimit-remaining"];
    const limit = headers["x-ratelimit-limit"];
    const reset = headers["x-ratelimit-reset"];
    if (remaining !== undefined) this.rateLimit.remaining = parseInt(String(remaining), 10);
    if (limit !== undefined) this.rateLimit.limit = parseInt(String(limit), 10);
    if (reset !== undefined) this.rateLimit.resetAt = new Date(parseInt(String(reset), 10) * 1000);
  }

  async withBackoff<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn();
      } catch (err) {
        if (!isRateLimited(err)) throw err;
        if (attempt >= this.maxRetries) throw new RateLimitError(this.rateLimit.resetAt);
        const delay = this.retryDelayMs * 2 ** attempt;
        this.logger?.warn(
          { attempt: attempt + 1, maxRetries: this.maxRetries, delayMs: delay },
          "GitHub rate limit hit, backing off",
        );
        await new Promise((r) => setTimeout(r, delay));
      }
    }
  }

  async getIssue(issueNumber: number): Promise<GitHubIssue> {
    const response = await this.withBackoff(() =>
      this.octokit.issues.get({ owner: this.owner, repo: this.repo, issue_number: issueNumber }),
    ).catch((err: unknown) => {
      if (errorStatus(err) === 404) throw new IssueNotFoundError(this.fullName, issueNumber);
      throw err;
    });
    this.updateRateLimit(response.headers);
    const issue = response.data;
    const comments = await this.getIssueComments(issueNumber);

    this.logger?.debug({ repo: this.fullName, issueNumber, comments: comments.length }, "Issue fetched");

    return {
      ...toIssueRecord(issue),
      state: issue.state,
      labels: labelNames(issue.labels),
      comments,
      createdAt: issue.created_at,
      updatedAt: issue.updated_at,
    };
  }

  async getIssueComments(issueNumber: number, maxComments = 5): Promise<string[]> {
    const response = await this.withBackoff(() =>
      this.octokit.issues.listComments({
        owner: this.owner,
        repo: this.repo,
        issue_number: issueNumber,
        per_page: maxComments,
      }),
    );
    this.updateRateLimit(response.headers);
    return response.data.map((c) => sanitizeInput(c.body));
  }

  /** Open issues for duplicate detection, pull requests excluded. */
  async getOpenIssues(maxIssues = 100): Promise<IssueRecord[]> {
    const perPage = Math.min(100, maxIssues);
    const issues: IssueRecord[] = [];

    for (let page = 1; issues.length < maxIssues; page++) {
      const response = await this.withBackoff(() =>
        this.octokit.issues.listForRepo({
          owner: this.owner,
          repo: this.repo,
          state: "open",
          per_page: perPage,
          page,
        }),
      );
      this.updateRateLimit(response.headers);
      const data = response.data;
      if (data.length === 0) break;

      for (const item of data) {
        if (item.pull_request) continue;
        issues.push(toIssueRecord(item));
      }
      if (data.length < perPage) break;
    }

    this.logger?.debug({ repo: this.fullName, count: Math.min(issues.length, maxIssues) }, "Open issues fetched");
    return issues.slice(0, maxIssues);
  }

  async checkRateLimit(): Promise<RateLimitStatus> {
    const status = await fetchRateLimit(this.octokit, RATE_LIMIT_TIMEOUT_MS);
    this.rateLimit = { remaining: status.remaining, limit: status.limit, resetAt: new Date(status.reset_at * 1000) };
    return status;
  }
}

async function fetchRateLimit(octokit: Octokit, timeoutMs: number): Promise<RateLimitStatus> {
  const { data } = await octokit.rateLimit.get({ request: { signal: AbortSignal.timeout(timeoutMs) } });
  return { limit: data.rate.limit, remaining: data.rate.remaining, reset_at: data.rate.reset };
}

/** Rate limit for a token (or the anonymous budget), independent of any repository. */
export function checkRateLimit(token?: string, timeoutMs = RATE_LIMIT_TIMEOUT_MS): Promise<RateLimitStatus> {
  return fetchRateLimit(new Octokit({ auth: token, userAgent: "issue-sieve" }), timeoutMs);
}
