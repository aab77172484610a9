import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import { BoundedCache } from "../cache.js";
import { DuplicateDetector } from "../detector.js";
import { AnalysisError, IssueNotFoundError, RateLimitError } from "../errors.js";
import type { RateLimitStatus } from "../github.js";
import { createApp } from "../server.js";
import { TriageService } from "../service.js";
import type { AnalysisResult, GitHubIssue } from "../types.js";

const logger = pino({ level: "silent" });
const REPO = "octocat/hello-world";

function fullIssue(number: number): GitHubIssue {
  return {
    number,
    title: `Issue ${number}`,
    body: "Something is broken",
    url: `https://github.com/${REPO}/issues/${number}`,
    state: "open",
    labels: [],
    comments: [],
    createdAt: "2026-01-01T00:00:00Z",
    updatedAt: "2026-01-01T00:00:00Z",
  };
}

function makeApp(opts: { rateLimit?: (token?: string) => Promise<RateLimitStatus> } = {}) {
  const getIssue = vi.fn(async (n: number) => {
    if (n === 404) throw new IssueNotFoundError(REPO, n);
    if (n === 429) throw new RateLimitError(new Date(0));
    return fullIssue(n);
  });
  const getOpenIssues = vi.fn(async () => []);
  const analyzeIssue = vi.fn(async (issue: GitHubIssue): Promise<AnalysisResult> => {
    if (issue.number === 500) throw new AnalysisError("AI analysis failed: model unavailable");
    return {
      summary: `Summary of #${issue.number}`,
      root_cause: "Unknown",
      solution_steps: ["Investigate"],
      checklist: ["Reproduce"],
      labels: ["bug"],
      similar_issues: [],
    };
  });
  const service = new TriageService({
    cache: new BoundedCache<AnalysisResult>({ maxSize: 10, ttlSeconds: 60 }),
    detector: new DuplicateDetector({ logger }),
    analyzer: { analyzeIssue },
    issueSource: () => ({ getIssue, getOpenIssues }),
    logger,
    mode: "tfidf",
    maxOpenIssues: 50,
  });
  const checkRateLimit = vi.fn(
    opts.rateLimit ?? (async (_token?: string) => ({ limit: 60, remaining: 59, reset_at: 1_700_000_000 })),
  );
  const app = createApp({ service, logger, checkRateLimit, llmConfigured: false });
  return { app, getIssue, checkRateLimit };
}

function post(body: unknown): RequestInit {
  return { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) };
}

describe("GET /", () => {
  it("describes the service", async () => {
    const { app } = makeApp();
    const res = await app.request("/");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ name: "issue-sieve", health: "/health" });
  });
});

describe("GET /health", () => {
  it("reports dependencies and cache settings", async () => {
    const { app } = makeApp();
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ok",
      dependencies: { openai_api_configured: false, github_api_accessible: true },
      cache_size: 0,
      cache_ttl: 60,
    });
  });

  it("stays up when GitHub is unreachable", async () => {
    const { app } = makeApp({
      rateLimit: async () => {
        throw new Error("network down");
      },
    });
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ dependencies: { github_api_accessible: false } });
  });
});

describe("POST /analyze", () => {
  it("returns the analysis and marks cache hits", async () => {
    const { app, getIssue } = makeApp();
    const first = await app.request("/analyze", post({ repo: REPO, issue_number: 1 }));
    expect(first.status).toBe(200);
    expect(first.headers.get("X-Cache")).toBe("MISS");
    expect(await first.json()).toMatchObject({ summary: "Summary of #1", labels: ["bug"], similar_issues: [] });

    const second = await app.request("/analyze", post({ repo: REPO, issue_number: 1 }));
    expect(second.headers.get("X-Cache")).toBe("HIT");
    expect(getIssue).toHaveBeenCalledTimes(1);
  });

  it("rejects a malformed repo with 422", async () => {
    const { app } = makeApp();
    const res = await app.request("/analyze", post({ repo: "not a repo", issue_number: 1 }));
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({ detail: "repo: repository must be in format 'owner/repo'" });
  });

  it("rejects a non-positive issue number with 422", async () => {
    const { app } = makeApp();
    const res = await app.request("/analyze", post({ repo: REPO, issue_number: 0 }));
    expect(res.status).toBe(422);
  });

  it("rejects an unparseable body with 422", async () => {
    const { app } = makeApp();
    const res = await app.request("/analyze", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{",
    });
    expect(res.status).toBe(422);
  });

  it("maps a missing issue to 404", async () => {
    const { app } = makeApp();
    const res = await app.request("/analyze", post({ repo: REPO, issue_number: 404 }));
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: "Issue #404 not found in octocat/hello-world" });
  });

  it("maps rate limiting to 429", async () => {
    const { app } = makeApp();
    const res = await app.request("/analyze", post({ repo: REPO, issue_number: 429 }));
    expect(res.status).toBe(429);
  });

  it("maps analysis failures to 500", async () => {
    const { app } = makeApp();
    const res = await app.request("/analyze", post({ repo: REPO, issue_number: 500 }));
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: "AI analysis failed: model unavailable" });
  });
});

describe("POST /analyze/batch", () => {
  it("analyzes each issue independently", async () => {
    const { app } = makeApp();
    const res = await app.request("/analyze/batch", post({ repo: REPO, issue_numbers: [1, 404] }));
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      repo: REPO,
      total: 2,
      successful: 1,
      failed: 1,
      results: [
        { issue_number: 1, success: true },
        { issue_number: 404, success: false, error: "Issue #404 not found in octocat/hello-world" },
      ],
    });
  });

  it("rejects more than ten issues", async () => {
    const { app } = makeApp();
    const issue_numbers = Array.from({ length: 11 }, (_, i) => i + 1);
    const res = await app.request("/analyze/batch", post({ repo: REPO, issue_numbers }));
    expect(res.status).toBe(422);
  });
});

describe("POST /export", () => {
  it("renders markdown", async () => {
    const { app } = makeApp();
    const analysis = {
      summary: "S",
      root_cause: "R",
      solution_steps: ["one"],
      checklist: ["c"],
      labels: ["bug"],
    };
    const res = await app.request("/export", post({ analysis, repo: REPO, issue_number: 3 }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      markdown: [
        "# Issue Analysis Report",
        "",
        "**Issue:** [octocat/hello-world#3](https://github.com/octocat/hello-world/issues/3)",
        "",
        "## Summary",
        "",
        "S",
        "",
        "## Root Cause Analysis",
        "",
        "R",
        "",
        "## Solution Steps",
        "",
        "1. one",
        "",
        "## Developer Checklist",
        "",
        "- [ ] c",
        "",
        "## Suggested Labels",
        "",
        "`bug`",
        "",
        "---",
        "*generated by issue-sieve*",
        "",
      ].join("\n"),
    });
  });
});

describe("GET /rate-limit", () => {
  it("passes the token through", async () => {
    const { app, checkRateLimit } = makeApp();
    const res = await app.request("/rate-limit?github_token=test-token");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ limit: 60, remaining: 59, reset_at: 1_700_000_000 });
    expect(checkRateLimit).toHaveBeenCalledWith("test-token");
  });

  it("reports failures as 500", async () => {
    const { app } = makeApp({
      rateLimit: async () => {
        throw new Error("bad credentials");
      },
    });
    const res = await app.request("/rate-limit");
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: "Failed to check rate limit: bad credentials" });
  });
});

describe("cache endpoints", () => {
  it("reports stats and clears entries", async () => {
    const { app } = makeApp();
    await app.request("/analyze", post({ repo: REPO, issue_number: 1 }));
    await app.request("/analyze", post({ repo: REPO, issue_number: 2 }));

    const stats = await app.request("/cache/stats");
    expect(await stats.json()).toEqual({
      size: 2,
      max_size: 10,
      ttl_seconds: 60,
      keys: ["octocat/hello-world#1", "octocat/hello-world#2"],
    });

    const cleared = await app.request("/cache", { method: "DELETE" });
    expect(await cleared.json()).toEqual({ message: "Cache cleared successfully. Removed 2 entries.", entries_cleared: 2 });

    const after = await app.request("/cache/stats");
    expect(await after.json()).toMatchObject({ size: 0, keys: [] });
  });
});
