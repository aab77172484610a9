import { afterEach, describe, expect, it, vi } from "vitest";
import { buildAnalysisPrompt, createIssueAnalyzer, extractJSON, normalizeAnalysis } from "../analyzer.js";
import { AnalysisError } from "../errors.js";
import type { GitHubIssue } from "../types.js";

function makeIssue(overrides: Partial<GitHubIssue> = {}): GitHubIssue {
  return {
    number: 12,
    title: "Login fails on Safari",
    body: "Clicking sign in does nothing.",
    url: "https://github.com/octocat/hello-world/issues/12",
    state: "open",
    labels: [],
    comments: [],
    createdAt: "2026-01-01T00:00:00Z",
    updatedAt: "2026-01-02T00:00:00Z",
    ...overrides,
  };
}

function chatResponse(content: string): Response {
  return new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { "Content-Type": "application/json" },
  });
}

describe("extractJSON", () => {
  it("parses fenced JSON", () => {
    expect(extractJSON('```json\n{"summary": "ok"}\n```')).toEqual({ summary: "ok" });
  });

  it("finds an object inside chatter", () => {
    expect(extractJSON('Sure! Here it is: {"labels": ["bug"]} Hope that helps.')).toEqual({ labels: ["bug"] });
  });

  it("throws when there is no object", () => {
    expect(() => extractJSON("no json here")).toThrow("LLM did not return valid JSON");
  });
});

describe("normalizeAnalysis", () => {
  it("fills defaults for an empty reply", () => {
    const result = normalizeAnalysis({});
    expect(result.summary).toBe("Unable to generate summary.");
    expect(result.root_cause).toBe("Unable to determine root cause.");
    expect(result.solution_steps).toEqual(["Review the issue description", "Investigate the codebase", "Implement a fix"]);
    expect(result.checklist).toHaveLength(7);
    expect(result.labels).toEqual(["bug"]);
    expect(result.similar_issues).toEqual([]);
  });

  it("keeps only known labels, once each", () => {
    const result = normalizeAnalysis({ labels: ["feature", "urgent", "feature", "docs", 3] });
    expect(result.labels).toEqual(["feature", "docs"]);
  });

  it("replaces fields of the wrong type", () => {
    const result = normalizeAnalysis({ summary: 42, root_cause: "Race in token refresh", checklist: "do it" });
    expect(result.summary).toBe("Unable to generate summary.");
    expect(result.root_cause).toBe("Race in token refresh");
    expect(result.checklist).toHaveLength(7);
  });

  it("tolerates a non-object reply", () => {
    expect(normalizeAnalysis("garbage").labels).toEqual(["bug"]);
  });
});

describe("buildAnalysisPrompt", () => {
  it("includes the title and body", () => {
    const prompt = buildAnalysisPrompt(makeIssue());
    expect(prompt).toContain("## Issue Title\nLogin fails on Safari\n");
    expect(prompt).toContain("## Issue Body\nClicking sign in does nothing.\n");
    expect(prompt).toContain("## Top Comments\nNo comments yet.\n");
  });

  it("uses a placeholder for an empty body", () => {
    expect(buildAnalysisPrompt(makeIssue({ body: "" }))).toContain("## Issue Body\nNo description provided.\n");
  });

  it("truncates a long body", () => {
    const prompt = buildAnalysisPrompt(makeIssue({ body: "a".repeat(3500) }));
    expect(prompt).toContain(`${"a".repeat(3000)}...`);
    expect(prompt).not.toContain("a".repeat(3001));
  });

  it("includes at most five comments", () => {
    const comments = ["one", "two", "three", "four", "five", "six"];
    const prompt = buildAnalysisPrompt(makeIssue({ comments }));
    expect(prompt).toContain("Comment 5:\nfive");
    expect(prompt).not.toContain("Comment 6:");
  });

  it("lists the allowed labels", () => {
    expect(buildAnalysisPrompt(makeIssue())).toContain(
      "- Labels must be from: bug, docs, enhancement, feature, question, good-first-issue, help-wanted, invalid, wontfix",
    );
  });
});

describe("createIssueAnalyzer", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("fails each request when no key is configured", async () => {
    const analyzer = createIssueAnalyzer({ provider: "openai", model: "gpt-4o-mini" });
    await expect(analyzer.analyzeIssue(makeIssue())).rejects.toThrow(AnalysisError);
    await expect(analyzer.analyzeIssue(makeIssue())).rejects.toThrow("AI API key is required");
  });

  it("normalizes the model reply", async () => {
    const reply = JSON.stringify({
      summary: "Sign-in button is unresponsive on Safari.",
      root_cause: "Unsupported API in the click handler.",
      solution_steps: ["Reproduce on Safari", "Polyfill the API"],
      checklist: ["Add a regression test"],
      labels: ["bug", "question"],
    });
    vi.stubGlobal("fetch", vi.fn(async () => chatResponse(reply)));

    const analyzer = createIssueAnalyzer({ provider: "openai", apiKey: "test-key", model: "gpt-4o-mini" });
    expect(await analyzer.analyzeIssue(makeIssue())).toEqual({
      summary: "Sign-in button is unresponsive on Safari.",
      root_cause: "Unsupported API in the click handler.",
      solution_steps: ["Reproduce on Safari", "Polyfill the API"],
      checklist: ["Add a regression test"],
      labels: ["bug", "question"],
      similar_issues: [],
    });
  });

  it("retries without JSON mode before giving up", async () => {
    const fetchMock = vi.fn(async () => new Response("boom", { status: 500 }));
    vi.stubGlobal("fetch", fetchMock);

    const analyzer = createIssueAnalyzer({ provider: "openai", apiKey: "test-key", model: "gpt-4o-mini" });
    await expect(analyzer.analyzeIssue(makeIssue())).rejects.toThrow("AI analysis failed: LLM API error (500): boom");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
