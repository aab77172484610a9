import { describe, expect, it } from "vitest";
import { generateMarkdownExport } from "../markdown.js";
import type { AnalysisResult } from "../types.js";

const analysis: AnalysisResult = {
  summary: "Sign-in does nothing on Safari.",
  root_cause: "Unsupported API in the click handler.",
  solution_steps: ["Reproduce on Safari", "Add a polyfill"],
  checklist: ["Write a regression test"],
  labels: ["bug", "docs"],
  similar_issues: [
    {
      issue_number: 7,
      title: "Safari | sign-in broken",
      url: "https://github.com/octocat/hello-world/issues/7",
      similarity: 0.856,
    },
  ],
};

describe("generateMarkdownExport", () => {
  it("renders every section", () => {
    const md = generateMarkdownExport(analysis, { repo: "octocat/hello-world", issueNumber: 12 });
    expect(md).toBe(
      [
        "# Issue Analysis Report",
        "",
        "**Issue:** [octocat/hello-world#12](https://github.com/octocat/hello-world/issues/12)",
        "",
        "## Summary",
        "",
        "Sign-in does nothing on Safari.",
        "",
        "## Root Cause Analysis",
        "",
        "Unsupported API in the click handler.",
        "",
        "## Solution Steps",
        "",
        "1. Reproduce on Safari",
        "2. Add a polyfill",
        "",
        "## Developer Checklist",
        "",
        "- [ ] Write a regression test",
        "",
        "## Suggested Labels",
        "",
        "`bug`, `docs`",
        "",
        "## Similar Issues",
        "",
        "| # | title | similarity |",
        "|---|-------|------------|",
        "| [#7](https://github.com/octocat/hello-world/issues/7) | Safari \\| sign-in broken | 86% |",
        "",
        "---",
        "*generated by issue-sieve*",
        "",
      ].join("\n"),
    );
  });

  it("omits the issue link without context", () => {
    const md = generateMarkdownExport(analysis);
    expect(md.startsWith("# Issue Analysis Report\n\n## Summary\n")).toBe(true);
  });

  it("names the repository when no issue number is given", () => {
    const md = generateMarkdownExport(analysis, { repo: "octocat/hello-world" });
    expect(md).toContain("\n**Repository:** octocat/hello-world\n");
  });

  it("omits the similar issues section when there are none", () => {
    const md = generateMarkdownExport({ ...analysis, similar_issues: [] });
    expect(md).not.toContain("## Similar Issues");
    expect(md.endsWith("`bug`, `docs`\n\n---\n*generated by issue-sieve*\n")).toBe(true);
  });
});
