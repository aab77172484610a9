import type { AnalysisResult } from "./types.js";

export interface ExportContext {
  repo?: string;
  issueNumber?: number;
}

function formatPercent(similarity: number): string {
  return `${Math.round(similarity * 100)}%`;
}

export function generateMarkdownExport(analysis: AnalysisResult, ctx: ExportContext = {}): string {
  let md = `# Issue Analysis Report\n\n`;

  if (ctx.repo && ctx.issueNumber) {
    md += `**Issue:** [${ctx.repo}#${ctx.issueNumber}](https://github.com/${ctx.repo}/issues/${ctx.issueNumber})\n\n`;
  } else if (ctx.repo) {
    md += `**Repository:** ${ctx.repo}\n\n`;
  }

  md += `## Summary\n\n${analysis.summary}\n\n`;
  md += `## Root Cause Analysis\n\n${analysis.root_cause}\n\n`;

  md += `## Solution Steps\n\n`;
  analysis.solution_steps.forEach((step, i) => {
    md += `${i + 1}. ${step}\n`;
  });
  md += `\n`;

  md += `## Developer Checklist\n\n`;
  for (const item of analysis.checklist) {
    md += `- [ ] ${item}\n`;
  }
  md += `\n`;

  md += `## Suggested Labels\n\n`;
  md += `${analysis.labels.map((l) => `\`${l}\``).join(", ")}\n\n`;

  if (analysis.similar_issues.length > 0) {
    md += `## Similar Issues\n\n`;
    md += `| # | title | similarity |\n|---|-------|------------|\n`;
    for (const s of analysis.similar_issues) {
      const title = s.title.replace(/\|/g, "\\|").slice(0, 80);
      md += `| [#${s.issue_number}](${s.url}) | ${title} | ${formatPercent(s.similarity)} |\n`;
    }
    md += `\n`;
  }

  md += `---\n*generated by issue-sieve*\n`;
  return md;
}
