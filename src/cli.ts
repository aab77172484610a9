#!/usr/bin/env node
import { writeFileSync } from "node:fs";
import { serve } from "@hono/node-server";
import chalk from "chalk";
import Table from "cli-table3";
import { Command } from "commander";
import ora from "ora";
import { type SieveConfig, loadConfig, parseRepo } from "./config.js";
import { findExactDuplicate } from "./detector.js";
import { errorMessage } from "./errors.js";
import { checkDependencies } from "./health.js";
import { createLogger } from "./logger.js";
import { generateMarkdownExport } from "./markdown.js";
import { createRuntime } from "./runtime.js";
import { API_VERSION, createApp } from "./server.js";
import type { SimilarityResult } from "./types.js";

const program = new Command();

program
  .name("issue-sieve")
  .description("AI-assisted GitHub issue triage: summaries, root causes, checklists and duplicate detection")
  .version(API_VERSION);

// ── helpers ─────────────────────────────────────────────────────
function parseIssueNumber(s: string): number {
  const n = Number(s);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`Invalid issue number: ${s}`);
  return n;
}

function withEmbeddings(config: SieveConfig, enabled: boolean | undefined): SieveConfig {
  if (!enabled) return config;
  return { ...config, similarity: { ...config.similarity, useEmbeddings: true } };
}

function similarityTable(results: SimilarityResult[]): string {
  const table = new Table({
    head: ["#", "Similarity", "Title"],
    colWidths: [8, 12, 60],
  });
  for (const r of results) {
    table.push([`#${r.issue_number}`, `${(r.similarity * 100).toFixed(1)}%`, r.title.slice(0, 58)]);
  }
  return table.toString();
}

interface CommonOptions {
  config?: string;
  verbose?: boolean;
  embeddings?: boolean;
}

function commandLogger(opts: CommonOptions) {
  return createLogger(opts.verbose ? "debug" : "warn", { stderr: true });
}

// ── analyze ─────────────────────────────────────────────────────
interface AnalyzeCommandOptions extends CommonOptions {
  export?: string;
  output?: string;
}

program
  .command("analyze <repo> <issue>")
  .description("Analyze one issue: summary, root cause, solution steps, checklist, labels and similar issues")
  .option("-c, --config <path>", "Config file")
  .option("--embeddings", "Use embeddings for duplicate detection")
  .option("-e, --export <format>", "Export format: md or json")
  .option("-o, --output <path>", "Write the export to a file instead of stdout")
  .option("-v, --verbose", "Debug logging on stderr")
  .action(async (repoArg: string, issueArg: string, opts: AnalyzeCommandOptions) => {
    if (opts.export && opts.export !== "md" && opts.export !== "json") {
      throw new Error(`Unknown export format: ${opts.export}. Use md or json`);
    }
    const issueNumber = parseIssueNumber(issueArg);
    const { owner, repo } = parseRepo(repoArg);
    const repoFull = `${owner}/${repo}`;

    const config = withEmbeddings(loadConfig({ configPath: opts.config }), opts.embeddings);
    const runtime = await createRuntime(config, commandLogger(opts));

    try {
      const spinner = ora({ text: `Analyzing ${repoFull}#${issueNumber}...`, stream: process.stderr }).start();
      const { result } = await runtime.service.analyze(repoFull, issueNumber).catch((err: unknown) => {
        spinner.fail("Analysis failed");
        throw err;
      });
      spinner.succeed(`Analyzed ${repoFull}#${issueNumber}`);

      if (opts.export) {
        const content =
          opts.export === "md"
            ? generateMarkdownExport(result, { repo: repoFull, issueNumber })
            : `${JSON.stringify(result, null, 2)}\n`;
        if (opts.output) {
          writeFileSync(opts.output, content);
          console.error(chalk.green("✓") + ` Saved to ${opts.output}`);
        } else {
          process.stdout.write(content);
        }
        return;
      }

      console.log(chalk.bold("\nSummary"));
      console.log(result.summary);
      console.log(chalk.bold("\nRoot cause"));
      console.log(result.root_cause);
      console.log(chalk.bold("\nSolution steps"));
      result.solution_steps.forEach((step, i) => console.log(`  ${i + 1}. ${step}`));
      console.log(chalk.bold("\nChecklist"));
      for (const item of result.checklist) console.log(`  [ ] ${item}`);
      console.log(chalk.bold("\nLabels: ") + result.labels.map((l) => chalk.cyan(l)).join(", "));

      if (result.similar_issues.length > 0) {
        console.log(chalk.bold("\nSimilar issues"));
        console.log(similarityTable(result.similar_issues));
      } else {
        console.log(chalk.dim("\nNo similar open issues above the threshold"));
      }
    } finally {
      runtime.close();
    }
  });

// ── dupes ───────────────────────────────────────────────────────
interface DupesCommandOptions extends CommonOptions {
  threshold?: string;
  limit?: string;
  maxIssues?: string;
}

program
  .command("dupes <repo> <issue>")
  .description("Find open issues similar to the given issue")
  .option("-c, --config <path>", "Config file")
  .option("-t, --threshold <number>", "Similarity threshold (0-1)")
  .option("-n, --limit <number>", "Maximum number of matches")
  .option("--max-issues <number>", "Open issues to compare against")
  .option("--embeddings", "Use embeddings instead of tf-idf")
  .option("-v, --verbose", "Debug logging on stderr")
  .action(async (repoArg: string, issueArg: string, opts: DupesCommandOptions) => {
    const issueNumber = parseIssueNumber(issueArg);
    const { owner, repo } = parseRepo(repoArg);
    const config = withEmbeddings(loadConfig({ configPath: opts.config }), opts.embeddings);
    const runtime = await createRuntime(config, commandLogger(opts));

    try {
      const github = runtime.github(owner, repo);
      const maxIssues = parseInt(opts.maxIssues ?? "", 10) || config.similarity.maxOpenIssues;

      const spinner = ora(`Fetching #${issueNumber} and up to ${maxIssues} open issues...`).start();
      const [target, open] = await Promise.all([github.getIssue(issueNumber), github.getOpenIssues(maxIssues)]).catch(
        (err: unknown) => {
          spinner.fail("Fetch failed");
          throw err;
        },
      );
      spinner.succeed(`Fetched ${open.length} open issues`);

      const exact = findExactDuplicate(target, open);
      if (exact) {
        console.log(chalk.yellow(`Exact title match: #${exact.number} ${exact.title}`));
      }

      const detection = await runtime.detector.detect(target, open, {
        mode: config.similarity.useEmbeddings && runtime.detector.embeddingsAvailable ? "embeddings" : "tfidf",
        threshold: opts.threshold !== undefined ? parseFloat(opts.threshold) : undefined,
        limit: opts.limit !== undefined ? parseInt(opts.limit, 10) : undefined,
      });

      if (detection.results.length === 0) {
        console.log(chalk.green("No similar open issues found"));
      } else {
        console.log(similarityTable(detection.results));
      }
      const rl = github.getRateLimit();
      console.log(chalk.dim(`\nMode: ${detection.mode}, API budget: ${rl.remaining}/${rl.limit} remaining`));
    } finally {
      runtime.close();
    }
  });

// ── rate-limit ──────────────────────────────────────────────────
program
  .command("rate-limit")
  .description("Show the GitHub API budget for the configured token")
  .option("-c, --config <path>", "Config file")
  .action(async (opts: CommonOptions) => {
    const config = loadConfig({ configPath: opts.config });
    const runtime = await createRuntime(config, commandLogger(opts));
    try {
      const status = await runtime.checkRateLimit();
      const resetIn = Math.max(0, Math.ceil((status.reset_at * 1000 - Date.now()) / 60000));
      console.log(`API: ${status.remaining}/${status.limit} calls remaining (resets in ${resetIn}min)`);
    } finally {
      runtime.close();
    }
  });

// ── health ──────────────────────────────────────────────────────
program
  .command("health")
  .description("Check the LLM configuration and GitHub API reachability")
  .option("-c, --config <path>", "Config file")
  .option("-v, --verbose", "Debug logging on stderr")
  .action(async (opts: CommonOptions) => {
    const config = loadConfig({ configPath: opts.config });
    const runtime = await createRuntime(config, commandLogger(opts));
    try {
      const deps = await checkDependencies(runtime);
      const mark = (ok: boolean) => (ok ? chalk.green("✓") : chalk.red("✗"));
      console.log(`${mark(deps.openai_api_configured)} LLM API ${deps.openai_api_configured ? "configured" : "not configured"}`);
      console.log(`${mark(deps.github_api_accessible)} GitHub API ${deps.github_api_accessible ? "reachable" : "unreachable"}`);
      const stats = runtime.service.cacheStats();
      console.log(chalk.dim(`cache: ${stats.size}/${stats.max_size} entries, ttl ${stats.ttl_seconds}s`));
      if (!deps.openai_api_configured || !deps.github_api_accessible) process.exitCode = 1;
    } finally {
      runtime.close();
    }
  });

// ── serve ───────────────────────────────────────────────────────
interface ServeCommandOptions {
  config?: string;
  port?: string;
}

program
  .command("serve")
  .description("Start the HTTP API")
  .option("-c, --config <path>", "Config file")
  .option("-p, --port <number>", "Port to listen on")
  .action(async (opts: ServeCommandOptions) => {
    const config = loadConfig({ configPath: opts.config });
    const logger = createLogger(config.logLevel);
    const runtime = await createRuntime(config, logger);
    const port = parseInt(opts.port ?? "", 10) || config.port;

    const app = createApp({
      service: runtime.service,
      logger,
      checkRateLimit: runtime.checkRateLimit,
      llmConfigured: runtime.llmConfigured,
    });

    const server = serve({ fetch: app.fetch, port }, (info) => {
      logger.info({ port: info.port }, "issue-sieve listening");
    });

    const shutdown = (signal: string) => {
      logger.info({ signal }, "Shutting down");
      server.close(() => {
        runtime.close();
        process.exit(0);
      });
    };
    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
  });

program.parseAsync().catch((err: unknown) => {
  console.error(chalk.red(errorMessage(err)));
  process.exitCode = 1;
});
