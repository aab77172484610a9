import { Hono } from "hono";
import type { Logger } from "pino";
import { z } from "zod";
import { IssueNotFoundError, RateLimitError, errorMessage } from "./errors.js";
import type { RateLimitStatus } from "./github.js";
import { checkDependencies } from "./health.js";
import { generateMarkdownExport } from "./markdown.js";
import { MAX_BATCH_SIZE, type TriageService } from "./service.js";

export const API_VERSION = "0.1.0";

const RepoSlug = z.string().regex(/^[\w.-]+\/[\w.-]+$/, "repository must be in format 'owner/repo'");

const AnalyzeRequestSchema = z.object({
  repo: RepoSlug,
  issue_number: z.number().int().positive(),
  github_token: z.string().optional(),
  refresh: z.boolean().optional(),
});

const BatchAnalyzeRequestSchema = z.object({
  repo: RepoSlug,
  issue_numbers: z.array(z.number().int().positive()).min(1).max(MAX_BATCH_SIZE),
  github_token: z.string().optional(),
});

const SimilarIssueSchema = z.object({
  issue_number: z.number().int(),
  title: z.string(),
  url: z.string(),
  similarity: z.number().min(0).max(1),
});

const AnalysisResultSchema = z.object({
  summary: z.string(),
  root_cause: z.string(),
  solution_steps: z.array(z.string()),
  checklist: z.array(z.string()),
  labels: z.array(z.string()),
  similar_issues: z.array(SimilarIssueSchema).default([]),
});

const ExportRequestSchema = z.object({
  analysis: AnalysisResultSchema,
  repo: z.string().optional(),
  issue_number: z.number().int().positive().optional(),
});

export interface AppDeps {
  service: TriageService;
  logger: Logger;
  checkRateLimit(token?: string): Promise<RateLimitStatus>;
  llmConfigured: boolean;
}

class ValidationError extends Error {
  constructor(err: z.ZodError) {
    super(err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; "));
    this.name = "ValidationError";
  }
}

async function parseBody<T extends z.ZodTypeAny>(req: { json(): Promise<unknown> }, schema: T): Promise<z.infer<T>> {
  const raw = await req.json().catch(() => undefined);
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new ValidationError(parsed.error);
  return parsed.data;
}

function statusFor(err: Error): 404 | 422 | 429 | 500 {
  if (err instanceof ValidationError) return 422;
  if (err instanceof IssueNotFoundError) return 404;
  if (err instanceof RateLimitError) return 429;
  return 500;
}

export function createApp(deps: AppDeps): Hono {
  const { service, logger } = deps;
  const app = new Hono();

  app.use(async (c, next) => {
    const started = Date.now();
    await next();
    logger.info(
      { method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - started },
      "request",
    );
  });

  app.onError((err, c) => {
    const status = statusFor(err);
    if (status === 500) logger.error({ err, path: c.req.path }, "Request failed");
    return c.json({ detail: err.message }, status);
  });

  app.get("/", (c) =>
    c.json({
      name: "issue-sieve",
      version: API_VERSION,
      description: "AI-powered GitHub issue analysis with duplicate detection",
      health: "/health",
    }),
  );

  app.get("/health", async (c) => {
    const dependencies = await checkDependencies(deps);
    const stats = service.cacheStats();
    return c.json({
      status: "ok",
      version: API_VERSION,
      dependencies,
      cache_size: stats.size,
      cache_ttl: stats.ttl_seconds,
    });
  });

  app.post("/analyze", async (c) => {
    const body = await parseBody(c.req, AnalyzeRequestSchema);
    const { result, cached } = await service.analyze(body.repo, body.issue_number, {
      githubToken: body.github_token,
      refresh: body.refresh,
    });
    c.header("X-Cache", cached ? "HIT" : "MISS");
    return c.json(result);
  });

  app.post("/analyze/batch", async (c) => {
    const body = await parseBody(c.req, BatchAnalyzeRequestSchema);
    return c.json(await service.analyzeBatch(body.repo, body.issue_numbers, { githubToken: body.github_token }));
  });

  app.post("/export", async (c) => {
    const body = await parseBody(c.req, ExportRequestSchema);
    const markdown = generateMarkdownExport(body.analysis, { repo: body.repo, issueNumber: body.issue_number });
    return c.json({ markdown });
  });

  app.get("/rate-limit", async (c) => {
    const token = c.req.query("github_token") || undefined;
    try {
      return c.json(await deps.checkRateLimit(token));
    } catch (err) {
      throw new Error(`Failed to check rate limit: ${errorMessage(err)}`, { cause: err });
    }
  });

  app.get("/cache/stats", (c) => c.json(service.cacheStats()));

  app.delete("/cache", (c) => c.json(service.clearCache()));

  return app;
}
