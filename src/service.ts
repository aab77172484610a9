import type { Logger } from "pino";
import { type BoundedCache, buildCacheKey } from "./cache.js";
import { parseRepo } from "./config.js";
import type { DuplicateDetector } from "./detector.js";
import { errorMessage } from "./errors.js";
import { createChildLogger } from "./logger.js";
import type {
  AnalysisResult,
  CacheStats,
  GitHubIssue,
  IssueAnalyzer,
  IssueSource,
  SimilarityMode,
  SimilarityResult,
} from "./types.js";

export const MAX_BATCH_SIZE = 10;

export type IssueSourceFactory = (owner: string, repo: string, token?: string) => IssueSource;

export interface TriageServiceDeps {
  cache: BoundedCache<AnalysisResult>;
  detector: DuplicateDetector;
  analyzer: IssueAnalyzer;
  issueSource: IssueSourceFactory;
  logger: Logger;
  mode: SimilarityMode;
  maxOpenIssues: number;
  defaultToken?: string;
}

export interface AnalyzeOptions {
  githubToken?: string;
  /** Skip the cache lookup; the fresh result still replaces the cached one. */
  refresh?: boolean;
}

export interface AnalyzeOutcome {
  result: AnalysisResult;
  cached: boolean;
}

export interface BatchAnalysisItem {
  issue_number: number;
  success: boolean;
  result?: AnalysisResult;
  error?: string;
}

export interface BatchAnalysisResult {
  repo: string;
  total: number;
  successful: number;
  failed: number;
  results: BatchAnalysisItem[];
}

export interface ClearCacheResult {
  message: string;
  entries_cleared: number;
}

/**
 * Analysis flow around the cache: key → lookup → on miss fetch, analyze,
 * detect duplicates, store. Built once at startup; the cache is injected.
 */
export class TriageService {
  private deps: TriageServiceDeps;
  private inflight = new Map<string, Promise<AnalysisResult>>();
  private closed = false;

  constructor(deps: TriageServiceDeps) {
    this.deps = deps;
  }

  async analyze(repo: string, issueNumber: number, opts: AnalyzeOptions = {}): Promise<AnalyzeOutcome> {
    const key = buildCacheKey(repo, issueNumber);
    const log = createChildLogger(this.deps.logger, { repo, issueNumber });

    if (!opts.refresh) {
      const hit = this.deps.cache.get(key);
      if (hit) {
        log.debug("Analysis cache hit");
        return { result: hit, cached: true };
      }
      // Concurrent misses for one key share a single computation
      const pending = this.inflight.get(key);
      if (pending) return { result: await pending, cached: false };
    }

    const work = this.compute(repo, issueNumber, opts.githubToken, log);
    this.inflight.set(key, work);
    try {
      const result = await work;
      if (!this.closed) this.deps.cache.set(key, result);
      return { result, cached: false };
    } finally {
      if (this.inflight.get(key) === work) this.inflight.delete(key);
    }
  }

  private async compute(repo: string, issueNumber: number, token: string | undefined, log: Logger): Promise<AnalysisResult> {
    const { owner, repo: name } = parseRepo(repo);
    const source = this.deps.issueSource(owner, name, token ?? this.deps.defaultToken);

    const issue = await source.getIssue(issueNumber);
    const analysis = await this.deps.analyzer.analyzeIssue(issue);
    const similar = await this.findSimilar(source, issue, log);
    log.info({ labels: analysis.labels, similar: similar.length }, "Issue analyzed");
    return { ...analysis, similar_issues: similar };
  }

  private async findSimilar(source: IssueSource, issue: GitHubIssue, log: Logger): Promise<SimilarityResult[]> {
    try {
      const open = await source.getOpenIssues(this.deps.maxOpenIssues);
      return await this.deps.detector.findDuplicates(issue, open, { mode: this.deps.mode });
    } catch (err) {
      log.warn({ err }, "Duplicate detection failed");
      return [];
    }
  }

  async analyzeBatch(repo: string, issueNumbers: number[], opts: AnalyzeOptions = {}): Promise<BatchAnalysisResult> {
    if (issueNumbers.length === 0 || issueNumbers.length > MAX_BATCH_SIZE) {
      throw new RangeError(`batch must contain between 1 and ${MAX_BATCH_SIZE} issue numbers`);
    }

    const settled = await Promise.allSettled(issueNumbers.map((n) => this.analyze(repo, n, opts)));
    const results: BatchAnalysisItem[] = settled.map((s, i) =>
      s.status === "fulfilled"
        ? { issue_number: issueNumbers[i], success: true, result: s.value.result }
        : { issue_number: issueNumbers[i], success: false, error: errorMessage(s.reason) },
    );
    const successful = results.filter((r) => r.success).length;

    return {
      repo,
      total: results.length,
      successful,
      failed: results.length - successful,
      results,
    };
  }

  cacheStats(): CacheStats {
    return this.deps.cache.stats();
  }

  clearCache(): ClearCacheResult {
    const cleared = this.deps.cache.clear();
    this.deps.logger.info({ cleared }, "Analysis cache cleared");
    return { message: `Cache cleared successfully. Removed ${cleared} entries.`, entries_cleared: cleared };
  }

  /** Shutdown: drop cached analyses and forget in-flight work. Analyses still running are returned but not cached. */
  close(): void {
    this.closed = true;
    this.inflight.clear();
    this.deps.cache.clear();
  }
}
