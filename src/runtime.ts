import type { Logger } from "pino";
import { isLLMConfigured, createIssueAnalyzer } from "./analyzer.js";
import { BoundedCache } from "./cache.js";
import type { SieveConfig } from "./config.js";
import { DuplicateDetector } from "./detector.js";
import { createEmbeddingProvider } from "./embeddings.js";
import { GitHubClient, type RateLimitStatus, checkRateLimit } from "./github.js";
import { TriageService } from "./service.js";
import type { AnalysisResult, EmbeddingProvider } from "./types.js";

export interface Runtime {
  config: SieveConfig;
  logger: Logger;
  cache: BoundedCache<AnalysisResult>;
  detector: DuplicateDetector;
  service: TriageService;
  github(owner: string, repo: string, token?: string): GitHubClient;
  checkRateLimit(token?: string): Promise<RateLimitStatus>;
  llmConfigured: boolean;
  close(): void;
}

async function resolveEmbeddings(config: SieveConfig, logger: Logger): Promise<EmbeddingProvider | null> {
  if (!config.similarity.useEmbeddings) return null;
  try {
    return await createEmbeddingProvider({
      provider: config.embedding.provider,
      apiKey: config.embedding.apiKey,
      model: config.embedding.model,
      timeoutMs: config.embedding.timeoutMs,
    });
  } catch (err) {
    logger.warn({ err, provider: config.embedding.provider }, "Embedding provider unavailable, using tf-idf");
    return null;
  }
}

/**
 * Build the long-lived pieces once at startup. The cache lives exactly as long
 * as the returned runtime; `close()` tears it down.
 */
export async function createRuntime(config: SieveConfig, logger: Logger): Promise<Runtime> {
  const cache = new BoundedCache<AnalysisResult>({
    maxSize: config.cache.maxSize,
    ttlSeconds: config.cache.ttlSeconds,
  });

  const embeddings = await resolveEmbeddings(config, logger);
  const detector = new DuplicateDetector({
    logger,
    embeddings,
    threshold: config.similarity.threshold,
    limit: config.similarity.limit,
    minTokens: config.similarity.minTokens,
  });

  const github = (owner: string, repo: string, token?: string) =>
    new GitHubClient(token ?? config.githubToken, owner, repo, { logger });

  const service = new TriageService({
    cache,
    detector,
    analyzer: createIssueAnalyzer(config.llm),
    issueSource: github,
    logger,
    mode: embeddings ? "embeddings" : "tfidf",
    maxOpenIssues: config.similarity.maxOpenIssues,
    defaultToken: config.githubToken,
  });

  logger.info(
    {
      mode: embeddings ? "embeddings" : "tfidf",
      threshold: config.similarity.threshold,
      cacheMaxSize: config.cache.maxSize,
      cacheTtl: config.cache.ttlSeconds,
      llmConfigured: isLLMConfigured(config.llm),
    },
    "Runtime initialized",
  );

  return {
    config,
    logger,
    cache,
    detector,
    service,
    github,
    checkRateLimit: (token) => checkRateLimit(token ?? config.githubToken),
    llmConfigured: isLLMConfigured(config.llm),
    close() {
      service.close();
      logger.info("Runtime closed");
    },
  };
}
