// Public API for programmatic use

export { buildAnalysisPrompt, createIssueAnalyzer, createLLMProvider, extractJSON, normalizeAnalysis } from "./analyzer.js";
export { BoundedCache, buildCacheKey } from "./cache.js";
export type { SieveConfig } from "./config.js";
export { loadConfig, loadEnvConfig, loadFileConfig, parseRepo } from "./config.js";
export type { Detection, DetectionOptions, SimilarityStrategy } from "./detector.js";
export { DuplicateDetector, EmbeddingStrategy, TfidfStrategy, buildComparisonText, findExactDuplicate } from "./detector.js";
export { createEmbeddingProvider, prepareEmbeddingText } from "./embeddings.js";
export { AnalysisError, ConfigError, IssueNotFoundError, RateLimitError } from "./errors.js";
export { GitHubClient, checkRateLimit, isRateLimited } from "./github.js";
export type { DependencyHealth, HealthDeps } from "./health.js";
export { checkDependencies } from "./health.js";
export { createChildLogger, createLogger } from "./logger.js";
export { generateMarkdownExport } from "./markdown.js";
export type { Runtime } from "./runtime.js";
export { createRuntime } from "./runtime.js";
export { createApp } from "./server.js";
export { MAX_BATCH_SIZE, TriageService } from "./service.js";
export { cosineSimilarity, isZeroVector, rankBySimilarity } from "./similarity.js";
export type {
  AnalysisResult,
  CacheStats,
  EmbeddingProvider,
  GitHubIssue,
  IssueRecord,
  IssueSource,
  LLMProvider,
  SimilarityMode,
  SimilarityResult,
  TextVector,
} from "./types.js";
export { fitVectorizer, normalizeText, tokenize, transformText } from "./vectorizer.js";
