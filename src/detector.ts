import type { Logger } from "pino";
import { prepareEmbeddingText } from "./embeddings.js";
import { ConfigError } from "./errors.js";
import { rankBySimilarity } from "./similarity.js";
import type { EmbeddingProvider, IssueRecord, SimilarityMode, SimilarityResult, TextVector } from "./types.js";
import { countTokens, fitVectorizer, normalizeText, transformText, type VectorizerOptions } from "./vectorizer.js";

export interface DetectionOptions {
  mode: SimilarityMode;
  threshold: number;
  limit: number;
}

export interface Detection {
  /** Strategy that produced the results; "tfidf" after an embedding fallback. */
  mode: SimilarityMode;
  results: SimilarityResult[];
}

interface VectorSet {
  target: TextVector;
  candidates: TextVector[];
}

export interface SimilarityStrategy {
  readonly mode: SimilarityMode;
  vectorize(target: IssueRecord, candidates: readonly IssueRecord[]): Promise<VectorSet>;
}

/** Title counted twice so it outweighs a long body. */
export function buildComparisonText(issue: Pick<IssueRecord, "title" | "body">): string {
  return `${issue.title} ${issue.title} ${issue.body || ""}`;
}

export class TfidfStrategy implements SimilarityStrategy {
  readonly mode = "tfidf" as const;
  private options: VectorizerOptions;

  constructor(options: VectorizerOptions = {}) {
    this.options = options;
  }

  async vectorize(target: IssueRecord, candidates: readonly IssueRecord[]): Promise<VectorSet> {
    const texts = [target, ...candidates].map(buildComparisonText);
    const model = fitVectorizer(texts, this.options);
    const [targetVector, ...candidateVectors] = texts.map((text) => transformText(model, text));
    return { target: targetVector, candidates: candidateVectors };
  }
}

export class EmbeddingStrategy implements SimilarityStrategy {
  readonly mode = "embeddings" as const;
  private provider: EmbeddingProvider;
  private batchSize: number;

  constructor(provider: EmbeddingProvider, batchSize = 100) {
    this.provider = provider;
    this.batchSize = batchSize;
  }

  async vectorize(target: IssueRecord, candidates: readonly IssueRecord[]): Promise<VectorSet> {
    const texts = [target, ...candidates].map(prepareEmbeddingText);
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      const embedded = await this.provider.embedBatch(batch);
      if (embedded.length !== batch.length) {
        throw new Error(`embedding provider returned ${embedded.length} vectors for ${batch.length} inputs`);
      }
      vectors.push(...embedded);
    }

    const [targetVector, ...candidateVectors] = vectors;
    const mismatch = candidateVectors.find((v) => v.length !== targetVector.length);
    if (mismatch) {
      throw new Error(`embedding dimension mismatch: ${targetVector.length} vs ${mismatch.length}`);
    }
    return { target: targetVector, candidates: candidateVectors };
  }
}

export interface DuplicateDetectorOptions {
  logger: Logger;
  /** Absent when embeddings are disabled or not configured. */
  embeddings?: EmbeddingProvider | null;
  threshold?: number;
  limit?: number;
  /** Candidates with fewer tokens than this are skipped before vectorizing. */
  minTokens?: number;
  vectorizer?: VectorizerOptions;
}

function validateDetection(threshold: number, limit: number): void {
  const problems: string[] = [];
  if (!(threshold >= 0 && threshold <= 1)) problems.push(`threshold must be within [0, 1], got ${threshold}`);
  if (!Number.isInteger(limit) || limit < 0) problems.push(`limit must be a non-negative integer, got ${limit}`);
  if (problems.length > 0) throw new ConfigError(problems);
}

export class DuplicateDetector {
  private logger: Logger;
  private tfidf: TfidfStrategy;
  private embedding: EmbeddingStrategy | null;
  private threshold: number;
  private limit: number;
  private minTokens: number;

  constructor(opts: DuplicateDetectorOptions) {
    this.logger = opts.logger;
    this.threshold = opts.threshold ?? 0.75;
    this.limit = opts.limit ?? 3;
    this.minTokens = opts.minTokens ?? 1;
    validateDetection(this.threshold, this.limit);
    this.tfidf = new TfidfStrategy(opts.vectorizer);
    this.embedding = opts.embeddings ? new EmbeddingStrategy(opts.embeddings) : null;
  }

  get embeddingsAvailable(): boolean {
    return this.embedding !== null;
  }

  private selectStrategy(mode: SimilarityMode): SimilarityStrategy {
    if (mode === "embeddings") {
      if (this.embedding) return this.embedding;
      this.logger.debug("Embeddings requested but no provider configured, using tf-idf");
    }
    return this.tfidf;
  }

  async detect(
    target: IssueRecord,
    candidates: readonly IssueRecord[],
    opts: Partial<DetectionOptions> = {},
  ): Promise<Detection> {
    const threshold = opts.threshold ?? this.threshold;
    const limit = opts.limit ?? this.limit;
    validateDetection(threshold, limit);

    const pool = candidates.filter(
      (c) => c.number !== target.number && countTokens(`${c.title} ${c.body}`) >= this.minTokens,
    );
    let strategy = this.selectStrategy(opts.mode ?? "tfidf");
    if (pool.length === 0) return { mode: strategy.mode, results: [] };

    let vectors: VectorSet;
    try {
      vectors = await strategy.vectorize(target, pool);
    } catch (err) {
      if (strategy === this.tfidf) throw err;
      this.logger.warn({ err, candidates: pool.length }, "Embedding failed, falling back to tf-idf");
      strategy = this.tfidf;
      vectors = await strategy.vectorize(target, pool);
    }

    const ranked = rankBySimilarity(
      vectors.target,
      pool.map((issue, i) => ({ issue, vector: vectors.candidates[i] })),
      threshold,
      limit,
    );
    this.logger.debug(
      { mode: strategy.mode, candidates: pool.length, matches: ranked.length },
      "Duplicate detection complete",
    );
    return { mode: strategy.mode, results: ranked };
  }

  async findDuplicates(
    target: IssueRecord,
    candidates: readonly IssueRecord[],
    opts: Partial<DetectionOptions> = {},
  ): Promise<SimilarityResult[]> {
    return (await this.detect(target, candidates, opts)).results;
  }
}

/**
 * First candidate (other than the target itself) whose normalized title equals
 * the target's normalized title.
 */
export function findExactDuplicate<T extends IssueRecord>(target: IssueRecord, candidates: readonly T[]): T | undefined {
  const title = normalizeText(target.title);
  if (!title) return undefined;
  return candidates.find((c) => c.number !== target.number && normalizeText(c.title) === title);
}
