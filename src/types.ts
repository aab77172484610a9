export interface IssueRecord {
  number: number;
  title: string;
  body: string;
  url: string;
}

export interface GitHubIssue extends IssueRecord {
  state: string;
  labels: string[];
  comments: string[];
  createdAt: string;
  updatedAt: string;
}

/** Dense vector: tf-idf vocabulary index or embedding dimension → weight. */
export type TextVector = readonly number[];

export type SimilarityMode = "embeddings" | "tfidf";

export interface SimilarityResult {
  issue_number: number;
  title: string;
  url: string;
  similarity: number;
}

export interface AnalysisResult {
  summary: string;
  root_cause: string;
  solution_steps: string[];
  checklist: string[];
  labels: string[];
  similar_issues: SimilarityResult[];
}

export interface CacheStats {
  size: number;
  max_size: number;
  ttl_seconds: number;
  keys: string[];
}

export interface RateLimitInfo {
  remaining: number;
  limit: number;
  resetAt: Date;
}

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
  dimensions: number;
}

export interface LLMProvider {
  complete(prompt: string, systemPrompt?: string): Promise<string>;
  completeJSON(prompt: string, systemPrompt?: string): Promise<unknown>;
}

/** The parts of the GitHub client the triage flow needs. */
export interface IssueSource {
  getIssue(issueNumber: number): Promise<GitHubIssue>;
  getOpenIssues(maxIssues: number): Promise<IssueRecord[]>;
}

export interface IssueAnalyzer {
  analyzeIssue(issue: GitHubIssue): Promise<AnalysisResult>;
}
