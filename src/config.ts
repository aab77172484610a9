import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadEnv } from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "issue-sieve.config.yaml";

const EMBEDDING_PROVIDERS = ["openai", "kimi", "ollama", "voyageai", "jina"] as const;
const LLM_PROVIDERS = ["openai", "kimi", "anthropic", "ollama", "opencode"] as const;

export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

const booleanish = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const EnvSchema = z.object({
  GITHUB_TOKEN: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default("openai"),
  LLM_API_KEY: z.string().optional(),
  LLM_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_PROVIDER: z.enum(EMBEDDING_PROVIDERS).default("openai"),
  EMBEDDING_API_KEY: z.string().optional(),
  EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  USE_EMBEDDINGS: booleanish.optional(),
  SIMILARITY_THRESHOLD: z.coerce.number().optional(),
  SIMILAR_ISSUES_LIMIT: z.coerce.number().optional(),
  MAX_OPEN_ISSUES: z.coerce.number().optional(),
  CACHE_TTL: z.coerce.number().optional(),
  MAX_CACHE_SIZE: z.coerce.number().optional(),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.string().default("info"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

const SimilarityFileSchema = z.object({
  threshold: z.number().optional(),
  use_embeddings: z.boolean().optional(),
  limit: z.number().optional(),
  min_tokens: z.number().optional(),
  max_open_issues: z.number().optional(),
});

const CacheFileSchema = z.object({
  ttl: z.number().optional(),
  max_size: z.number().optional(),
});

const FileConfigBodySchema = z.object({
  version: z.number().optional().default(1),
  similarity: SimilarityFileSchema.optional().transform((v) => SimilarityFileSchema.parse(v ?? {})),
  cache: CacheFileSchema.optional().transform((v) => CacheFileSchema.parse(v ?? {})),
});

// An empty YAML document parses to null
const FileConfigSchema = FileConfigBodySchema.nullish().transform((v) => v ?? FileConfigBodySchema.parse({}));

export type FileConfig = z.infer<typeof FileConfigSchema>;

const SettingsSchema = z.object({
  similarity: z.object({
    threshold: z.number().min(0).max(1),
    useEmbeddings: z.boolean(),
    limit: z.number().int().positive(),
    minTokens: z.number().int().min(0),
    maxOpenIssues: z.number().int().positive().max(500),
  }),
  cache: z.object({
    ttlSeconds: z.number().int().positive(),
    maxSize: z.number().int().positive(),
  }),
});

type Settings = z.infer<typeof SettingsSchema>;

export interface SieveConfig extends Settings {
  githubToken?: string;
  llm: { provider: LLMProviderName; apiKey?: string; model: string };
  embedding: { provider: EmbeddingProviderName; apiKey?: string; model: string; timeoutMs: number };
  port: number;
  logLevel: string;
}

export interface LoadConfigOptions {
  configPath?: string;
  envPath?: string;
  /** Use these variables instead of process.env (no .env file is read). */
  env?: Record<string, string | undefined>;
}

function toConfigError(err: z.ZodError, prefix = ""): ConfigError {
  return new ConfigError(err.issues.map((i) => `${prefix}${i.path.join(".")}: ${i.message}`));
}

export function loadFileConfig(configPath?: string): FileConfig {
  const p = configPath || resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  if (!existsSync(p)) {
    if (configPath) throw new Error(`config not found at ${p}`);
    return FileConfigSchema.parse(undefined);
  }
  const parsed = FileConfigSchema.safeParse(parseYaml(readFileSync(p, "utf-8")));
  if (!parsed.success) throw toConfigError(parsed.error, `${DEFAULT_CONFIG_FILE} `);
  if (parsed.data.version > 1) {
    throw new Error(`config version ${parsed.data.version} requires a newer version of issue-sieve`);
  }
  return parsed.data;
}

export function loadEnvConfig(opts: Pick<LoadConfigOptions, "envPath" | "env"> = {}): EnvConfig {
  let source = opts.env;
  if (!source) {
    loadEnv({ path: opts.envPath || resolve(process.cwd(), ".env") });
    source = process.env;
  }
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) throw toConfigError(parsed.error);
  return parsed.data;
}

/**
 * Resolve the runtime configuration. Precedence: environment, then the YAML file,
 * then built-in defaults. Range violations throw a ConfigError naming every bad key.
 */
export function loadConfig(opts: LoadConfigOptions = {}): SieveConfig {
  const env = loadEnvConfig(opts);
  const file = loadFileConfig(opts.configPath);

  const settings = SettingsSchema.safeParse({
    similarity: {
      threshold: env.SIMILARITY_THRESHOLD ?? file.similarity.threshold ?? 0.75,
      useEmbeddings: env.USE_EMBEDDINGS ?? file.similarity.use_embeddings ?? false,
      limit: env.SIMILAR_ISSUES_LIMIT ?? file.similarity.limit ?? 3,
      minTokens: file.similarity.min_tokens ?? 1,
      maxOpenIssues: env.MAX_OPEN_ISSUES ?? file.similarity.max_open_issues ?? 50,
    },
    cache: {
      ttlSeconds: env.CACHE_TTL ?? file.cache.ttl ?? 300,
      maxSize: env.MAX_CACHE_SIZE ?? file.cache.max_size ?? 100,
    },
  });
  if (!settings.success) throw toConfigError(settings.error);

  return {
    ...settings.data,
    githubToken: env.GITHUB_TOKEN || undefined,
    llm: {
      provider: env.LLM_PROVIDER,
      apiKey: env.LLM_API_KEY || env.OPENAI_API_KEY,
      model: env.LLM_MODEL,
    },
    embedding: {
      provider: env.EMBEDDING_PROVIDER,
      apiKey: env.EMBEDDING_API_KEY || env.OPENAI_API_KEY,
      model: env.EMBEDDING_MODEL,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS,
    },
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
  };
}

export function parseRepo(repo: string): { owner: string; repo: string } {
  let cleaned = repo.trim();
  cleaned = cleaned.replace(/^https?:\/\/github\.com\//, "");
  cleaned = cleaned.replace(/^github\.com\//, "");
  cleaned = cleaned.replace(/\.git$/, "");
  cleaned = cleaned.replace(/\/$/, "");

  const parts = cleaned.split("/").filter(Boolean);
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`invalid repo format: "${repo}". expected owner/repo`);
  }
  return { owner: parts[0], repo: parts[1] };
}
