import { z } from "zod";
import type { EmbeddingProviderName } from "./config.js";
import type { EmbeddingProvider, IssueRecord } from "./types.js";

export interface ProviderConfig {
  provider: EmbeddingProviderName;
  apiKey?: string;
  model: string;
  baseUrl?: string;
  timeoutMs?: number;
}

const MAX_INPUT_CHARS = 8000;
const DEFAULT_TIMEOUT_MS = 15_000;

const OpenAIEmbeddingResponse = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

const OllamaEmbeddingResponse = z.object({
  embeddings: z.array(z.array(z.number())),
});

async function postJSON(
  url: string,
  body: unknown,
  headers: Record<string, string>,
  timeoutMs: number,
  label: string,
): Promise<unknown> {
  const resp = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!resp.ok) {
    throw new Error(`${label} error (${resp.status}): ${await resp.text()}`);
  }
  return resp.json();
}

function sanitize(texts: string[]): string[] {
  return texts.map((t) => {
    if (!t || typeof t !== "string") return " ";
    return t.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, "").trim().slice(0, MAX_INPUT_CHARS) || " ";
  });
}

class OpenAIEmbeddings implements EmbeddingProvider {
  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private timeoutMs: number;
  dimensions = 1536;

  constructor(config: ProviderConfig) {
    if (!config.apiKey) throw new Error("EMBEDDING_API_KEY required for OpenAI");
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = config.baseUrl || "https://api.openai.com/v1";
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (config.model.includes("3-large")) this.dimensions = 3072;
  }

  async embed(text: string): Promise<number[]> {
    const [result] = await this.embedBatch([text]);
    return result;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const raw = await postJSON(
      `${this.baseUrl}/embeddings`,
      { input: sanitize(texts), model: this.model },
      { Authorization: `Bearer ${this.apiKey}` },
      this.timeoutMs,
      "Embedding API",
    );
    return OpenAIEmbeddingResponse.parse(raw).data.map((d) => d.embedding);
  }
}

class OllamaEmbeddings implements EmbeddingProvider {
  private model: string;
  private baseUrl: string;
  private timeoutMs: number;
  dimensions = 0; // set by init()
  private initialized = false;

  constructor(config: ProviderConfig) {
    this.model = config.model || "nomic-embed-text";
    this.baseUrl = config.baseUrl || "http://localhost:11434";
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    const probe = await this.embed("dimension probe");
    this.dimensions = probe.length;
    this.initialized = true;
  }

  async embed(text: string): Promise<number[]> {
    const [result] = await this.embedBatch([text]);
    return result;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    let raw: unknown;
    try {
      raw = await postJSON(
        `${this.baseUrl}/api/embed`,
        { model: this.model, input: sanitize(texts) },
        {},
        this.timeoutMs,
        "Ollama",
      );
    } catch (err) {
      if (err instanceof Error && err.cause instanceof Error && "code" in err.cause && err.cause.code === "ECONNREFUSED") {
        throw new Error("Ollama not running. Start it with: ollama serve", { cause: err });
      }
      throw err;
    }
    const { embeddings } = OllamaEmbeddingResponse.parse(raw);
    if (!this.initialized && embeddings.length > 0) {
      this.dimensions = embeddings[0].length;
      this.initialized = true;
    }
    return embeddings;
  }
}

class VoyageEmbeddings implements EmbeddingProvider {
  private apiKey: string;
  private model: string;
  private timeoutMs: number;
  dimensions = 1024;

  constructor(config: ProviderConfig) {
    if (!config.apiKey) throw new Error("EMBEDDING_API_KEY required for VoyageAI");
    this.apiKey = config.apiKey;
    this.model = config.model || "voyage-2";
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async embed(text: string): Promise<number[]> {
    const [result] = await this.embedBatch([text]);
    return result;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const raw = await postJSON(
      "https://api.voyageai.com/v1/embeddings",
      { input: sanitize(texts), model: this.model },
      { Authorization: `Bearer ${this.apiKey}` },
      this.timeoutMs,
      "VoyageAI",
    );
    const { data } = OpenAIEmbeddingResponse.parse(raw);
    if (data.length > 0) this.dimensions = data[0].embedding.length;
    return data.map((d) => d.embedding);
  }
}

export async function createEmbeddingProvider(config: ProviderConfig): Promise<EmbeddingProvider> {
  switch (config.provider) {
    case "openai":
      return new OpenAIEmbeddings(config);
    case "kimi":
      return new OpenAIEmbeddings({ ...config, baseUrl: "https://api.moonshot.cn/v1" });
    case "jina":
      return new OpenAIEmbeddings({
        ...config,
        baseUrl: "https://api.jina.ai/v1",
        model: config.model || "jina-embeddings-v3",
      });
    case "ollama": {
      const provider = new OllamaEmbeddings(config);
      await provider.init();
      return provider;
    }
    case "voyageai":
      return new VoyageEmbeddings(config);
  }
}

/** Text embedded for an issue: title, a space, then the body. */
export function prepareEmbeddingText(issue: Pick<IssueRecord, "title" | "body">): string {
  const title = (issue.title || "").trim();
  const body = (issue.body || "").trim();
  return `${title} ${body}`.trim().slice(0, MAX_INPUT_CHARS);
}
