import { z } from "zod";
import type { LLMProviderName } from "./config.js";
import { AnalysisError, errorMessage } from "./errors.js";
import type { AnalysisResult, GitHubIssue, IssueAnalyzer, LLMProvider } from "./types.js";

export const VALID_LABELS = [
  "bug",
  "docs",
  "enhancement",
  "feature",
  "question",
  "good-first-issue",
  "help-wanted",
  "invalid",
  "wontfix",
] as const;

const VALID_LABEL_SET: ReadonlySet<string> = new Set(VALID_LABELS);

const DEFAULT_SOLUTION_STEPS = ["Review the issue description", "Investigate the codebase", "Implement a fix"];

const DEFAULT_CHECKLIST = [
  "Read and understand the issue",
  "Set up local development environment",
  "Reproduce the issue locally",
  "Identify affected files",
  "Implement the fix",
  "Write tests",
  "Submit PR",
];

export interface LLMConfig {
  provider: LLMProviderName;
  apiKey?: string;
  model: string;
}

const ChatCompletionResponse = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).min(1),
});

const AnthropicResponse = z.object({
  content: z.array(z.object({ text: z.string().optional() })).min(1),
});

// Each field degrades to undefined on a bad type so normalizeAnalysis can fill defaults
const RawAnalysisSchema = z
  .object({
    summary: z.string().optional().catch(undefined),
    root_cause: z.string().optional().catch(undefined),
    solution_steps: z.array(z.string()).optional().catch(undefined),
    checklist: z.array(z.string()).optional().catch(undefined),
    labels: z.array(z.unknown()).optional().catch(undefined),
  })
  .catch({});

/** Pull the outermost JSON object out of a reply, tolerating code fences and chatter. */
export function extractJSON(text: string): unknown {
  const unfenced = text.replace(/```(?:json)?/g, "");
  const match = unfenced.match(/\{[\s\S]*\}/);
  if (!match) throw new Error("LLM did not return valid JSON");
  const parsed: unknown = JSON.parse(match[0]);
  return parsed;
}

class OpenAILLM implements LLMProvider {
  private apiKey: string;
  private model: string;
  private baseUrl: string;

  constructor(config: LLMConfig & { baseUrl?: string }) {
    if (!config.apiKey) throw new Error("LLM_API_KEY required");
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = config.baseUrl || "https://api.openai.com/v1";
  }

  private async chat(prompt: string, systemPrompt: string | undefined, jsonMode: boolean): Promise<string> {
    const messages: Array<{ role: "system" | "user"; content: string }> = [];
    if (systemPrompt) messages.push({ role: "system", content: systemPrompt });
    messages.push({ role: "user", content: prompt });

    const resp = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages,
        temperature: 0.3,
        max_tokens: 2000,
        ...(jsonMode ? { response_format: { type: "json_object" } } : {}),
      }),
    });
    if (!resp.ok) throw new Error(`LLM API error (${resp.status}): ${await resp.text()}`);
    const data = ChatCompletionResponse.parse(await resp.json());
    return data.choices[0].message.content ?? "";
  }

  complete(prompt: string, systemPrompt?: string): Promise<string> {
    return this.chat(prompt, systemPrompt, false);
  }

  async completeJSON(prompt: string, systemPrompt?: string): Promise<unknown> {
    return extractJSON(await this.chat(prompt, systemPrompt, true));
  }
}

class AnthropicLLM implements LLMProvider {
  private apiKey: string;
  private model: string;

  constructor(config: LLMConfig) {
    if (!config.apiKey) throw new Error("LLM_API_KEY required for Anthropic");
    this.apiKey = config.apiKey;
    this.model = config.model;
  }

  async complete(prompt: string, systemPrompt?: string): Promise<string> {
    const resp = await fetch("https://api.anthropic.com/v1/messages", {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: 4096,
        messages: [{ role: "user", content: prompt }],
        ...(systemPrompt ? { system: systemPrompt } : {}),
      }),
    });
    if (!resp.ok) throw new Error(`Anthropic error (${resp.status}): ${await resp.text()}`);
    const data = AnthropicResponse.parse(await resp.json());
    return data.content[0].text ?? "";
  }

  async completeJSON(prompt: string, systemPrompt?: string): Promise<unknown> {
    // Anthropic has no JSON mode
    return extractJSON(await this.complete(prompt, systemPrompt));
  }
}

export function createLLMProvider(config: LLMConfig): LLMProvider {
  switch (config.provider) {
    case "openai":
      return new OpenAILLM(config);
    case "kimi":
      return new OpenAILLM({ ...config, baseUrl: "https://api.moonshot.cn/v1" });
    case "opencode":
      return new OpenAILLM({ ...config, baseUrl: "https://opencode.ai/zen/v1" });
    case "anthropic":
      return new AnthropicLLM(config);
    case "ollama":
      return new OpenAILLM({ ...config, baseUrl: "http://localhost:11434/v1", apiKey: "ollama" });
  }
}

export function isLLMConfigured(config: LLMConfig): boolean {
  return config.provider === "ollama" || Boolean(config.apiKey);
}

const SYSTEM_PROMPT = `You are a senior open-source maintainer with extensive experience in triaging and resolving GitHub issues. Your task is to analyze GitHub issues and provide:
1. Clear, concise summaries
2. Accurate root cause analysis
3. Actionable solution steps
4. Developer-friendly checklists
5. Appropriate label suggestions

Be precise and consider the contributor's perspective.`;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function buildAnalysisPrompt(issue: GitHubIssue): string {
  const body = truncate(issue.body || "No description provided.", 3000);
  const comments =
    issue.comments.length > 0
      ? issue.comments
          .slice(0, 5)
          .map((c, i) => `Comment ${i + 1}:\n${truncate(c, 500)}`)
          .join("\n\n")
      : "No comments yet.";

  return `Analyze the following GitHub issue and provide a structured analysis.

## Issue Title
${issue.title}

## Issue Body
${body}

## Top Comments
${comments}

## Task
Return a JSON object with this structure:
{
  "summary": "A clear 4-6 line summary of what this issue is about",
  "root_cause": "Your analysis of the likely root cause of this issue",
  "solution_steps": ["Step 1: ...", "Step 2: ...", "Step 3: ..."],
  "checklist": ["Understand the issue context", "Set up development environment", "..."],
  "labels": ["bug"]
}

Guidelines:
- Root cause should be specific and technical
- Solution steps should be actionable and ordered (minimum 3 steps)
- Checklist should have 6-10 items for a developer to follow
- Labels must be from: ${VALID_LABELS.join(", ")}

Return ONLY valid JSON, no additional text.`;
}

function isValidLabel(label: unknown): label is (typeof VALID_LABELS)[number] {
  return typeof label === "string" && VALID_LABEL_SET.has(label);
}

/** Fill gaps in a model reply so every field of the result is usable. */
export function normalizeAnalysis(raw: unknown): AnalysisResult {
  const parsed = RawAnalysisSchema.parse(raw);
  const labels = [...new Set((parsed.labels ?? []).filter(isValidLabel))];

  return {
    summary: parsed.summary || "Unable to generate summary.",
    root_cause: parsed.root_cause || "Unable to determine root cause.",
    solution_steps: parsed.solution_steps?.length ? parsed.solution_steps : [...DEFAULT_SOLUTION_STEPS],
    checklist: parsed.checklist?.length ? parsed.checklist : [...DEFAULT_CHECKLIST],
    labels: labels.length > 0 ? labels : ["bug"],
    similar_issues: [],
  };
}

export function createIssueAnalyzer(config: LLMConfig): IssueAnalyzer {
  const llm = isLLMConfigured(config) ? createLLMProvider(config) : null;

  return {
    async analyzeIssue(issue: GitHubIssue): Promise<AnalysisResult> {
      if (!llm) {
        throw new AnalysisError("AI API key is required. Set LLM_API_KEY or OPENAI_API_KEY.");
      }
      const prompt = buildAnalysisPrompt(issue);

      let result: unknown;
      try {
        try {
          result = await llm.completeJSON(prompt, SYSTEM_PROMPT);
        } catch {
          // Fallback: plain completion, then pull the JSON out of the text
          result = extractJSON(await llm.complete(prompt, SYSTEM_PROMPT));
        }
      } catch (err) {
        throw new AnalysisError(`AI analysis failed: ${errorMessage(err)}`, { cause: err });
      }
      return normalizeAnalysis(result);
    },
  };
}
