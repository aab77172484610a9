import type { TextVector } from "./types.js";

// negations ("not", "no", "never") stay in
const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "but", "by", "for", "from", "has",
  "have", "i", "if", "in", "into", "is", "it", "its", "of", "on", "or", "that",
  "the", "this", "to", "was", "we", "were", "will", "with",
]);

export interface VectorizerOptions {
  /** Longest n-gram built from adjacent tokens. */
  ngramMax?: number;
  /** Vocabulary cap, keeping the terms with the highest corpus counts. */
  maxFeatures?: number;
}

export interface FittedModel {
  vocabulary: ReadonlyMap<string, number>;
  idf: readonly number[];
  ngramMax: number;
  documentCount: number;
}

/**
 * Lower-case, drop fenced code and URLs, then replace everything outside
 * [a-z0-9] and whitespace with a space.
 */
export function normalizeText(text: string): string {
  if (!text) return "";
  return text
    .toLowerCase()
    .replace(/```[\s\S]*?```/g, " ")
    .replace(/https?:\/\/\S+/g, " ")
    .replace(/[^a-z0-9\s]/g, " ")
    .split(/\s+/)
    .filter(Boolean)
    .join(" ");
}

export function tokenize(text: string): string[] {
  return normalizeText(text)
    .split(" ")
    .filter((t) => t.length > 0 && !STOPWORDS.has(t));
}

export function countTokens(text: string): number {
  return tokenize(text).length;
}

function extractTerms(text: string, ngramMax: number): string[] {
  const tokens = tokenize(text);
  const terms = [...tokens];
  for (let n = 2; n <= ngramMax; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      terms.push(tokens.slice(i, i + n).join(" "));
    }
  }
  return terms;
}

function countTerms(terms: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) counts.set(term, (counts.get(term) ?? 0) + 1);
  return counts;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function fitVectorizer(corpus: readonly string[], opts: VectorizerOptions = {}): FittedModel {
  const ngramMax = Math.max(1, opts.ngramMax ?? 2);
  const maxFeatures = opts.maxFeatures ?? 5000;

  const docFreq = new Map<string, number>();
  const totalCount = new Map<string, number>();
  for (const doc of corpus) {
    for (const [term, count] of countTerms(extractTerms(doc, ngramMax))) {
      docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
      totalCount.set(term, (totalCount.get(term) ?? 0) + count);
    }
  }

  let terms = [...totalCount.keys()];
  if (terms.length > maxFeatures) {
    terms = terms
      .sort((a, b) => (totalCount.get(b) ?? 0) - (totalCount.get(a) ?? 0) || compareStrings(a, b))
      .slice(0, maxFeatures);
  }
  terms.sort(compareStrings);

  const n = corpus.length;
  const vocabulary = new Map<string, number>();
  const idf: number[] = [];
  terms.forEach((term, index) => {
    vocabulary.set(term, index);
    // smoothed idf: a term present in every document still weighs 1
    idf.push(Math.log((1 + n) / (1 + (docFreq.get(term) ?? 0))) + 1);
  });

  return { vocabulary, idf, ngramMax, documentCount: n };
}

/**
 * tf × idf over the fitted vocabulary, L2-normalized. Text with no known terms
 * yields an all-zero vector.
 */
export function transformText(model: FittedModel, text: string): TextVector {
  const vector = new Array<number>(model.vocabulary.size).fill(0);
  for (const [term, count] of countTerms(extractTerms(text, model.ngramMax))) {
    const index = model.vocabulary.get(term);
    if (index === undefined) continue;
    vector[index] = count * model.idf[index];
  }

  let norm = 0;
  for (const w of vector) norm += w * w;
  if (norm === 0) return vector;
  norm = Math.sqrt(norm);
  return vector.map((w) => w / norm);
}
