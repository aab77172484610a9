import type { IssueRecord, SimilarityResult, TextVector } from "./types.js";

/**
 * Cosine similarity shared by both detection strategies.
 * Accepts Float32Array or number[]; only index access is used.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0,
    normA = 0,
    normB = 0;
  const len = Math.min(a.length, b.length);
  for (let i = 0; i < len; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}

/**
 * Check if a vector is all zeros (empty text or failed embedding).
 */
export function isZeroVector(v: ArrayLike<number>): boolean {
  for (let i = 0; i < v.length; i++) {
    if (v[i] !== 0) return false;
  }
  return true;
}

export interface RankCandidate {
  issue: IssueRecord;
  vector: TextVector;
}

/**
 * Score every candidate against the target, keep those at or above the threshold,
 * and order by similarity (desc) then issue number (asc). Pure.
 */
export function rankBySimilarity(
  target: TextVector,
  candidates: readonly RankCandidate[],
  threshold: number,
  limit: number,
): SimilarityResult[] {
  if (limit <= 0 || isZeroVector(target)) return [];

  const scored: SimilarityResult[] = [];
  for (const { issue, vector } of candidates) {
    // zero vectors never count as duplicates, even at threshold 0
    if (isZeroVector(vector)) continue;
    const similarity = Math.min(1, Math.max(0, cosineSimilarity(target, vector)));
    if (similarity < threshold) continue;
    scored.push({ issue_number: issue.number, title: issue.title, url: issue.url, similarity });
  }

  scored.sort((a, b) => b.similarity - a.similarity || a.issue_number - b.issue_number);
  return scored.slice(0, limit);
}
