// src/services/retrieval/retrieval-vector-utils.ts: shared BM25 + vector helpers for hybrid voucher retrieval
import type { Embedding } from '@/types/core';
import { foldedText, words } from '@/utils/text';

export interface Embedder {
  readonly dimension: number;
  embed(text: string): Promise<Embedding>;
}

export function dot(a: Embedding, b: Embedding): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) sum += a[i] * b[i];
  return sum;
}

export function l2Norm(v: Embedding): number {
  return Math.sqrt(dot(v, v));
}

/** Unit-length copy; a zero vector comes back as zeros. */
export function l2Normalize(v: Embedding): Embedding {
  const norm = l2Norm(v);
  if (norm === 0) return v.map(() => 0);
  return v.map((x) => x / norm);
}

export function cosineSimilarity(a: Embedding, b: Embedding): number {
  if (a.length !== b.length || a.length === 0) return 0;
  const na = l2Norm(a);
  const nb = l2Norm(b);
  if (na === 0 || nb === 0) return 0;
  return dot(a, b) / (na * nb);
}

/** Σ wᵢ·vᵢ over equal-length vectors. */
export function weightedSum(parts: Array<{ vector: Embedding; weight: number }>, dimension: number): Embedding {
  const out = new Array<number>(dimension).fill(0);
  for (const { vector, weight } of parts) {
    for (let i = 0; i < dimension; i++) out[i] += weight * (vector[i] ?? 0);
  }
  return out;
}

/** Diacritic-folded word tokens; `Hải Phòng` and `hai phong` tokenize the same. */
export function tokenize(text: string): string[] {
  return words(foldedText(text));
}

/** Document frequencies and average length for one corpus snapshot. */
export interface Bm25Stats {
  docCount: number;
  avgDocLength: number;
  docFreq: Map<string, number>;
}

export function buildBm25Stats(docs: string[][]): Bm25Stats {
  const docFreq = new Map<string, number>();
  let total = 0;
  for (const tokens of docs) {
    total += tokens.length;
    for (const t of new Set(tokens)) docFreq.set(t, (docFreq.get(t) ?? 0) + 1);
  }
  return { docCount: docs.length, avgDocLength: docs.length ? total / docs.length : 0, docFreq };
}

/** Okapi idf, floored at zero by the `1 +` inside the log. */
export function idf(stats: Bm25Stats, term: string): number {
  const df = stats.docFreq.get(term) ?? 0;
  return Math.log(1 + (stats.docCount - df + 0.5) / (df + 0.5));
}

export function bm25Score(
  queryTokens: string[],
  docTokens: string[],
  stats: Bm25Stats,
  k1 = 1.5,
  b = 0.75,
): number {
  if (docTokens.length === 0 || queryTokens.length === 0) return 0;

  const docLength = docTokens.length;
  const termFreq = new Map<string, number>();
  for (const t of docTokens) termFreq.set(t, (termFreq.get(t) ?? 0) + 1);

  let score = 0;
  for (const qt of new Set(queryTokens)) {
    const tf = termFreq.get(qt) ?? 0;
    if (tf === 0) continue;

    const numerator = tf * (k1 + 1);
    const denominator = tf + k1 * (1 - b + (b * docLength) / Math.max(stats.avgDocLength, 1));
    score += idf(stats, qt) * (numerator / denominator);
  }

  return score;
}
