// Deterministic feature-hashing embedding: no network, used offline and as the test double.

import BaseEmbedding, { type EmbeddingConfig } from '../base/embedding';
import { l2Normalize, tokenize } from '@/services/retrieval/retrieval-vector-utils';
import type { Embedding } from '@/types/core';

export type HashingEmbeddingConfig = EmbeddingConfig;

export function hashToken(token: string): number {
  let hash = 0;
  for (let i = 0; i < token.length; i++) {
    hash = (hash * 31 + token.charCodeAt(i)) >>> 0;
  }
  return hash;
}

class HashingEmbedding extends BaseEmbedding<HashingEmbeddingConfig> {
  constructor(config: Partial<HashingEmbeddingConfig> = {}) {
    super({ dimension: config.dimension ?? 768 });
  }

  async embedText(texts: string[]): Promise<Embedding[]> {
    return texts.map((text) => this.vectorFor(text));
  }

  /** Token counts hashed into `dimension` buckets, then L2-normalised; no tokens gives the zero vector. */
  private vectorFor(text: string): Embedding {
    const vec = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      vec[hashToken(token) % this.dimension] += 1;
    }
    return l2Normalize(vec);
  }
}

export default HashingEmbedding;
