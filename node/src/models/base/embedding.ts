/**
 * BaseEmbedding: abstract base class for embedding providers.
 * Every provider produces vectors of one fixed `dimension`.
 */

import type { Embedding } from '@/types/core';
import type { Embedder } from '@/services/retrieval/retrieval-vector-utils';
import { EmbeddingProviderError } from '@/utils/errors';

export interface EmbeddingConfig {
  dimension: number;
}

abstract class BaseEmbedding<CONFIG extends EmbeddingConfig = EmbeddingConfig> implements Embedder {
  constructor(protected config: CONFIG) {}

  get dimension(): number {
    return this.config.dimension;
  }

  /**
   * Embed a batch of texts; the result is index-aligned with `texts`.
   * Failures surface as `EmbeddingProviderError`.
   */
  abstract embedText(texts: string[]): Promise<Embedding[]>;

  async embed(text: string): Promise<Embedding> {
    const [vector] = await this.embedText([text]);
    if (!vector) {
      throw new EmbeddingProviderError('embedding provider returned no vector', false);
    }
    return vector;
  }
}

export default BaseEmbedding;
