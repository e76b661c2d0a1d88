/**
 * OpenAIEmbedding: OpenAI implementation of BaseEmbedding.
 * SDK retries are off; retry policy belongs to ResilientEmbedding.
 */

import OpenAI from 'openai';
import BaseEmbedding, { type EmbeddingConfig } from '../base/embedding';
import type { Embedding } from '@/types/core';
import { EmbeddingProviderError, errorMessage } from '@/utils/errors';

export interface OpenAIEmbeddingConfig extends EmbeddingConfig {
  model: string;
  apiKey: string;
}

/** The slice of the OpenAI client used here; an `OpenAI` instance satisfies it. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[]; dimensions?: number }): Promise<{
      data: Array<{ index: number; embedding: number[] }>;
    }>;
  };
}

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

/** Connection failures carry no status; 408/409/429 and 5xx are worth retrying. */
export function isTransientStatus(status: number | undefined): boolean {
  return status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500;
}

function toProviderError(err: unknown): EmbeddingProviderError {
  if (err instanceof OpenAI.APIError) {
    return new EmbeddingProviderError(`openai embeddings failed: ${err.message}`, isTransientStatus(err.status), {
      cause: err,
    });
  }
  return new EmbeddingProviderError(`openai embeddings failed: ${errorMessage(err)}`, true, { cause: err });
}

class OpenAIEmbedding extends BaseEmbedding<OpenAIEmbeddingConfig> {
  private client: EmbeddingsClient;

  constructor(config: OpenAIEmbeddingConfig, client?: EmbeddingsClient) {
    super(config);
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async embedText(texts: string[]): Promise<Embedding[]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings
      .create({ model: this.config.model, input: texts, dimensions: this.dimension })
      .catch((err: unknown) => {
        throw toProviderError(err);
      });

    const vectors = [...response.data].sort((a, b) => a.index - b.index).map((d) => d.embedding);
    if (vectors.length !== texts.length) {
      throw new EmbeddingProviderError(`expected ${texts.length} embeddings, got ${vectors.length}`, false);
    }
    for (const v of vectors) {
      if (v.length !== this.dimension) {
        throw new EmbeddingProviderError(`embedding has length ${v.length}, expected ${this.dimension}`, false);
      }
    }
    return vectors;
  }
}

export default OpenAIEmbedding;
