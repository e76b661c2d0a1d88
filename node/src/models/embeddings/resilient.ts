// Timeout and single-retry policy around any embedding provider.

import BaseEmbedding, { type EmbeddingConfig } from '../base/embedding';
import type { Embedding } from '@/types/core';
import { EmbeddingProviderError, errorMessage } from '@/utils/errors';
import { retryWithBackoff, withTimeout } from '@/utils/retryWithBackoff';

export interface ResilientEmbeddingConfig extends EmbeddingConfig {
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
}

function asProviderError(err: unknown): EmbeddingProviderError {
  if (err instanceof EmbeddingProviderError) return err;
  return new EmbeddingProviderError(`embedding provider failed: ${errorMessage(err)}`, true, { cause: err });
}

class ResilientEmbedding extends BaseEmbedding<ResilientEmbeddingConfig> {
  constructor(
    private readonly inner: BaseEmbedding,
    options: Partial<Omit<ResilientEmbeddingConfig, 'dimension'>> = {},
  ) {
    super({
      dimension: inner.dimension,
      timeoutMs: options.timeoutMs ?? 10_000,
      retries: options.retries ?? 1,
      retryDelayMs: options.retryDelayMs ?? 200,
    });
  }

  async embedText(texts: string[]): Promise<Embedding[]> {
    const { timeoutMs, retries, retryDelayMs } = this.config;
    return retryWithBackoff(
      async () => {
        try {
          return await withTimeout(
            this.inner.embedText(texts),
            timeoutMs,
            () => new EmbeddingProviderError(`embedding timed out after ${timeoutMs}ms`, true),
          );
        } catch (err) {
          throw asProviderError(err);
        }
      },
      {
        maxRetries: retries,
        initialDelay: retryDelayMs,
        jitter: false,
        shouldRetry: (err) => err instanceof EmbeddingProviderError && err.transient,
        label: 'embedding',
      },
    );
  }
}

export default ResilientEmbedding;
