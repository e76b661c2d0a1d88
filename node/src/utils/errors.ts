/**
 * Error family for the retrieval backend. Every error carries a machine code and
 * a retryable flag so callers can decide between retry, per-item failure and
 * failing the whole request.
 */

export type RetrievalErrorCode =
  | 'EMBEDDING_TRANSIENT'
  | 'EMBEDDING_PERMANENT'
  | 'STORE_WRITE'
  | 'STORE_QUERY'
  | 'RETRIEVAL_FAILED'
  | 'INDEX_FAILED'
  | 'CONFIG_INVALID';

export class VoucherServiceError extends Error {
  constructor(
    message: string,
    public readonly code: RetrievalErrorCode,
    public readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'VoucherServiceError';
  }
}

/** Transient = network/timeout/rate limit; permanent = the model rejected the input. */
export class EmbeddingProviderError extends VoucherServiceError {
  constructor(message: string, transient: boolean, options?: { cause?: unknown }) {
    super(message, transient ? 'EMBEDDING_TRANSIENT' : 'EMBEDDING_PERMANENT', transient, options);
    this.name = 'EmbeddingProviderError';
  }

  get transient(): boolean {
    return this.retryable;
  }
}

export class StoreWriteError extends VoucherServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORE_WRITE', true, options);
    this.name = 'StoreWriteError';
  }
}

export class StoreQueryError extends VoucherServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORE_QUERY', true, options);
    this.name = 'StoreQueryError';
  }
}

/** Search-level failure: no partial or guessed ranking is returned alongside it. */
export class RetrievalError extends VoucherServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'RETRIEVAL_FAILED', false, options);
    this.name = 'RetrievalError';
  }
}

export class ConfigError extends VoucherServiceError {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }>,
  ) {
    super(message, 'CONFIG_INVALID', false);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
