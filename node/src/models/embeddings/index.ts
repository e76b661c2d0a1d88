/**
 * Embedding implementations
 */

export { default as OpenAIEmbedding, isTransientStatus } from './openai';
export type { EmbeddingsClient, OpenAIEmbeddingConfig } from './openai';
export { default as HashingEmbedding, hashToken } from './hashing';
export type { HashingEmbeddingConfig } from './hashing';
export { default as ResilientEmbedding } from './resilient';
export type { ResilientEmbeddingConfig } from './resilient';
