// src/services/pipeline-deps.ts: retrieval dependencies built once at startup and handed to the routes
import Redis from 'ioredis';
import type { AppConfig } from '@/config/app.config';
import type BaseEmbedding from '@/models/base/embedding';
import { HashingEmbedding, OpenAIEmbedding, ResilientEmbedding } from '@/models/embeddings';
import { OpenAIAnswerComposer, type AnswerComposer } from '@/services/answer/answer-composer';
import { FacetExtractor } from '@/services/facets/facet-extractor';
import { loadGazetteer, type Gazetteer } from '@/services/geo/gazetteer';
import { GeographyResolver } from '@/services/geo/geography-resolver';
import { MultiFieldIndexer } from '@/services/indexing/multi-field-indexer';
import { logger } from '@/services/logger';
import { QueryParser } from '@/services/query-understanding';
import { AdaptiveRetriever } from '@/services/retrieval/adaptive-retriever';
import { InMemoryVoucherStore } from '@/services/store/in-memory-voucher-store';
import { RedisVoucherStore } from '@/services/store/redis-voucher-store';
import type { VoucherStore } from '@/services/store/voucher-store';
import { ConfigError } from '@/utils/errors';

export interface RetrievalContext {
  config: AppConfig;
  gazetteer: Gazetteer;
  embedder: BaseEmbedding;
  store: VoucherStore;
  resolver: GeographyResolver;
  parser: QueryParser;
  extractor: FacetExtractor;
  indexer: MultiFieldIndexer;
  retriever: AdaptiveRetriever;
  answerComposer: AnswerComposer | null;
  close(): Promise<void>;
}

/** Overrides let tests and scripts inject an embedder or store without touching config. */
export interface RetrievalContextOverrides {
  embedder?: BaseEmbedding;
  store?: VoucherStore;
  answerComposer?: AnswerComposer | null;
}

function requireApiKey(config: AppConfig): string {
  const { apiKey } = config.embedding;
  if (!apiKey) {
    throw new ConfigError('OPENAI_API_KEY is required', [{ path: 'OPENAI_API_KEY', message: 'Required' }]);
  }
  return apiKey;
}

function createEmbedder(config: AppConfig): BaseEmbedding {
  const { provider, model, dimension, timeoutMs } = config.embedding;
  const base =
    provider === 'openai'
      ? new OpenAIEmbedding({ model, dimension, apiKey: requireApiKey(config) })
      : new HashingEmbedding({ dimension });
  return new ResilientEmbedding(base, { timeoutMs, retries: 1 });
}

function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      return Math.min(times * 200, 2000);
    },
  });
  client.on('error', (err: Error) => logger.warn('redis:error', { error: err.message }));
  client.on('ready', () => logger.info('redis:connected'));
  client.on('close', () => logger.info('redis:closed'));
  return client;
}

export function createRetrievalContext(config: AppConfig, overrides: RetrievalContextOverrides = {}): RetrievalContext {
  const gazetteer = loadGazetteer();
  const resolver = new GeographyResolver(gazetteer);
  const parser = new QueryParser(gazetteer);
  const extractor = new FacetExtractor(gazetteer);
  const embedder = overrides.embedder ?? createEmbedder(config);

  let redis: Redis | null = null;
  let store = overrides.store;
  if (!store) {
    if (config.store.kind === 'redis') {
      redis = createRedisClient(config.store.redisUrl);
      store = new RedisVoucherStore(redis, config.store.keyPrefix);
    } else {
      store = new InMemoryVoucherStore();
    }
  }

  const answerComposer =
    overrides.answerComposer !== undefined
      ? overrides.answerComposer
      : config.answer.enabled
        ? new OpenAIAnswerComposer({ apiKey: requireApiKey(config), model: config.answer.model })
        : null;

  logger.info('retrieval context ready', {
    embedding: config.embedding.provider,
    dimension: embedder.dimension,
    store: overrides.store ? 'injected' : config.store.kind,
    answers: answerComposer !== null,
  });

  return {
    config,
    gazetteer,
    embedder,
    store,
    resolver,
    parser,
    extractor,
    indexer: new MultiFieldIndexer(embedder, store, extractor, gazetteer, config.ingest.concurrency),
    retriever: new AdaptiveRetriever(embedder, store, parser, resolver),
    answerComposer,
    async close() {
      if (redis) await redis.quit();
    },
  };
}
