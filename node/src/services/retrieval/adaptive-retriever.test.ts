import { beforeEach, describe, expect, it, vi } from 'vitest';
import { HashingEmbedding } from '@/models/embeddings';
import BaseEmbedding from '@/models/base/embedding';
import { FacetExtractor } from '@/services/facets/facet-extractor';
import { loadGazetteer } from '@/services/geo/gazetteer';
import { GeographyResolver } from '@/services/geo/geography-resolver';
import { MultiFieldIndexer } from '@/services/indexing/multi-field-indexer';
import { cleanVoucher, coerceSourceRecord } from '@/services/indexing/voucher-cleaner';
import { QueryParser } from '@/services/query-understanding';
import { InMemoryVoucherStore } from '@/services/store/in-memory-voucher-store';
import type { Embedding, VoucherDocument } from '@/types/core';
import { EmbeddingProviderError, RetrievalError, StoreQueryError } from '@/utils/errors';
import { AdaptiveRetriever } from './adaptive-retriever';

const gazetteer = loadGazetteer();
const resolver = new GeographyResolver(gazetteer);
const parser = new QueryParser(gazetteer);
const extractor = new FacetExtractor(gazetteer);
const NOW = new Date('2024-05-01T00:00:00.000Z');

const records = [
  {
    name: 'Guta Cafe Buy1Get1',
    description: 'Quán cafe không gian ấm cúng, mua 1 tặng 1 đồ uống.',
    location: 'Hải Phòng',
    price: 45000,
    unit: 'VND',
    merchant: 'Guta Cafe',
  },
  {
    name: 'Guta Cafe Buy1Get1',
    description: 'Quán cafe không gian ấm cúng, mua 1 tặng 1 đồ uống.',
    location: 'Hà Nội',
    price: 45000,
    unit: 'VND',
    merchant: 'Guta Cafe Hà Nội',
  },
  {
    name: 'Buffet hải sản cuối tuần',
    description: 'Buffet tối với hơn 50 món hải sản cho cả gia đình.',
    location: 'Hồ Chí Minh',
    price: 650000,
    unit: 'VND',
    merchant: 'Ocean Buffet',
  },
  {
    name: 'Spa thư giãn',
    description: 'Massage toàn thân 90 phút.',
    location: 'Đà Nẵng',
    price: 350000,
    unit: 'VND',
    merchant: 'Lotus Spa',
  },
].map((r) => cleanVoucher(coerceSourceRecord(r), NOW));

const [gutaHaiPhong, gutaHaNoi, buffet, spa] = records.map((r) => r.id);

class UnavailableEmbedding extends BaseEmbedding {
  constructor() {
    super({ dimension: 64 });
  }

  async embedText(_texts: string[]): Promise<Embedding[]> {
    throw new EmbeddingProviderError('connection reset', true);
  }
}

/** Answers every request with no vectors at all. */
class EmptyReplyEmbedding extends BaseEmbedding {
  constructor() {
    super({ dimension: 64 });
  }

  async embedText(_texts: string[]): Promise<Embedding[]> {
    return [];
  }
}

class NaNEmbedding extends BaseEmbedding {
  constructor() {
    super({ dimension: 64 });
  }

  async embedText(texts: string[]): Promise<Embedding[]> {
    return texts.map(() => new Array<number>(64).fill(Number.NaN));
  }
}

let store: InMemoryVoucherStore;
let embedder: HashingEmbedding;
let retriever: AdaptiveRetriever;

beforeEach(async () => {
  store = new InMemoryVoucherStore();
  embedder = new HashingEmbedding({ dimension: 64 });
  const indexer = new MultiFieldIndexer(embedder, store, extractor, gazetteer);
  for (const record of records) {
    const outcome = await indexer.indexVoucher(record);
    if (outcome.status !== 'indexed') throw outcome.error;
  }
  retriever = new AdaptiveRetriever(embedder, store, parser, resolver);
});

describe('AdaptiveRetriever.search', () => {
  it('ranks the Hải Phòng cafe first and above its Hà Nội twin', async () => {
    const results = await retriever.search('quán cafe ở Hải Phòng', 10);
    expect(results.slice(0, 3).map((r) => r.id)).toContain(gutaHaiPhong);
    expect(results[0]?.id).toBe(gutaHaiPhong);
    expect(results[0]?.facets.location).toBe('Hải Phòng');
    expect(results[0]?.geoMatch).toBe('exact');
    expect(results[0]?.matchedPlace).toBe('Hải Phòng');

    const haNoi = results.find((r) => r.id === gutaHaNoi);
    expect(haNoi?.geoMatch).toBe('region');
    expect(results[0]?.score ?? 0).toBeGreaterThan(haNoi?.score ?? Infinity);
  });

  it('parses a query with no signals as general and still ranks', async () => {
    const detailed = await retriever.searchDetailed('voucher hot nhất', { topK: 10 });
    expect(detailed.components.intent).toBe('general');
    expect(detailed.components.location).toBeNull();
    expect(detailed.focus).toBe('general');
    expect(detailed.geo).toBeNull();
    expect(detailed.geoExplanation).toBeNull();
    expect(detailed.results).toHaveLength(4);
    expect(detailed.results.every((r) => r.geoMultiplier === 1)).toBe(true);
  });

  it('is deterministic', async () => {
    const first = await retriever.search('buffet hải sản', 4);
    const second = await retriever.search('buffet hải sản', 4);
    expect(second).toEqual(first);
    expect(first[0]?.id).toBe(buffet);
  });

  it('honours topK', async () => {
    expect(await retriever.search('cafe', 2)).toHaveLength(2);
  });

  it('treats a negative or zero topK as an empty cut', async () => {
    expect(await retriever.search('cafe', -1)).toEqual([]);
    expect(await retriever.search('cafe', 0)).toEqual([]);
  });

  it('explains how geography shaped the results', async () => {
    const { geoExplanation } = await retriever.searchDetailed('quán cafe ở Hải Phòng', { topK: 10 });
    const lines = geoExplanation?.split('\n') ?? [];
    expect(lines[0]).toBe('Kết quả tìm kiếm cho địa điểm: Hải Phòng');
    expect(lines).toContain('1. Guta Cafe Buy1Get1 (EXACT MATCH ✅)');
    expect(lines[lines.length - 1]).toBe('- Hạ Long (43.1km)');
  });

  it('filters by resolved location', async () => {
    const results = await retriever.search('cafe', 10, { location: 'hai phong' });
    expect(results.map((r) => r.id)).toEqual([gutaHaiPhong]);
    expect(results.every((r) => r.facets.location === 'Hải Phòng')).toBe(true);
  });

  it('filters by service type and price bracket', async () => {
    expect((await retriever.search('thư giãn', 10, { serviceType: 'Beauty' })).map((r) => r.id)).toEqual([spa]);
    expect(await retriever.search('cafe', 10, { priceBracket: 'Luxury' })).toEqual([]);
  });

  it('restricts to the place and its neighbours with strictLocation', async () => {
    const { results } = await retriever.searchDetailed('cafe ở Hải Phòng', { topK: 10, strictLocation: true });
    expect(results.map((r) => r.id)).toEqual([gutaHaiPhong]);
  });

  it('adds the name bonus when the query names a voucher', async () => {
    const [top] = await retriever.search('Spa thư giãn', 1);
    expect(top?.id).toBe(spa);
    expect(top?.lexicalScore).toBeGreaterThan(2);
  });

  it('ranks a blank query by store order with no semantic signal', async () => {
    const results = await retriever.search('', 10);
    expect(results.map((r) => r.id)).toEqual([gutaHaiPhong, gutaHaNoi, buffet, spa]);
    expect(results.every((r) => r.semanticScore === 0 && r.score === 0)).toBe(true);
  });
});

describe('geo boost monotonicity', () => {
  it('puts the query place above an identical voucher in another region', async () => {
    const base = await store.get(gutaHaiPhong);
    if (!base) throw new Error('fixture missing');
    const elsewhere: VoucherDocument = {
      ...base,
      id: 'voucher_elsewhere',
      facets: { ...base.facets, location: 'Cần Thơ' },
    };
    const local: VoucherDocument = { ...base, id: 'voucher_local' };

    const isolated = new InMemoryVoucherStore();
    await isolated.upsert(elsewhere);
    await isolated.upsert(local);
    const results = await new AdaptiveRetriever(embedder, isolated, parser, resolver).search('cafe ở Hải Phòng', 2);

    expect(results.map((r) => r.id)).toEqual(['voucher_local', 'voucher_elsewhere']);
    expect(results[0]?.semanticScore).toBe(results[1]?.semanticScore);
    expect(results[0]?.geoMultiplier).toBe(1.8);
    expect(results[1]?.geoMultiplier).toBe(1);
  });
});

describe('failures', () => {
  it('fails the search when the embedding provider is down', async () => {
    const broken = new AdaptiveRetriever(new UnavailableEmbedding(), store, parser, resolver);
    await expect(broken.search('quán cafe', 5)).rejects.toBeInstanceOf(RetrievalError);
  });

  it('ranks lexically and reports degraded mode when allowed', async () => {
    const broken = new AdaptiveRetriever(new UnavailableEmbedding(), store, parser, resolver);
    const detailed = await broken.searchDetailed('spa thư giãn', { allowLexicalFallback: true });
    expect(detailed.degraded).toBe(true);
    expect(detailed.results[0]?.id).toBe(spa);
    expect(detailed.results.every((r) => r.semanticScore === 0)).toBe(true);
  });

  it('refuses to score against an index built at another dimension', async () => {
    const resized = new AdaptiveRetriever(new HashingEmbedding({ dimension: 32 }), store, parser, resolver);
    const err = await resized.search('quán cafe', 5).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetrievalError);
    expect(err instanceof RetrievalError && err.message).toBe(
      `voucher ${gutaHaiPhong} was indexed with 64-dimension embeddings, query embeddings have 32`,
    );
  });

  it('ranks lexically on a dimension mismatch only when allowed', async () => {
    const resized = new AdaptiveRetriever(new HashingEmbedding({ dimension: 32 }), store, parser, resolver);
    const detailed = await resized.searchDetailed('spa thư giãn', { allowLexicalFallback: true });
    expect(detailed.degraded).toBe(true);
    expect(detailed.results[0]?.id).toBe(spa);
    expect(detailed.results.every((r) => r.semanticScore === 0)).toBe(true);
  });

  it('fails when the provider returns no vector', async () => {
    const empty = new AdaptiveRetriever(new EmptyReplyEmbedding(), store, parser, resolver);
    const err = await empty.search('quán cafe', 5).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetrievalError);
    const cause = err instanceof RetrievalError ? err.cause : null;
    expect(cause).toBeInstanceOf(EmbeddingProviderError);
    expect(cause instanceof EmbeddingProviderError && cause.transient).toBe(false);
  });

  it('fails on a query vector with non-finite values', async () => {
    const broken = new AdaptiveRetriever(new NaNEmbedding(), store, parser, resolver);
    await expect(broken.search('quán cafe', 5)).rejects.toThrow('query embedding is unusable');
  });

  it('wraps store failures and returns no partial results', async () => {
    vi.spyOn(store, 'find').mockRejectedValueOnce(new StoreQueryError('redis down'));
    const err = await retriever.search('cafe', 5).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetrievalError);
    expect(err instanceof RetrievalError && err.cause).toBeInstanceOf(StoreQueryError);
  });

  it('stops when the caller aborts', async () => {
    await expect(retriever.searchDetailed('cafe', { signal: AbortSignal.abort() })).rejects.toThrow();
  });
});

describe('AdaptiveRetriever.explain', () => {
  it('explains the parse without calling the embedder', () => {
    const spy = vi.spyOn(embedder, 'embed');
    const explanation = retriever.explain('quán cafe ở Hải Phòng');

    expect(explanation.focus).toBe('location');
    expect(explanation.weights.location).toBe(0.4);
    expect(explanation.hintText).toBe('Địa điểm khu vực: quán cafe ở Hải Phòng');
    expect(explanation.geo?.place).toBe('Hải Phòng');
    expect(explanation.geo?.nearby.map((n) => n.name)).toEqual(['Hạ Long']);
    expect(explanation.description.split('\n')[2]).toBe('- Địa điểm: Hải Phòng (direct)');
    expect(spy).not.toHaveBeenCalled();
  });
});
