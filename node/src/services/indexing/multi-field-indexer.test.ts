import { describe, expect, it } from 'vitest';
import BaseEmbedding from '@/models/base/embedding';
import { HashingEmbedding } from '@/models/embeddings';
import { FacetExtractor } from '@/services/facets/facet-extractor';
import { loadGazetteer } from '@/services/geo/gazetteer';
import { l2Norm } from '@/services/retrieval/retrieval-vector-utils';
import { InMemoryVoucherStore } from '@/services/store/in-memory-voucher-store';
import type { Embedding, VoucherDocument } from '@/types/core';
import { SCORED_FACETS } from '@/types/core';
import { EmbeddingProviderError } from '@/utils/errors';
import { MultiFieldIndexer, facetPrompts } from './multi-field-indexer';
import { cleanVoucher, coerceSourceRecord } from './voucher-cleaner';

const gazetteer = loadGazetteer();
const extractor = new FacetExtractor(gazetteer);
const NOW = new Date('2024-05-01T00:00:00.000Z');

const guta = coerceSourceRecord({
  name: 'Guta Cafe Buy1Get1',
  description: 'Quán cafe không gian ấm cúng, mua 1 tặng 1 đồ uống.',
  location: 'Hải Phòng',
  price: 45000,
  unit: 'VND',
  merchant: 'Guta Cafe',
});
const spa = coerceSourceRecord({ name: 'Spa thư giãn', description: 'Massage toàn thân', location: 'Đà Nẵng', merchant: 'Lotus Spa' });
const buffet = coerceSourceRecord({ name: 'Buffet hải sản', description: 'Buffet tối cuối tuần', location: 'Sài Gòn', merchant: 'Ocean' });

/** Fails for any batch whose content prompt mentions `poison`. */
class SelectiveFailingEmbedding extends BaseEmbedding {
  private readonly inner = new HashingEmbedding({ dimension: 32 });

  constructor(private readonly poison: string) {
    super({ dimension: 32 });
  }

  async embedText(texts: string[]): Promise<Embedding[]> {
    if (texts.some((t) => t.includes(this.poison))) {
      throw new EmbeddingProviderError('model rejected input', false);
    }
    return this.inner.embedText(texts);
  }
}

class ShortVectorEmbedding extends BaseEmbedding {
  constructor() {
    super({ dimension: 8 });
  }

  async embedText(texts: string[]): Promise<Embedding[]> {
    return texts.map(() => [1, 0, 0]);
  }
}

class FailingWriteStore extends InMemoryVoucherStore {
  async upsert(_doc: VoucherDocument): Promise<void> {
    throw new Error('disk full');
  }
}

function setup(embedder: BaseEmbedding = new HashingEmbedding({ dimension: 64 }), store = new InMemoryVoucherStore()) {
  return { store, indexer: new MultiFieldIndexer(embedder, store, extractor, gazetteer, 2) };
}

describe('facetPrompts', () => {
  it('renders the synthetic facet sentences', () => {
    const facets = extractor.extract('mua 1 tặng 1', 'Guta Cafe', { location: 'Hải Phòng' });
    expect(facetPrompts('raw', facets, 'Miền Bắc')).toEqual({
      content: 'raw',
      location: 'Địa điểm: Hải Phòng. Khu vực: Miền Bắc.',
      service: 'Dịch vụ: Restaurant. Keywords: mua 1 tặng 1.',
      target: 'Đối tượng: General. Phù hợp cho: General.',
    });
    expect(facetPrompts('raw', { ...facets, location: 'Unknown' }, null).location).toBe('Địa điểm: Unknown. Khu vực: Unknown.');
  });
});

describe('MultiFieldIndexer.indexVoucher', () => {
  it('stores five unit-length vectors of the provider dimension', async () => {
    const { indexer, store } = setup();
    const outcome = await indexer.indexVoucher(cleanVoucher(guta, NOW));
    expect(outcome.status).toBe('indexed');

    const doc = await store.get('voucher_f6ad32a2');
    expect(doc?.facets.location).toBe('Hải Phòng');
    expect(doc?.facets.serviceType).toBe('Restaurant');
    for (const facet of SCORED_FACETS) {
      const vector = doc?.embeddings[facet] ?? [];
      expect(vector).toHaveLength(64);
      expect(Math.abs(l2Norm(vector) - 1)).toBeLessThan(1e-4);
    }
  });

  it('is idempotent for the same record', async () => {
    const { indexer, store } = setup();
    await indexer.indexVoucher(cleanVoucher(guta, NOW));
    const first = await store.get('voucher_f6ad32a2');
    await indexer.indexVoucher(cleanVoucher(guta, NOW));
    const second = await store.get('voucher_f6ad32a2');

    expect(await store.count()).toBe(1);
    expect(second).toEqual(first);
  });

  it('uses given facets instead of extracting them', async () => {
    const { indexer } = setup();
    const facets = { ...extractor.extract('', 'x'), location: 'Huế' };
    const outcome = await indexer.indexVoucher(cleanVoucher(guta, NOW), facets);
    expect(outcome.status === 'indexed' && outcome.document.facets.location).toBe('Huế');
  });

  it('fails permanently on vectors of the wrong length', async () => {
    const { indexer, store } = setup(new ShortVectorEmbedding());
    const outcome = await indexer.indexVoucher(cleanVoucher(guta, NOW));
    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.error).toBeInstanceOf(EmbeddingProviderError);
      expect(outcome.error.code).toBe('EMBEDDING_PERMANENT');
    }
    expect(await store.count()).toBe(0);
  });

  it('reports store failures as write errors', async () => {
    const { indexer } = setup(undefined, new FailingWriteStore());
    const outcome = await indexer.indexVoucher(cleanVoucher(guta, NOW));
    expect(outcome.status === 'failed' && outcome.error.code).toBe('STORE_WRITE');
  });
});

describe('MultiFieldIndexer.indexBatch', () => {
  it('continues past a failing voucher', async () => {
    const { indexer, store } = setup(new SelectiveFailingEmbedding('Massage'));
    const report = await indexer.indexBatch([guta, spa, buffet], { now: NOW });

    expect(report.indexed).toBe(2);
    expect(report.skipped).toBe(0);
    expect(report.failed).toEqual([
      {
        id: cleanVoucher(spa, NOW).id,
        name: 'Spa thư giãn',
        code: 'EMBEDDING_PERMANENT',
        message: 'model rejected input',
      },
    ]);
    expect(await store.count()).toBe(2);
  });

  it('stops starting new items after abort', async () => {
    const controller = new AbortController();
    class AbortingEmbedding extends HashingEmbedding {
      async embedText(texts: string[]): Promise<Embedding[]> {
        controller.abort();
        return super.embedText(texts);
      }
    }
    const { indexer, store } = setup(new AbortingEmbedding({ dimension: 16 }));
    const report = await indexer.indexBatch([guta, spa, buffet], { concurrency: 1, signal: controller.signal, now: NOW });

    expect(report).toEqual({ indexed: 1, failed: [], skipped: 2 });
    expect(await store.count()).toBe(1);
  });

  it('skips everything when already aborted', async () => {
    const { indexer } = setup();
    const report = await indexer.indexBatch([guta, spa], { signal: AbortSignal.abort() });
    expect(report).toEqual({ indexed: 0, failed: [], skipped: 2 });
  });
});
