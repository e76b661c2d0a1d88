// src/services/indexing/multi-field-indexer.ts
// One embedding per facet plus a weighted combined vector, persisted as a whole document keyed by voucher id.

import type BaseEmbedding from '@/models/base/embedding';
import type { FacetExtractor } from '@/services/facets/facet-extractor';
import type { Gazetteer } from '@/services/geo/gazetteer';
import { logger } from '@/services/logger';
import { l2Norm, l2Normalize, weightedSum } from '@/services/retrieval/retrieval-vector-utils';
import type { VoucherStore } from '@/services/store/voucher-store';
import type { CleanVoucher, EmbeddedFacet, Embedding, FacetEmbeddings, Facets, VoucherDocument, VoucherSourceRecord } from '@/types/core';
import { pLimit } from '@/utils/concurrency';
import { EmbeddingProviderError, StoreWriteError, VoucherServiceError, errorMessage } from '@/utils/errors';
import { cleanVoucher } from './voucher-cleaner';

/** Weights of the facet vectors in the combined vector; the keyword share rides on `service`. */
export const COMBINED_WEIGHTS: Record<EmbeddedFacet, number> = {
  content: 0.4,
  location: 0.3,
  service: 0.2,
  target: 0.1,
};

const EMBEDDED_FACETS: readonly EmbeddedFacet[] = ['content', 'location', 'service', 'target'];

export type IndexOutcome =
  | { status: 'indexed'; document: VoucherDocument }
  | { status: 'failed'; id: string; name: string; error: VoucherServiceError };

export interface BatchFailure {
  id: string;
  name: string;
  code: string;
  message: string;
}

export interface BatchReport {
  indexed: number;
  failed: BatchFailure[];
  skipped: number;
}

export interface IndexBatchOptions {
  concurrency?: number;
  signal?: AbortSignal;
  now?: Date;
}

/** Synthetic per-facet prompts; changing them changes retrieval outcomes. */
export function facetPrompts(rawText: string, facets: Facets, region: string | null): Record<EmbeddedFacet, string> {
  return {
    content: rawText,
    location: `Địa điểm: ${facets.location}. Khu vực: ${region ?? facets.location}.`,
    service: `Dịch vụ: ${facets.serviceType}. Keywords: ${facets.keywords.join(', ')}.`,
    target: `Đối tượng: ${facets.targetAudience}. Phù hợp cho: ${facets.targetAudience}.`,
  };
}

export class MultiFieldIndexer {
  constructor(
    private readonly embedder: BaseEmbedding,
    private readonly store: VoucherStore,
    private readonly extractor: FacetExtractor,
    private readonly gazetteer: Gazetteer,
    private readonly defaultConcurrency = 4,
  ) {}

  /** Extracts facets (unless given), embeds, upserts. Failures come back as an outcome, never thrown. */
  async indexVoucher(voucher: CleanVoucher, facets?: Facets): Promise<IndexOutcome> {
    try {
      const document = await this.buildDocument(voucher, facets);
      await this.write(document);
      return { status: 'indexed', document };
    } catch (err) {
      const error = asServiceError(err);
      logger.warn('voucher indexing failed', { id: voucher.id, name: voucher.name, code: error.code, error: error.message });
      return { status: 'failed', id: voucher.id, name: voucher.name, error };
    }
  }

  async indexBatch(records: VoucherSourceRecord[], options: IndexBatchOptions = {}): Promise<BatchReport> {
    const { signal, now = new Date() } = options;
    const limit = pLimit(options.concurrency ?? this.defaultConcurrency);
    const report: BatchReport = { indexed: 0, failed: [], skipped: 0 };
    const startedAt = Date.now();

    await Promise.all(
      records.map((record) =>
        limit(async () => {
          if (signal?.aborted) {
            report.skipped++;
            return;
          }
          const outcome = await this.indexVoucher(cleanVoucher(record, now));
          if (outcome.status === 'indexed') {
            report.indexed++;
          } else {
            report.failed.push({ id: outcome.id, name: outcome.name, code: outcome.error.code, message: outcome.error.message });
          }
        }),
      ),
    );

    logger.info('voucher batch indexed', {
      total: records.length,
      indexed: report.indexed,
      failed: report.failed.length,
      skipped: report.skipped,
      durationMs: Date.now() - startedAt,
    });
    return report;
  }

  async buildDocument(voucher: CleanVoucher, facets?: Facets): Promise<VoucherDocument> {
    const resolvedFacets =
      facets ?? this.extractor.extract(voucher.rawText, voucher.name, { location: voucher.locationHint, price: voucher.price });
    const region = this.gazetteer.getByName(resolvedFacets.location)?.region ?? null;
    const prompts = facetPrompts(voucher.rawText, resolvedFacets, region);

    const vectors = await this.embedder.embedText(EMBEDDED_FACETS.map((f) => prompts[f]));
    const byFacet = new Map<EmbeddedFacet, Embedding>();
    EMBEDDED_FACETS.forEach((facet, i) => {
      byFacet.set(facet, l2Normalize(this.checkVector(vectors[i], facet)));
    });

    const pick = (facet: EmbeddedFacet): Embedding => byFacet.get(facet) ?? [];
    const combined = l2Normalize(
      weightedSum(
        EMBEDDED_FACETS.map((f) => ({ vector: pick(f), weight: COMBINED_WEIGHTS[f] })),
        this.embedder.dimension,
      ),
    );
    const embeddings: FacetEmbeddings = {
      content: pick('content'),
      location: pick('location'),
      service: pick('service'),
      target: pick('target'),
      combined: this.checkVector(combined, 'combined'),
    };

    return {
      id: voucher.id,
      name: voucher.name,
      merchant: voucher.merchant,
      price: voucher.price,
      rawText: voucher.rawText,
      facets: resolvedFacets,
      embeddings,
      createdAt: voucher.createdAt,
    };
  }

  private checkVector(vector: Embedding | undefined, facet: string): Embedding {
    if (!vector || vector.length !== this.embedder.dimension) {
      throw new EmbeddingProviderError(
        `${facet} embedding has length ${vector?.length ?? 0}, expected ${this.embedder.dimension}`,
        false,
      );
    }
    if (!vector.every(Number.isFinite) || l2Norm(vector) === 0) {
      throw new EmbeddingProviderError(`${facet} embedding is not a usable vector`, false);
    }
    return vector;
  }

  private async write(document: VoucherDocument): Promise<void> {
    try {
      await this.store.upsert(document);
    } catch (err) {
      if (err instanceof StoreWriteError) throw err;
      throw new StoreWriteError(`failed to write voucher ${document.id}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

function asServiceError(err: unknown): VoucherServiceError {
  if (err instanceof VoucherServiceError) return err;
  return new VoucherServiceError(errorMessage(err), 'INDEX_FAILED', false, { cause: err });
}
