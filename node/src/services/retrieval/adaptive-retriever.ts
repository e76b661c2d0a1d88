// Adaptive multi-facet retriever: query-dependent facet weights over dense scores, BM25 over name/content,
// then a geographic multiplier, filters and a stable top-K cut.
import type { Embedder } from '@/services/retrieval/retrieval-vector-utils';
import { buildBm25Stats, bm25Score, cosineSimilarity, tokenize } from '@/services/retrieval/retrieval-vector-utils';
import type { Gazetteer } from '@/services/geo/gazetteer';
import type { GeoContext, GeographyResolver } from '@/services/geo/geography-resolver';
import type { QueryParser } from '@/services/query-understanding';
import { describeQuery } from '@/services/query-understanding';
import type { VoucherStore } from '@/services/store/voucher-store';
import { logger } from '@/services/logger';
import type {
  Embedding,
  FacetScores,
  FacetWeights,
  QueryComponents,
  SearchFilters,
  SearchResult,
  VoucherDocument,
} from '@/types/core';
import { SCORED_FACETS } from '@/types/core';
import { EmbeddingProviderError, RetrievalError, errorMessage } from '@/utils/errors';
import { compilePhrase, foldedText, hasMatch } from '@/utils/text';
import { dynamicWeights, queryEmbeddingText, type RetrievalFocus } from './dynamic-weights';
import { explainGeoRanking, geoBoost } from './geo-rerank';

export interface AdaptiveRetrieverOptions {
  semanticBoost?: number;
  lexicalBoost?: number;
  /** Added to the lexical score when the whole voucher name appears in the query. */
  nameMatchBonus?: number;
  nameFieldWeight?: number;
  excerptLength?: number;
}

export interface SearchOptions {
  topK?: number;
  filters?: SearchFilters;
  /** Keep only documents at the query's place or one of its nearby places. */
  strictLocation?: boolean;
  /** Rank lexically instead of failing when the embedding provider is down. */
  allowLexicalFallback?: boolean;
  signal?: AbortSignal;
}

export interface GeoSummary {
  place: string | null;
  region: string | null;
  nearby: Array<{ name: string; distanceKm: number; relevance: number }>;
}

export interface DetailedSearch {
  results: SearchResult[];
  components: QueryComponents;
  weights: FacetWeights;
  focus: RetrievalFocus;
  /** True when the ranking is lexical-only because no usable query embedding was available. */
  degraded: boolean;
  geo: GeoSummary | null;
  /** How geography shaped the top results; null when the query names no place. */
  geoExplanation: string | null;
}

export interface QueryExplanation {
  components: QueryComponents;
  focus: RetrievalFocus;
  weights: FacetWeights;
  hintText: string;
  geo: GeoSummary | null;
  description: string;
}

export const DEFAULT_TOP_K = 5;

interface Candidate {
  doc: VoucherDocument;
  order: number;
  nameTokens: string[];
  contentTokens: string[];
}

export class AdaptiveRetriever {
  private readonly options: Required<AdaptiveRetrieverOptions>;

  constructor(
    private readonly embedder: Embedder,
    private readonly store: VoucherStore,
    private readonly parser: QueryParser,
    private readonly resolver: GeographyResolver,
    options: AdaptiveRetrieverOptions = {},
  ) {
    this.options = {
      semanticBoost: 3.0,
      lexicalBoost: 2.0,
      nameMatchBonus: 2.0,
      nameFieldWeight: 3,
      excerptLength: 240,
      ...options,
    };
  }

  private get gazetteer(): Gazetteer {
    return this.resolver.gazetteer;
  }

  async search(query: string, topK = DEFAULT_TOP_K, filters?: SearchFilters): Promise<SearchResult[]> {
    const { results } = await this.searchDetailed(query, { topK, filters });
    return results;
  }

  async searchDetailed(query: string, options: SearchOptions = {}): Promise<DetailedSearch> {
    const { topK = DEFAULT_TOP_K, filters = {}, strictLocation = false, allowLexicalFallback = false, signal } = options;
    const startedAt = Date.now();

    const components = this.parser.parse(query);
    const { focus, weights } = dynamicWeights(components);
    const geoContext = this.geoContextFor(components);

    signal?.throwIfAborted();
    let { vector: queryVector, degraded } = await this.embedQuery(queryEmbeddingText(query, focus), allowLexicalFallback);

    signal?.throwIfAborted();
    let docs: VoucherDocument[];
    try {
      docs = await this.store.find(this.resolveFilters(filters));
    } catch (err) {
      throw new RetrievalError(`document store query failed: ${errorMessage(err)}`, { cause: err });
    }
    if (strictLocation && geoContext) {
      const allowed = new Set([geoContext.primary.name, ...geoContext.nearby.map((n) => n.place.name)]);
      docs = docs.filter((d) => allowed.has(d.facets.location));
    }

    const stale = queryVector ? this.findDimensionMismatch(docs, queryVector.length) : null;
    if (stale) {
      const message = `voucher ${stale.id} was indexed with ${stale.length}-dimension embeddings, query embeddings have ${this.embedder.dimension}`;
      if (!allowLexicalFallback) throw new RetrievalError(message);
      logger.warn('index dimension mismatch, ranking lexically', { id: stale.id, indexed: stale.length });
      queryVector = null;
      degraded = true;
    }

    const results = this.rank(query, docs, queryVector, weights, geoContext, components.region).slice(0, Math.max(0, topK));

    logger.info('voucher search', {
      query,
      focus,
      candidates: docs.length,
      returned: results.length,
      degraded,
      durationMs: Date.now() - startedAt,
    });
    return {
      results,
      components,
      weights,
      focus,
      degraded,
      geo: this.summarizeGeo(geoContext, components.region),
      geoExplanation: geoContext ? explainGeoRanking(results, geoContext.primary.name, this.resolver) : null,
    };
  }

  /** Parse, focus, weights and geography for a query; touches neither the store nor the embedder. */
  explain(query: string): QueryExplanation {
    const components = this.parser.parse(query);
    const { focus, weights } = dynamicWeights(components);
    const geoContext = this.geoContextFor(components);
    return {
      components,
      focus,
      weights,
      hintText: queryEmbeddingText(query, focus),
      geo: this.summarizeGeo(geoContext, components.region),
      description: describeQuery(components, geoContext?.primary.name ?? null),
    };
  }

  private geoContextFor(components: QueryComponents): GeoContext | null {
    if (!components.location) return null;
    const place = this.gazetteer.getByKey(components.location);
    return place ? this.resolver.contextFor(place) : null;
  }

  private resolveFilters(filters: SearchFilters): SearchFilters {
    if (filters.location === undefined) return filters;
    const place = this.gazetteer.normalizePlace(filters.location);
    return { ...filters, location: place?.name ?? filters.location };
  }

  /** A blank query embeds to the zero vector, so every semantic score is 0. */
  private async embedQuery(text: string, allowLexicalFallback: boolean): Promise<{ vector: Embedding | null; degraded: boolean }> {
    if (!text) return { vector: new Array<number>(this.embedder.dimension).fill(0), degraded: false };
    try {
      const vector = await this.embedder.embed(text);
      if (vector.length !== this.embedder.dimension || !vector.every(Number.isFinite)) {
        throw new EmbeddingProviderError(
          `query embedding is unusable: length ${vector.length}, expected ${this.embedder.dimension} finite values`,
          false,
        );
      }
      return { vector, degraded: false };
    } catch (err) {
      if (!allowLexicalFallback) {
        throw new RetrievalError(`query embedding failed: ${errorMessage(err)}`, { cause: err });
      }
      logger.warn('embedding provider unavailable, ranking lexically', { error: errorMessage(err) });
      return { vector: null, degraded: true };
    }
  }

  /** First document whose stored vectors cannot be compared with a query vector of `dimension`. */
  private findDimensionMismatch(docs: VoucherDocument[], dimension: number): { id: string; length: number } | null {
    for (const doc of docs) {
      const bad = SCORED_FACETS.find((f) => doc.embeddings[f].length !== dimension);
      if (bad) return { id: doc.id, length: doc.embeddings[bad].length };
    }
    return null;
  }

  private rank(
    query: string,
    docs: VoucherDocument[],
    queryVector: Embedding | null,
    weights: FacetWeights,
    geoContext: GeoContext | null,
    queryRegion: string | null,
  ): SearchResult[] {
    const candidates: Candidate[] = docs.map((doc, order) => ({
      doc,
      order,
      nameTokens: tokenize(doc.name),
      contentTokens: tokenize(doc.rawText),
    }));
    const nameStats = buildBm25Stats(candidates.map((c) => c.nameTokens));
    const contentStats = buildBm25Stats(candidates.map((c) => c.contentTokens));
    const queryTokens = tokenize(query);
    const foldedQuery = foldedText(query);
    const { semanticBoost, lexicalBoost, nameMatchBonus, nameFieldWeight } = this.options;

    const scored = candidates.map((c) => {
      const facetScores = this.facetScores(queryVector, c.doc);
      const semanticScore = SCORED_FACETS.reduce((sum, f) => sum + weights[f] * facetScores[f], 0);

      const foldedName = foldedText(c.doc.name);
      const nameInQuery = foldedName.length > 0 && hasMatch(compilePhrase(foldedName), foldedQuery);
      const lexicalScore =
        nameFieldWeight * bm25Score(queryTokens, c.nameTokens, nameStats) +
        bm25Score(queryTokens, c.contentTokens, contentStats) +
        (nameInQuery ? nameMatchBonus : 0);

      const geo = geoBoost(c.doc.facets, this.gazetteer, geoContext, queryRegion);
      const score = (semanticBoost * Math.max(0, semanticScore) + lexicalBoost * lexicalScore) * geo.multiplier;

      const result: SearchResult = {
        id: c.doc.id,
        name: c.doc.name,
        merchant: c.doc.merchant,
        excerpt: this.excerpt(c.doc.rawText),
        score,
        semanticScore,
        lexicalScore,
        geoMultiplier: geo.multiplier,
        facetScores,
        facets: c.doc.facets,
        matchedPlace: geo.matchedPlace,
        geoMatch: geo.match,
      };
      return { result, order: c.order };
    });

    scored.sort((a, b) => b.result.score - a.result.score || a.order - b.order);
    return scored.map((s) => s.result);
  }

  private facetScores(queryVector: Embedding | null, doc: VoucherDocument): FacetScores {
    const score = (v: Embedding) => (queryVector ? cosineSimilarity(queryVector, v) : 0);
    return {
      content: score(doc.embeddings.content),
      location: score(doc.embeddings.location),
      service: score(doc.embeddings.service),
      target: score(doc.embeddings.target),
      combined: score(doc.embeddings.combined),
    };
  }

  private excerpt(rawText: string): string {
    const chars = Array.from(rawText);
    if (chars.length <= this.options.excerptLength) return rawText;
    return `${chars.slice(0, this.options.excerptLength).join('').trimEnd()}…`;
  }

  private summarizeGeo(context: GeoContext | null, region: string | null): GeoSummary | null {
    if (context) {
      return {
        place: context.primary.name,
        region: context.primary.region,
        nearby: context.nearby.map((n) => ({ name: n.place.name, distanceKm: n.distanceKm, relevance: n.relevance })),
      };
    }
    return region ? { place: null, region, nearby: [] } : null;
  }
}
