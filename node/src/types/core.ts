// src/types/core.ts: voucher documents, facets, parsed queries and search results

export type Embedding = number[];

export const PRICE_BRACKETS = ['Budget', 'MidRange', 'Premium', 'Luxury', 'Unknown'] as const;
export type PriceBracket = (typeof PRICE_BRACKETS)[number];

export const SERVICE_TYPES = [
  'Restaurant',
  'Hotel',
  'Entertainment',
  'Shopping',
  'Beauty',
  'Travel',
  'Kids',
  'General',
] as const;
export type ServiceType = (typeof SERVICE_TYPES)[number];

export const TARGET_AUDIENCES = ['Family', 'Couple', 'Business', 'Solo', 'Group', 'General'] as const;
export type TargetAudience = (typeof TARGET_AUDIENCES)[number];

/** Canonical city name from the gazetteer, or `Unknown`. */
export type LocationLabel = string;

export interface Facets {
  location: LocationLabel;
  serviceType: ServiceType;
  targetAudience: TargetAudience;
  /** Discovery order, no duplicates. */
  keywords: string[];
  priceBracket: PriceBracket;
  kidsFriendly: boolean;
}

/** Facets embedded independently at index time. */
export type EmbeddedFacet = 'content' | 'location' | 'service' | 'target';

/** Facets that take part in query-time weighting (embedded facets plus `combined`). */
export type ScoredFacet = EmbeddedFacet | 'combined';

export const SCORED_FACETS: readonly ScoredFacet[] = ['content', 'location', 'service', 'target', 'combined'];

export type FacetEmbeddings = Record<ScoredFacet, Embedding>;
export type FacetWeights = Record<ScoredFacet, number>;

export interface VoucherDocument {
  id: string;
  name: string;
  merchant: string;
  /** Integer VND; 0 when the source had none. */
  price: number;
  rawText: string;
  facets: Facets;
  embeddings: FacetEmbeddings;
  /** ISO-8601 */
  createdAt: string;
}

/** Record as supplied by the ingestion pipeline, after boundary coercion. */
export interface VoucherSourceRecord {
  name: string;
  description: string;
  usageInstructions: string;
  termsOfUse: string;
  tags: string;
  location: string;
  price: number;
  unit: string;
  merchant: string;
}

export interface CleanVoucher {
  id: string;
  name: string;
  merchant: string;
  price: number;
  rawText: string;
  /** Location column from the source record; may be empty or unresolvable. */
  locationHint: string;
  createdAt: string;
}

export type QueryIntent =
  | 'restaurant'
  | 'hotel'
  | 'entertainment'
  | 'shopping'
  | 'beauty'
  | 'travel'
  | 'kids'
  | 'general';

export type ServiceRequirement =
  | 'kids_friendly'
  | 'romantic'
  | 'group_dining'
  | 'luxury'
  | 'budget'
  | 'outdoor'
  | 'indoor';

export type TargetSignal = 'family' | 'couple' | 'friends' | 'business' | 'solo';

export type TimeSignal = 'weekend' | 'weekday' | 'evening' | 'lunch' | 'morning' | 'holiday';

export type QueryModifier = 'urgent' | 'flexible' | 'specific' | 'recommendation';

export type LocationMatchKind = 'direct' | 'preposition';

export interface SubConfidences {
  intent: number;
  location: number;
  service: number;
  target: number;
}

export interface QueryComponents {
  originalQuery: string;
  intent: QueryIntent;
  /** Gazetteer key of the resolved place, or null. */
  location: string | null;
  locationMatch: LocationMatchKind | null;
  /** Region named explicitly in the query (e.g. `Miền Bắc`), without a place. */
  region: string | null;
  serviceRequirements: ServiceRequirement[];
  targetAudience: TargetSignal | null;
  timeRequirements: TimeSignal[];
  modifiers: QueryModifier[];
  pricePreference: PriceBracket[];
  keywords: string[];
  subConfidences: SubConfidences;
  /** Weighted average of the sub-confidences, in [0, 1]. */
  confidence: number;
}

export type GeoMatch = 'exact' | 'nearby' | 'region' | 'none';

export interface FacetScores {
  content: number;
  location: number;
  service: number;
  target: number;
  combined: number;
}

export interface SearchResult {
  id: string;
  name: string;
  merchant: string;
  excerpt: string;
  /** Post-boost score; only comparable within one result set. */
  score: number;
  semanticScore: number;
  lexicalScore: number;
  geoMultiplier: number;
  facetScores: FacetScores;
  facets: Facets;
  /** Canonical name of the query place this result was boosted for, if any. */
  matchedPlace: string | null;
  geoMatch: GeoMatch;
}

export interface SearchFilters {
  location?: string;
  serviceType?: ServiceType;
  priceBracket?: PriceBracket;
}
