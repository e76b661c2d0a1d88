// src/services/store/voucher-store.ts: document store contract shared by the in-memory and Redis backends
import type { SearchFilters, VoucherDocument } from '@/types/core';

/** Scalar filters with `location` already resolved to a canonical place name. */
export type StoreFilters = SearchFilters;

export interface VoucherStore {
  /** Whole-document replacement keyed by `doc.id`. */
  upsert(doc: VoucherDocument): Promise<void>;
  get(id: string): Promise<VoucherDocument | null>;
  /** Every matching document, in the store's stable order. */
  find(filters?: StoreFilters): Promise<VoucherDocument[]>;
  count(): Promise<number>;
  /** Returns whether a document was removed. */
  delete(id: string): Promise<boolean>;
}

export function matchesFilters(doc: VoucherDocument, filters: StoreFilters = {}): boolean {
  if (filters.location !== undefined && doc.facets.location !== filters.location) return false;
  if (filters.serviceType !== undefined && doc.facets.serviceType !== filters.serviceType) return false;
  if (filters.priceBracket !== undefined && doc.facets.priceBracket !== filters.priceBracket) return false;
  return true;
}
