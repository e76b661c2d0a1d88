// src/services/store/in-memory-voucher-store.ts
import type { VoucherDocument } from '@/types/core';
import { matchesFilters, type StoreFilters, type VoucherStore } from './voucher-store';

/**
 * Process-local store. Map insertion order is the stable order; replacing an
 * existing id keeps its original position.
 */
export class InMemoryVoucherStore implements VoucherStore {
  private readonly docs = new Map<string, VoucherDocument>();

  async upsert(doc: VoucherDocument): Promise<void> {
    this.docs.set(doc.id, structuredClone(doc));
  }

  async get(id: string): Promise<VoucherDocument | null> {
    const doc = this.docs.get(id);
    return doc ? structuredClone(doc) : null;
  }

  async find(filters: StoreFilters = {}): Promise<VoucherDocument[]> {
    return Array.from(this.docs.values())
      .filter((doc) => matchesFilters(doc, filters))
      .map((doc) => structuredClone(doc));
  }

  async count(): Promise<number> {
    return this.docs.size;
  }

  async delete(id: string): Promise<boolean> {
    return this.docs.delete(id);
  }
}
