// src/services/store/redis-voucher-store.ts

import { z } from 'zod';
import { logger } from '@/services/logger';
import { PRICE_BRACKETS, SERVICE_TYPES, TARGET_AUDIENCES, type VoucherDocument } from '@/types/core';
import { StoreQueryError, StoreWriteError, errorMessage } from '@/utils/errors';
import { matchesFilters, type StoreFilters, type VoucherStore } from './voucher-store';

/** Queued MULTI block; `exec` resolves to one `[error, reply]` pair per command, or null if aborted. */
export interface RedisTransaction {
  set(key: string, value: string): RedisTransaction;
  sadd(key: string, member: string): RedisTransaction;
  del(key: string): RedisTransaction;
  srem(key: string, member: string): RedisTransaction;
  exec(): Promise<Array<[error: Error | null, result: unknown]> | null>;
}

/** The slice of the ioredis client this store calls; an ioredis `Redis` instance satisfies it. */
export interface RedisDocumentClient {
  get(key: string): Promise<string | null>;
  mget(keys: string[]): Promise<Array<string | null>>;
  smembers(key: string): Promise<string[]>;
  scard(key: string): Promise<number>;
  multi(): RedisTransaction;
}

const vector = z.array(z.number());

const voucherDocumentSchema = z.object({
  id: z.string(),
  name: z.string(),
  merchant: z.string(),
  price: z.number(),
  rawText: z.string(),
  facets: z.object({
    location: z.string(),
    serviceType: z.enum(SERVICE_TYPES),
    targetAudience: z.enum(TARGET_AUDIENCES),
    keywords: z.array(z.string()),
    priceBracket: z.enum(PRICE_BRACKETS),
    kidsFriendly: z.boolean(),
  }),
  embeddings: z.object({ content: vector, location: vector, service: vector, target: vector, combined: vector }),
  createdAt: z.string(),
});

/**
 * Redis-backed store: one JSON string per document at `<prefix>doc:<id>` and the
 * id set `<prefix>ids`. Stable order is ascending id.
 */
export class RedisVoucherStore implements VoucherStore {
  constructor(
    private readonly client: RedisDocumentClient,
    private readonly keyPrefix: string = 'voucher:',
  ) {}

  private docKey(id: string): string {
    return `${this.keyPrefix}doc:${id}`;
  }

  private get idsKey(): string {
    return `${this.keyPrefix}ids`;
  }

  async upsert(doc: VoucherDocument): Promise<void> {
    try {
      await this.transact(this.client.multi().set(this.docKey(doc.id), JSON.stringify(doc)).sadd(this.idsKey, doc.id));
    } catch (err) {
      logger.error('redis:upsert_failed', { id: doc.id, error: errorMessage(err) });
      throw new StoreWriteError(`failed to write voucher ${doc.id}: ${errorMessage(err)}`, { cause: err });
    }
  }

  async get(id: string): Promise<VoucherDocument | null> {
    const raw = await this.query(`read voucher ${id}`, () => this.client.get(this.docKey(id)));
    return raw === null ? null : this.decode(id, raw);
  }

  async find(filters: StoreFilters = {}): Promise<VoucherDocument[]> {
    const ids = await this.query('list voucher ids', () => this.client.smembers(this.idsKey));
    if (ids.length === 0) return [];
    ids.sort();

    const raws = await this.query('read vouchers', () => this.client.mget(ids.map((id) => this.docKey(id))));
    const docs: VoucherDocument[] = [];
    ids.forEach((id, i) => {
      const raw = raws[i];
      // id listed but document already deleted between the two reads
      if (raw === null || raw === undefined) return;
      const doc = this.decode(id, raw);
      if (matchesFilters(doc, filters)) docs.push(doc);
    });
    return docs;
  }

  async count(): Promise<number> {
    return this.query('count vouchers', () => this.client.scard(this.idsKey));
  }

  async delete(id: string): Promise<boolean> {
    try {
      const [removed] = await this.transact(this.client.multi().del(this.docKey(id)).srem(this.idsKey, id));
      return typeof removed === 'number' && removed > 0;
    } catch (err) {
      throw new StoreWriteError(`failed to delete voucher ${id}: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** Document key and id set change together or not at all. */
  private async transact(tx: RedisTransaction): Promise<unknown[]> {
    const replies = await tx.exec();
    if (replies === null) throw new Error('transaction aborted');
    for (const [err] of replies) {
      if (err) throw err;
    }
    return replies.map(([, result]) => result);
  }

  private async query<T>(what: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      logger.error('redis:query_failed', { what, error: errorMessage(err) });
      throw new StoreQueryError(`failed to ${what}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private decode(id: string, raw: string): VoucherDocument {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new StoreQueryError(`voucher ${id} is not valid JSON`, { cause: err });
    }
    const parsed = voucherDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new StoreQueryError(`voucher ${id} has an invalid shape: ${parsed.error.errors[0]?.message ?? 'unknown'}`);
    }
    return parsed.data;
  }
}
