import { describe, expect, it } from 'vitest';
import type { VoucherDocument } from '@/types/core';
import { StoreQueryError, StoreWriteError } from '@/utils/errors';
import { InMemoryVoucherStore } from './in-memory-voucher-store';
import { RedisVoucherStore, type RedisDocumentClient, type RedisTransaction } from './redis-voucher-store';

type Command = 'set' | 'sadd' | 'del' | 'srem';

/** Queues commands and applies all of them on exec, or none when the block is refused. */
class FakeTransaction implements RedisTransaction {
  private readonly queued: Array<{ command: Command; apply: () => unknown }> = [];

  constructor(private readonly redis: FakeRedis) {}

  set(key: string, value: string): RedisTransaction {
    return this.queue('set', () => {
      this.redis.strings.set(key, value);
      return 'OK';
    });
  }

  sadd(key: string, member: string): RedisTransaction {
    return this.queue('sadd', () => {
      const set = this.redis.sets.get(key) ?? new Set<string>();
      this.redis.sets.set(key, set);
      const added = set.has(member) ? 0 : 1;
      set.add(member);
      return added;
    });
  }

  del(key: string): RedisTransaction {
    return this.queue('del', () => (this.redis.strings.delete(key) ? 1 : 0));
  }

  srem(key: string, member: string): RedisTransaction {
    return this.queue('srem', () => (this.redis.sets.get(key)?.delete(member) ? 1 : 0));
  }

  async exec(): Promise<Array<[error: Error | null, result: unknown]> | null> {
    this.redis.execCount++;
    if (this.queued.some((q) => q.command === this.redis.refuse)) {
      throw new Error(`EXECABORT ${this.redis.refuse} refused`);
    }
    if (this.redis.abortNext) return null;
    return this.queued.map((q): [Error | null, unknown] => [null, q.apply()]);
  }

  private queue(command: Command, apply: () => unknown): RedisTransaction {
    this.queued.push({ command, apply });
    return this;
  }
}

/** In-process stand-in for the ioredis commands the store uses. */
class FakeRedis implements RedisDocumentClient {
  readonly strings = new Map<string, string>();
  readonly sets = new Map<string, Set<string>>();
  /** MULTI blocks containing this command fail as a whole. */
  refuse: Command | null = null;
  abortNext = false;
  failReads = false;
  execCount = 0;

  async get(key: string): Promise<string | null> {
    if (this.failReads) throw new Error('ECONNREFUSED');
    return this.strings.get(key) ?? null;
  }

  async mget(keys: string[]): Promise<Array<string | null>> {
    if (this.failReads) throw new Error('ECONNREFUSED');
    return keys.map((k) => this.strings.get(k) ?? null);
  }

  async smembers(key: string): Promise<string[]> {
    if (this.failReads) throw new Error('ECONNREFUSED');
    return Array.from(this.sets.get(key) ?? []);
  }

  async scard(key: string): Promise<number> {
    return this.sets.get(key)?.size ?? 0;
  }

  multi(): RedisTransaction {
    return new FakeTransaction(this);
  }
}

function doc(id: string, location: string, serviceType: VoucherDocument['facets']['serviceType'] = 'Restaurant'): VoucherDocument {
  return {
    id,
    name: `Voucher ${id}`,
    merchant: 'M',
    price: 50_000,
    rawText: `Voucher ${id}`,
    facets: { location, serviceType, targetAudience: 'General', keywords: [], priceBracket: 'Budget', kidsFriendly: false },
    embeddings: { content: [1, 0], location: [0, 1], service: [1, 0], target: [0, 1], combined: [0.6, 0.8] },
    createdAt: '2024-05-01T00:00:00.000Z',
  };
}

describe('InMemoryVoucherStore', () => {
  it('keeps insertion order and position on replace', async () => {
    const store = new InMemoryVoucherStore();
    await store.upsert(doc('b', 'Hà Nội'));
    await store.upsert(doc('a', 'Huế'));
    await store.upsert({ ...doc('b', 'Hải Phòng'), name: 'replaced' });

    expect((await store.find()).map((d) => d.id)).toEqual(['b', 'a']);
    expect((await store.get('b'))?.name).toBe('replaced');
    expect(await store.count()).toBe(2);
  });

  it('filters on scalar facets', async () => {
    const store = new InMemoryVoucherStore();
    await store.upsert(doc('a', 'Huế'));
    await store.upsert(doc('b', 'Huế', 'Beauty'));
    await store.upsert(doc('c', 'Hà Nội', 'Beauty'));
    expect((await store.find({ location: 'Huế', serviceType: 'Beauty' })).map((d) => d.id)).toEqual(['b']);
    expect(await store.find({ priceBracket: 'Luxury' })).toEqual([]);
  });

  it('hands out copies', async () => {
    const store = new InMemoryVoucherStore();
    await store.upsert(doc('a', 'Huế'));
    const copy = await store.get('a');
    copy?.facets.keywords.push('mutated');
    expect((await store.get('a'))?.facets.keywords).toEqual([]);
  });

  it('deletes by id', async () => {
    const store = new InMemoryVoucherStore();
    await store.upsert(doc('a', 'Huế'));
    expect(await store.delete('a')).toBe(true);
    expect(await store.delete('a')).toBe(false);
    expect(await store.get('a')).toBeNull();
  });
});

describe('RedisVoucherStore', () => {
  it('writes one JSON document per id under the prefix', async () => {
    const redis = new FakeRedis();
    const store = new RedisVoucherStore(redis, 'test:');
    await store.upsert(doc('a', 'Huế'));

    expect(redis.strings.has('test:doc:a')).toBe(true);
    expect(redis.sets.get('test:ids')).toEqual(new Set(['a']));
    expect(await store.get('a')).toEqual(doc('a', 'Huế'));
    expect(await store.get('missing')).toBeNull();
  });

  it('lists in ascending id order and filters', async () => {
    const store = new RedisVoucherStore(new FakeRedis(), 'test:');
    await store.upsert(doc('c', 'Huế'));
    await store.upsert(doc('a', 'Hà Nội'));
    await store.upsert(doc('b', 'Huế'));

    expect((await store.find()).map((d) => d.id)).toEqual(['a', 'b', 'c']);
    expect((await store.find({ location: 'Huế' })).map((d) => d.id)).toEqual(['b', 'c']);
    expect(await store.count()).toBe(3);
  });

  it('replaces on upsert and removes on delete', async () => {
    const store = new RedisVoucherStore(new FakeRedis());
    await store.upsert(doc('a', 'Huế'));
    await store.upsert(doc('a', 'Hà Nội'));
    expect(await store.count()).toBe(1);
    expect((await store.get('a'))?.facets.location).toBe('Hà Nội');

    expect(await store.delete('a')).toBe(true);
    expect(await store.count()).toBe(0);
  });

  it('writes the document and its id in one transaction', async () => {
    const redis = new FakeRedis();
    await new RedisVoucherStore(redis).upsert(doc('a', 'Huế'));
    expect(redis.execCount).toBe(1);
  });

  it('leaves neither key behind when the id-set write is refused', async () => {
    const redis = new FakeRedis();
    redis.refuse = 'sadd';
    const store = new RedisVoucherStore(redis, 'test:');
    await expect(store.upsert(doc('a', 'Huế'))).rejects.toBeInstanceOf(StoreWriteError);
    expect(redis.strings.has('test:doc:a')).toBe(false);
    expect(await store.get('a')).toBeNull();
    expect(await store.count()).toBe(0);
  });

  it('keeps a document listed when its delete is refused', async () => {
    const redis = new FakeRedis();
    const store = new RedisVoucherStore(redis, 'test:');
    await store.upsert(doc('a', 'Huế'));
    redis.refuse = 'srem';
    await expect(store.delete('a')).rejects.toBeInstanceOf(StoreWriteError);
    expect((await store.find()).map((d) => d.id)).toEqual(['a']);
  });

  it('treats an aborted transaction as a failed write', async () => {
    const redis = new FakeRedis();
    redis.abortNext = true;
    const err = await new RedisVoucherStore(redis).upsert(doc('a', 'Huế')).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StoreWriteError);
    expect(err instanceof StoreWriteError && err.message).toBe('failed to write voucher a: transaction aborted');
  });

  it('maps read failures to StoreQueryError', async () => {
    const redis = new FakeRedis();
    const store = new RedisVoucherStore(redis);
    await store.upsert(doc('a', 'Huế'));
    redis.failReads = true;
    await expect(store.find()).rejects.toBeInstanceOf(StoreQueryError);
    await expect(store.get('a')).rejects.toBeInstanceOf(StoreQueryError);
  });

  it('refuses corrupt documents instead of skipping them', async () => {
    const redis = new FakeRedis();
    const store = new RedisVoucherStore(redis, 'test:');
    await store.upsert(doc('a', 'Huế'));
    redis.strings.set('test:doc:a', '{not json');
    await expect(store.find()).rejects.toThrow('voucher a is not valid JSON');

    redis.strings.set('test:doc:a', JSON.stringify({ id: 'a' }));
    await expect(store.get('a')).rejects.toBeInstanceOf(StoreQueryError);
  });
});
