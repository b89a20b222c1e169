import { describe, expect, it } from 'vitest';
import { ConnectionError, StatusStoreError } from '~/lib/errors';
import type { StoredTask } from '~/lib/task-queue/types';
import { RedisStatusStore, type RedisClientLike } from './redis';

class FakeRedis implements RedisClientLike {
  readonly data = new Map<string, string>();
  failing = false;

  async connect(): Promise<void> {}
  async quit(): Promise<string> {
    return 'OK';
  }
  async ping(): Promise<string> {
    if (this.failing) throw new Error('connection lost');
    return 'PONG';
  }
  async get(key: string): Promise<string | null> {
    if (this.failing) throw new Error('connection lost');
    return this.data.get(key) ?? null;
  }
  async set(key: string, value: string): Promise<string> {
    if (this.failing) throw new Error('connection lost');
    this.data.set(key, value);
    return 'OK';
  }
  async del(key: string): Promise<number> {
    return this.data.delete(key) ? 1 : 0;
  }
}

const record: StoredTask = {
  status: 'completed',
  keyword: 'shoes',
  region: 'BE',
  result: { items: [], total: 0 },
  error: null,
  created_at: 1000,
  updated_at: 2000,
};

async function connectedStore(client: FakeRedis, keyPrefix?: string): Promise<RedisStatusStore> {
  const store = new RedisStatusStore({ url: 'redis://localhost:6379/0', keyPrefix, client });
  await store.connect();
  return store;
}

describe('RedisStatusStore', () => {
  it('stores JSON under the prefixed key', async () => {
    const client = new FakeRedis();
    const store = await connectedStore(client, 'crawl:');

    await store.set('task-1', record);

    expect(client.data.get('crawl:task-1')).toBe(JSON.stringify(record));
    expect(await store.get('task-1')).toEqual(record);
  });

  it('returns null for an absent key and false when deleting it', async () => {
    const store = await connectedStore(new FakeRedis());
    expect(await store.get('missing')).toBeNull();
    expect(await store.delete('missing')).toBe(false);
  });

  it('wraps transport failures in StatusStoreError', async () => {
    const client = new FakeRedis();
    const store = await connectedStore(client);
    client.failing = true;

    await expect(store.set('task-1', record)).rejects.toBeInstanceOf(StatusStoreError);
    await expect(store.get('task-1')).rejects.toBeInstanceOf(StatusStoreError);
    expect(await store.ping()).toBe(false);
  });

  it('refuses operations before connect', async () => {
    const store = new RedisStatusStore({ url: 'redis://localhost:6379/0', client: new FakeRedis() });
    await expect(store.get('task-1')).rejects.toBeInstanceOf(ConnectionError);
  });

  it('raises ConnectionError when the server is unreachable', async () => {
    const client = new FakeRedis();
    client.failing = true;
    const store = new RedisStatusStore({ url: 'redis://localhost:6379/0', client });
    await expect(store.connect()).rejects.toBeInstanceOf(ConnectionError);
  });
});
