/**
 * Redis status store (ioredis).
 *
 * Each record lives under `<keyPrefix><taskId>` as a JSON string.
 */

import Redis from 'ioredis';
import { ConnectionError, StatusStoreError } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import { redactUrl } from '~/lib/utils/redact-url';
import type { StoredTask } from '~/lib/task-queue/types';
import type { StatusStore } from './types';

const log = getLogger({ module: 'RedisStatusStore' });

/**
 * The subset of the ioredis client this store uses
 */
export interface RedisClientLike {
  connect(): Promise<void>;
  quit(): Promise<unknown>;
  ping(): Promise<string>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

export interface RedisStatusStoreOptions {
  url: string;
  keyPrefix?: string;
  /** Injected client (tests); defaults to an ioredis client for `url`. */
  client?: RedisClientLike;
}

export class RedisStatusStore implements StatusStore {
  readonly driver = 'redis' as const;
  private readonly client: RedisClientLike;
  private readonly keyPrefix: string;
  private connected = false;

  constructor(private readonly options: RedisStatusStoreOptions) {
    this.keyPrefix = options.keyPrefix ?? '';
    this.client = options.client ?? new Redis(options.url, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
    });
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    try {
      await this.client.connect();
      await this.client.ping();
      this.connected = true;
      log.info({ url: redactUrl(this.options.url) }, 'connected to redis');
    } catch (error) {
      log.error({ err: error }, 'failed to connect to redis');
      throw new ConnectionError('Could not connect to Redis.', { cause: error });
    }
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    await this.client.quit();
    log.info({}, 'redis connection closed');
  }

  async ping(): Promise<boolean> {
    if (!this.connected) return false;
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      log.warn({ err: error }, 'redis ping failed');
      return false;
    }
  }

  async set(taskId: string, record: StoredTask): Promise<void> {
    this.requireConnection();
    try {
      await this.client.set(this.key(taskId), JSON.stringify(record));
      log.debug({ taskId, status: record.status }, 'task saved');
    } catch (error) {
      log.error({ err: error, taskId }, 'failed to save task');
      throw new StatusStoreError(`Error saving task ${taskId} to Redis.`, { cause: error });
    }
  }

  async get(taskId: string): Promise<unknown | null> {
    this.requireConnection();
    let raw: string | null;
    try {
      raw = await this.client.get(this.key(taskId));
    } catch (error) {
      log.error({ err: error, taskId }, 'failed to read task');
      throw new StatusStoreError(`Error retrieving task ${taskId} from Redis.`, { cause: error });
    }

    if (raw === null) {
      log.debug({ taskId }, 'task not found');
      return null;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      throw new StatusStoreError(`Stored value for task ${taskId} is not valid JSON.`, { cause: error });
    }
  }

  async delete(taskId: string): Promise<boolean> {
    this.requireConnection();
    try {
      const removed = await this.client.del(this.key(taskId));
      if (removed === 0) {
        log.warn({ taskId }, 'task not found during deletion');
      }
      return removed > 0;
    } catch (error) {
      log.error({ err: error, taskId }, 'failed to delete task');
      throw new StatusStoreError(`Error deleting task ${taskId} from Redis.`, { cause: error });
    }
  }

  private key(taskId: string): string {
    return `${this.keyPrefix}${taskId}`;
  }

  private requireConnection(): void {
    if (!this.connected) {
      throw new ConnectionError('Redis status store is not connected.');
    }
  }
}
