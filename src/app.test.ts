import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { createApp } from '~/app';
import { MemoryBroker } from '~/lib/broker/memory';
import { MessageError } from '~/lib/errors';
import { SqliteStatusStore } from '~/lib/status-store/sqlite';
import { TaskManager } from '~/lib/task-queue/task-manager';

const TASK_QUEUE = 'crawler.task';

describe('HTTP API', () => {
  let store: SqliteStatusStore;
  let broker: MemoryBroker;
  let taskManager: TaskManager;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    store = new SqliteStatusStore(':memory:');
    broker = new MemoryBroker();
    await store.connect();
    await broker.connect();
    taskManager = new TaskManager({ store, broker, taskQueue: TASK_QUEUE, defaultRegion: 'BE' });

    const app = createApp({ taskManager, store, broker });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    await broker.close();
    await store.close();
  });

  function postCrawl(body: string): Promise<Response> {
    return fetch(`${baseUrl}/crawl`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  describe('POST /crawl', () => {
    it('accepts a submission and returns the task id', async () => {
      const response = await postCrawl(JSON.stringify({ keyword: 'shoes', region: 'US' }));

      expect(response.status).toBe(202);
      const { task_id } = z.object({ task_id: z.string() }).strict().parse(await response.json());
      expect(broker.drain(TASK_QUEUE)).toEqual([{ task_id, keyword: 'shoes', region: 'US' }]);
    });

    it('rejects a missing keyword with the unified error body', async () => {
      const response = await postCrawl(JSON.stringify({ region: 'US' }));

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        error: {
          type: 'InvalidTaskDataError',
          message: 'keyword: keyword is required',
          context: { path: '/crawl', method: 'POST' },
        },
      });
    });

    it('rejects a blank keyword', async () => {
      const response = await postCrawl(JSON.stringify({ keyword: '   ' }));
      expect(response.status).toBe(400);
    });

    it('rejects a body that is not JSON', async () => {
      const response = await postCrawl('{"keyword":');

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: { type: 'InvalidTaskDataError' } });
    });

    it('returns 500 when the task message cannot be published', async () => {
      vi.spyOn(broker, 'publish').mockRejectedValueOnce(new MessageError('broker down'));

      const response = await postCrawl(JSON.stringify({ keyword: 'shoes' }));

      expect(response.status).toBe(500);
      expect(await response.json()).toMatchObject({ error: { type: 'MessageError' } });
    });

    it('returns 503 when the store is unavailable', async () => {
      await store.close();

      const response = await postCrawl(JSON.stringify({ keyword: 'shoes' }));

      expect(response.status).toBe(503);
      expect(await response.json()).toMatchObject({ error: { type: 'ConnectionError' } });
    });
  });

  describe('GET /result/:taskId', () => {
    it('returns the task record', async () => {
      const taskId = await taskManager.create('shoes');

      const response = await fetch(`${baseUrl}/result/${taskId}`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ task_id: taskId, status: 'queued', keyword: 'shoes', region: 'BE' });
    });

    it('returns 404 for an unknown task', async () => {
      const response = await fetch(`${baseUrl}/result/missing`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({
        error: {
          type: 'TaskNotFoundError',
          message: 'Task missing does not exist.',
          context: { path: '/result/missing', method: 'GET' },
        },
      });
    });

    it('returns 500 for a stored record that fails validation', async () => {
      store.withDatabase((db) => {
        db.prepare('INSERT INTO task_status (task_id, value, updated_at) VALUES (?, ?, ?)')
          .run('broken', JSON.stringify({ status: 'queued' }), 0);
      });

      const response = await fetch(`${baseUrl}/result/broken`);

      expect(response.status).toBe(500);
      expect(await response.json()).toMatchObject({ error: { type: 'InvalidTaskDataError' } });
    });
  });

  describe('DELETE /result/:taskId', () => {
    it('deletes a task', async () => {
      const taskId = await taskManager.create('shoes');

      const response = await fetch(`${baseUrl}/result/${taskId}`, { method: 'DELETE' });

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ deleted: true });
      expect((await fetch(`${baseUrl}/result/${taskId}`)).status).toBe(404);
    });

    it('returns 404 for an unknown task', async () => {
      const response = await fetch(`${baseUrl}/result/missing`, { method: 'DELETE' });
      expect(response.status).toBe(404);
    });
  });

  describe('GET /health', () => {
    it('reports both dependencies up', async () => {
      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({ status: 'ok', store: 'up', broker: 'up' });
    });

    it('returns 503 when the broker is disconnected', async () => {
      await broker.close();

      const response = await fetch(`${baseUrl}/health`);

      expect(response.status).toBe(503);
      expect(await response.json()).toEqual({ status: 'unavailable', store: 'up', broker: 'down' });
    });
  });
});
