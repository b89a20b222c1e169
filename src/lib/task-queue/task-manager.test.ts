import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryBroker } from '~/lib/broker/memory';
import { InvalidTaskDataError, MessageError, TaskNotFoundError } from '~/lib/errors';
import { SqliteStatusStore } from '~/lib/status-store/sqlite';
import { TaskManager } from './task-manager';

const TASK_QUEUE = 'crawler.task';

describe('TaskManager', () => {
  let store: SqliteStatusStore;
  let broker: MemoryBroker;
  let manager: TaskManager;

  beforeEach(async () => {
    store = new SqliteStatusStore(':memory:');
    broker = new MemoryBroker();
    await store.connect();
    await broker.connect();
    manager = new TaskManager({ store, broker, taskQueue: TASK_QUEUE, defaultRegion: 'BE' });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await broker.close();
    await store.close();
  });

  describe('create', () => {
    it('stores a queued record and publishes exactly one task message', async () => {
      const taskId = await manager.create('  running shoes ', 'US');

      const task = await manager.getStatus(taskId);
      expect(task).toMatchObject({
        task_id: taskId,
        status: 'queued',
        keyword: 'running shoes',
        region: 'US',
        result: null,
        error: null,
      });
      expect(task.created_at).toBe(task.updated_at);
      expect(broker.drain(TASK_QUEUE)).toEqual([{ task_id: taskId, keyword: 'running shoes', region: 'US' }]);
    });

    it('falls back to the default region', async () => {
      const withoutRegion = await manager.create('shoes');
      const blankRegion = await manager.create('shoes', '  ');

      expect((await manager.getStatus(withoutRegion)).region).toBe('BE');
      expect((await manager.getStatus(blankRegion)).region).toBe('BE');
    });

    it('rejects a blank keyword without touching store or broker', async () => {
      await expect(manager.create('   ')).rejects.toBeInstanceOf(InvalidTaskDataError);
      expect(broker.readyCount(TASK_QUEUE)).toBe(0);
    });

    it('leaves the record queued when the publish fails', async () => {
      vi.spyOn(broker, 'publish').mockRejectedValueOnce(new MessageError('broker down'));
      const setSpy = vi.spyOn(store, 'set');

      await expect(manager.create('shoes')).rejects.toBeInstanceOf(MessageError);

      expect(setSpy).toHaveBeenCalledTimes(1);
      const [taskId] = setSpy.mock.calls[0];
      expect((await manager.getStatus(taskId)).status).toBe('queued');
    });

    it('keeps 100 concurrent creations apart', async () => {
      const keywords = Array.from({ length: 100 }, (_, i) => `keyword-${i}`);
      const ids = await Promise.all(keywords.map((keyword) => manager.create(keyword)));

      expect(new Set(ids).size).toBe(100);
      const records = await Promise.all(ids.map((id) => manager.getStatus(id)));
      expect(records.map((record) => record.keyword)).toEqual(keywords);
      expect(broker.readyCount(TASK_QUEUE)).toBe(100);
    });
  });

  describe('getStatus', () => {
    it('raises TaskNotFoundError for an unknown id', async () => {
      await expect(manager.getStatus('missing')).rejects.toThrow(new TaskNotFoundError('missing'));
    });

    it('raises InvalidTaskDataError for a stored record of the wrong shape', async () => {
      store.withDatabase((db) => {
        db.prepare('INSERT INTO task_status (task_id, value, updated_at) VALUES (?, ?, ?)')
          .run('broken', JSON.stringify({ status: 'done' }), 0);
      });
      await expect(manager.getStatus('broken')).rejects.toBeInstanceOf(InvalidTaskDataError);
    });
  });

  describe('updateStatus', () => {
    it('records a completed result', async () => {
      const taskId = await manager.create('shoes');

      expect(await manager.updateStatus(taskId, 'completed', { items: [], total: 0 })).toBe(true);

      const task = await manager.getStatus(taskId);
      expect(task.status).toBe('completed');
      expect(task.result).toEqual({ items: [], total: 0 });
      expect(task.error).toBeNull();
    });

    it('records a failure message', async () => {
      const taskId = await manager.create('shoes');

      expect(await manager.updateStatus(taskId, 'failed', null, 'page timed out')).toBe(true);

      const task = await manager.getStatus(taskId);
      expect(task.status).toBe('failed');
      expect(task.error).toBe('page timed out');
      expect(task.result).toBeNull();
    });

    it('is idempotent for the same terminal status', async () => {
      const taskId = await manager.create('shoes');
      await manager.updateStatus(taskId, 'completed', { total: 1 });
      const first = await manager.getStatus(taskId);

      expect(await manager.updateStatus(taskId, 'completed', { total: 1 })).toBe(false);
      expect(await manager.getStatus(taskId)).toEqual(first);
    });

    it('ignores a different terminal status once terminal', async () => {
      const taskId = await manager.create('shoes');
      await manager.updateStatus(taskId, 'completed', { total: 1 });

      expect(await manager.updateStatus(taskId, 'failed', null, 'late failure')).toBe(false);

      const task = await manager.getStatus(taskId);
      expect(task.status).toBe('completed');
      expect(task.result).toEqual({ total: 1 });
    });

    it('rejects a primitive result', async () => {
      const taskId = await manager.create('shoes');
      await expect(manager.updateStatus(taskId, 'completed', 'ok')).rejects.toBeInstanceOf(InvalidTaskDataError);
      expect((await manager.getStatus(taskId)).status).toBe('queued');
    });

    it('rejects an unknown status', async () => {
      const taskId = await manager.create('shoes');
      await expect(manager.updateStatus(taskId, 'paused')).rejects.toBeInstanceOf(InvalidTaskDataError);
    });

    it('rejects a result on a failed task', async () => {
      const taskId = await manager.create('shoes');
      await expect(manager.updateStatus(taskId, 'failed', { items: [] }, 'boom'))
        .rejects.toBeInstanceOf(InvalidTaskDataError);
    });

    it('raises TaskNotFoundError for an unknown id', async () => {
      await expect(manager.updateStatus('missing', 'completed', {})).rejects.toBeInstanceOf(TaskNotFoundError);
    });
  });

  describe('claim', () => {
    it('moves a queued task to in_progress once', async () => {
      const taskId = await manager.create('shoes');

      expect(await manager.claim(taskId)).toBe(true);
      expect(await manager.claim(taskId)).toBe(false);
      expect((await manager.getStatus(taskId)).status).toBe('in_progress');
    });

    it('returns false for an unknown task', async () => {
      expect(await manager.claim('missing')).toBe(false);
    });

    it('does not reopen a terminal task', async () => {
      const taskId = await manager.create('shoes');
      await manager.updateStatus(taskId, 'failed', null, 'boom');

      expect(await manager.claim(taskId)).toBe(false);
      expect((await manager.getStatus(taskId)).status).toBe('failed');
    });
  });

  describe('delete', () => {
    it('removes the record', async () => {
      const taskId = await manager.create('shoes');

      expect(await manager.delete(taskId)).toBe(true);
      await expect(manager.getStatus(taskId)).rejects.toBeInstanceOf(TaskNotFoundError);
      expect(await manager.delete(taskId)).toBe(false);
    });
  });
});
