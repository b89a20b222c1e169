import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryBroker } from '~/lib/broker/memory';
import type { AdRecord } from '~/lib/crawl/ad-library';
import type { ExtractionEngine } from '~/lib/crawl/engine';
import { DEFAULT_SETTINGS } from '~/lib/config/settings';
import { Notifier, type MonitoringEvent } from '~/lib/notifications/notifier';
import { SqliteStatusStore } from '~/lib/status-store/sqlite';
import { ResultProcessor } from './result-processor';
import { closeRuntime, initializeRuntime, superviseConsumer, type PipelineRuntime } from './startup';
import { TaskManager } from './task-manager';
import { TaskWorker } from './worker';

const settings = {
  ...DEFAULT_SETTINGS,
  broker: { ...DEFAULT_SETTINGS.broker, driver: 'memory' as const },
  store: { ...DEFAULT_SETTINGS.store, sqlitePath: ':memory:' },
};

class KeywordEngine implements ExtractionEngine {
  async search(keyword: string, region: string): Promise<AdRecord[]> {
    if (keyword === 'explode') {
      throw new Error('search page unavailable');
    }
    return [{ title: `${keyword} in ${region}`, start_date: '2024-01-01', end_date: '2024-01-31' }];
  }

  async close(): Promise<void> {}
}

describe('crawl pipeline', () => {
  let runtime: PipelineRuntime;
  let worker: TaskWorker;
  let processor: ResultProcessor;

  beforeEach(async () => {
    runtime = await initializeRuntime(settings, {
      store: new SqliteStatusStore(':memory:'),
      broker: new MemoryBroker(),
      notifier: new Notifier(),
    });
    worker = new TaskWorker({
      broker: runtime.broker,
      queue: settings.broker.taskQueue,
      resultQueue: settings.broker.resultQueue,
      taskManager: runtime.taskManager,
      engine: new KeywordEngine(),
      defaultRegion: settings.defaultRegion,
    });
    processor = new ResultProcessor({
      broker: runtime.broker,
      queue: settings.broker.resultQueue,
      taskManager: runtime.taskManager,
      notifier: runtime.notifier,
    });
    worker.start();
    processor.start();
  });

  afterEach(async () => {
    await worker.shutdown({ timeoutMs: 1000 });
    await processor.shutdown({ timeoutMs: 1000 });
    await closeRuntime(runtime);
  });

  it('takes a submission through to a completed record', async () => {
    const taskId = await runtime.taskManager.create('shoes');

    await vi.waitFor(async () => {
      expect((await runtime.taskManager.getStatus(taskId)).status).toBe('completed');
    });

    const task = await runtime.taskManager.getStatus(taskId);
    expect(task.result).toEqual({
      items: [{ title: 'shoes in BE', start_date: '2024-01-01', end_date: '2024-01-31' }],
      total: 1,
    });
    expect(task.error).toBeNull();
  });

  it('records an engine failure as a failed task', async () => {
    const taskId = await runtime.taskManager.create('explode', 'US');

    await vi.waitFor(async () => {
      expect((await runtime.taskManager.getStatus(taskId)).status).toBe('failed');
    });

    const task = await runtime.taskManager.getStatus(taskId);
    expect(task.error).toBe('search page unavailable');
    expect(task.result).toBeNull();
  });

  it('keeps concurrent tasks apart', async () => {
    const keywords = ['alpha', 'beta', 'gamma', 'delta', 'epsilon'];
    const ids = await Promise.all(keywords.map((keyword) => runtime.taskManager.create(keyword)));

    await vi.waitFor(() => {
      expect(processor.getStats().completed).toBe(keywords.length);
    });

    const titles = await Promise.all(ids.map(async (id) => {
      const task = await runtime.taskManager.getStatus(id);
      return task.result;
    }));
    expect(titles).toEqual(keywords.map((keyword) => ({
      items: [{ title: `${keyword} in BE`, start_date: '2024-01-01', end_date: '2024-01-31' }],
      total: 1,
    })));
  });
});

describe('superviseConsumer', () => {
  let broker: MemoryBroker;
  let notifier: Notifier;
  let processor: ResultProcessor;
  let alerts: string[];

  beforeEach(async () => {
    broker = new MemoryBroker();
    await broker.connect();
    notifier = new Notifier();
    alerts = [];
    notifier.subscribe((event: MonitoringEvent) => alerts.push(event.message));
    processor = new ResultProcessor({
      broker,
      queue: 'results',
      taskManager: new TaskManager({
        store: new SqliteStatusStore(':memory:'),
        broker,
        taskQueue: 'tasks',
        defaultRegion: 'BE',
      }),
      notifier,
    });
    processor.start();
  });

  it('alerts and calls onStopped when the broker ends the consume loop', async () => {
    const onStopped = vi.fn();
    const supervised = superviseConsumer(processor, notifier, onStopped);

    await broker.close();
    await supervised;

    expect(onStopped).toHaveBeenCalledTimes(1);
    expect(alerts).toEqual(["Service broker encountered an error: consumer for 'results' stopped."]);
  });

  it('stays quiet after a requested shutdown', async () => {
    const onStopped = vi.fn();
    const supervised = superviseConsumer(processor, notifier, onStopped);

    await processor.shutdown({ timeoutMs: 1000 });
    await supervised;

    expect(onStopped).not.toHaveBeenCalled();
    expect(alerts).toEqual([]);
    await broker.close();
  });
});
