/**
 * Crawler Entry Point
 *
 * Consumes the task queue and runs each search in the extraction worker
 * thread. Run as many of these processes as needed; the broker spreads tasks
 * across them.
 */

import { loadSettings } from '~/lib/config/storage';
import { getLogger, setLogLevel } from '~/lib/log/logger';
import {
  closeRuntime,
  initializeRuntime,
  registerShutdownHooks,
  superviseConsumer,
  TaskWorker,
} from '~/lib/task-queue';
import { ThreadExtractionEngine } from '~/lib/workers/extraction-client';

const log = getLogger({ module: 'Crawler' });

async function main(): Promise<void> {
  const settings = loadSettings();
  setLogLevel(settings.log.level);

  const runtime = await initializeRuntime(settings);

  const engine = new ThreadExtractionEngine({
    baseUrl: settings.crawler.baseUrl,
    timeoutMs: settings.crawler.timeoutMs,
  });
  await engine.start();

  const worker = new TaskWorker({
    broker: runtime.broker,
    queue: settings.broker.taskQueue,
    resultQueue: settings.broker.resultQueue,
    taskManager: runtime.taskManager,
    engine,
    defaultRegion: settings.defaultRegion,
    engineOptions: { timeoutMs: settings.crawler.timeoutMs },
  });
  worker.start();
  void superviseConsumer(worker, runtime.notifier, () => process.exit(1));
  log.info({ queue: settings.broker.taskQueue }, 'crawler consuming tasks');

  registerShutdownHooks(async (signal) => {
    await worker.shutdown({ reason: `signal:${signal}`, timeoutMs: 5000 });
    await engine.close();
    await closeRuntime(runtime);
  });

  process.on('uncaughtException', (error) => {
    log.error({ err: error }, 'uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    log.error({ err: reason }, 'unhandled rejection');
  });
}

main().catch((error: unknown) => {
  log.error({ err: error }, 'failed to start crawler');
  process.exit(1);
});
