/**
 * API Server Entry Point
 *
 * Connects the status store and broker, starts the result processor, then
 * accepts HTTP submissions. Everything is ready before the port opens.
 */

import type { Server } from 'http';
import { createApp } from '~/app';
import { loadSettings } from '~/lib/config/storage';
import { getLogger, setLogLevel } from '~/lib/log/logger';
import {
  closeRuntime,
  initializeRuntime,
  registerShutdownHooks,
  ResultProcessor,
  superviseConsumer,
  TaskWorker,
} from '~/lib/task-queue';
import { ThreadExtractionEngine } from '~/lib/workers/extraction-client';

const log = getLogger({ module: 'Server' });

async function main(): Promise<Server> {
  log.info({}, 'starting application initialization');

  const settings = loadSettings();
  setLogLevel(settings.log.level);

  const runtime = await initializeRuntime(settings);

  const resultProcessor = new ResultProcessor({
    broker: runtime.broker,
    queue: settings.broker.resultQueue,
    taskManager: runtime.taskManager,
    notifier: runtime.notifier,
  });
  resultProcessor.start();
  void superviseConsumer(resultProcessor, runtime.notifier, () => process.exit(1));

  // The memory broker only reaches consumers in this process, so the worker runs here too
  let embedded: { worker: TaskWorker; engine: ThreadExtractionEngine } | null = null;
  if (settings.broker.driver === 'memory') {
    const engine = new ThreadExtractionEngine({
      baseUrl: settings.crawler.baseUrl,
      timeoutMs: settings.crawler.timeoutMs,
    });
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
    embedded = { worker, engine };
    log.info({}, 'single-process mode: task worker running in the api server');
  }

  const app = createApp(runtime);
  const server = app.listen(settings.app.port, settings.app.host, () => {
    log.info({ host: settings.app.host, port: settings.app.port }, 'server listening');
  });

  registerShutdownHooks(async (signal) => {
    log.info({ signal }, 'shutdown initiated');
    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) log.warn({ err: error }, 'http server close error');
        resolve();
      });
    });
    if (embedded) {
      await embedded.worker.shutdown({ reason: `signal:${signal}`, timeoutMs: 5000 });
      await embedded.engine.close();
    }
    await resultProcessor.shutdown({ reason: `signal:${signal}`, timeoutMs: 5000 });
    await closeRuntime(runtime);
  });

  process.on('uncaughtException', (error) => {
    log.error({ err: error }, 'uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    log.error({ err: reason }, 'unhandled rejection');
  });

  return server;
}

main().catch((error: unknown) => {
  log.error({ err: error }, 'failed to start server');
  process.exit(1);
});
