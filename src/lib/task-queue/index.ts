/**
 * Task Queue - Main entry point
 *
 * Usage:
 *   const runtime = await initializeRuntime(loadSettings());
 *   const taskId = await runtime.taskManager.create('running shoes', 'BE');
 *
 *   // crawler process
 *   new TaskWorker({ broker, queue: settings.broker.taskQueue, ... }).start();
 *
 *   // API process
 *   new ResultProcessor({ broker, queue: settings.broker.resultQueue, ... }).start();
 */

export * from './types';
export * from './task-manager';
export * from './transitions';
export * from './uuid';
export { TaskWorker, type WorkerConfig } from './worker';
export { ResultProcessor, outcomeMessage, type ResultProcessorConfig } from './result-processor';
export { QueueConsumer, type QueueConsumerOptions } from './queue-consumer';
export {
  initializeRuntime,
  closeRuntime,
  registerShutdownHooks,
  superviseConsumer,
  type PipelineRuntime,
  type RuntimeOverrides,
} from './startup';
