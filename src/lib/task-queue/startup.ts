/**
 * Task Queue Startup - build, connect and tear down the pipeline collaborators
 *
 * Every process (API server, crawler) owns exactly one status store and one
 * broker channel, opened here before any consumer starts and closed on
 * shutdown.
 */

import { createBroker } from '~/lib/broker';
import type { BrokerChannel } from '~/lib/broker/types';
import type { AppSettings } from '~/lib/config/settings';
import { errorMessage } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import { Notifier } from '~/lib/notifications/notifier';
import { createStatusStore } from '~/lib/status-store';
import type { StatusStore } from '~/lib/status-store/types';
import type { QueueConsumer } from './queue-consumer';
import { TaskManager } from './task-manager';

const log = getLogger({ module: 'TaskQueueStartup' });

export interface PipelineRuntime {
  settings: AppSettings;
  store: StatusStore;
  broker: BrokerChannel;
  taskManager: TaskManager;
  notifier: Notifier;
}

export interface RuntimeOverrides {
  store?: StatusStore;
  broker?: BrokerChannel;
  notifier?: Notifier;
}

/**
 * Create and connect the store and broker, then wire the task manager.
 * A connection failure is alerted on every channel and rethrown.
 */
export async function initializeRuntime(
  settings: AppSettings,
  overrides: RuntimeOverrides = {}
): Promise<PipelineRuntime> {
  log.info({ store: settings.store.driver, broker: settings.broker.driver }, 'initializing');

  const notifier = overrides.notifier ?? new Notifier({ telegram: settings.alerts.telegram });
  const store = overrides.store ?? createStatusStore(settings.store);
  const broker = overrides.broker ?? createBroker(settings.broker);

  try {
    await store.connect();
  } catch (error) {
    await notifier.monitorServices({ status_store: `error: ${errorMessage(error)}` });
    throw error;
  }

  try {
    await broker.connect();
    await broker.assertQueue(settings.broker.taskQueue);
    await broker.assertQueue(settings.broker.resultQueue);
  } catch (error) {
    await notifier.monitorServices({ broker: `error: ${errorMessage(error)}` });
    await store.close();
    throw error;
  }

  const taskManager = new TaskManager({
    store,
    broker,
    taskQueue: settings.broker.taskQueue,
    defaultRegion: settings.defaultRegion,
  });

  log.info({}, 'initialization complete');
  return { settings, store, broker, taskManager, notifier };
}

/**
 * Release the broker and store connections; errors are logged, not thrown
 */
export async function closeRuntime(runtime: PipelineRuntime): Promise<void> {
  try {
    await runtime.broker.close();
  } catch (error) {
    log.error({ err: error }, 'failed to close broker');
  }

  try {
    await runtime.store.close();
  } catch (error) {
    log.error({ err: error }, 'failed to close status store');
  }

  log.info({}, 'connections released');
}

/**
 * Watch a started consumer. When its loop ends without a shutdown request
 * (connection or channel lost, consumer cancelled by the broker) the loss is
 * alerted on every channel and `onStopped` runs; entry points exit there so a
 * supervisor can restart the process.
 */
export function superviseConsumer(
  consumer: QueueConsumer,
  notifier: Notifier,
  onStopped: () => void
): Promise<void> {
  return consumer
    .done()
    .then(async () => {
      if (consumer.wasStopRequested()) return;
      log.error({ queue: consumer.getQueue() }, 'consumer stopped without a shutdown request');
      await notifier.monitorServices({ broker: `error: consumer for '${consumer.getQueue()}' stopped` });
      onStopped();
    })
    .catch((error: unknown) => {
      log.error({ err: error, queue: consumer.getQueue() }, 'consumer supervision failed');
      onStopped();
    });
}

let shutdownHooksRegistered = false;

/**
 * Run `shutdown` once on SIGINT/SIGTERM, then exit
 */
export function registerShutdownHooks(shutdown: (signal: NodeJS.Signals) => Promise<void>): void {
  if (shutdownHooksRegistered) {
    return;
  }

  shutdownHooksRegistered = true;
  let shuttingDown = false;
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
  signals.forEach(signal => {
    process.on(signal, () => {
      if (shuttingDown) return;
      shuttingDown = true;
      log.info({ signal }, 'received shutdown signal');
      shutdown(signal)
        .then(() => {
          log.info({ signal }, 'shutdown complete, exiting');
          process.exit(0);
        })
        .catch((error: unknown) => {
          log.error({ err: error, signal }, 'error during shutdown');
          process.exit(1);
        });
    });
  });
}
