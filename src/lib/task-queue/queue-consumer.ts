/**
 * Queue Consumer - shared consume loop for the worker and the result reconciler
 *
 * One delivery is processed at a time. Every delivery is acked once handled,
 * whatever the outcome; per-message errors never end the loop.
 */

import type { BrokerChannel, BrokerDelivery } from '~/lib/broker/types';
import { ConnectionError, errorMessage } from '~/lib/errors';
import { getLogger, type Logger } from '~/lib/log/logger';
import type { ProcessingOutcome, ProcessingStats } from './types';
import { emptyStats } from './types';

export interface QueueConsumerOptions {
  broker: BrokerChannel;
  queue: string;
}

export abstract class QueueConsumer {
  protected readonly broker: BrokerChannel;
  protected readonly queue: string;
  protected readonly logger: Logger;
  private running = false;
  private stopping = false;
  private stopRequested = false;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private activeTasks = new Set<Promise<unknown>>();
  private readonly stats: ProcessingStats = emptyStats();

  constructor(options: QueueConsumerOptions, module: string) {
    this.broker = options.broker;
    this.queue = options.queue;
    this.logger = getLogger({ module, queue: options.queue });
  }

  /**
   * Handle one message body. Throwing counts the delivery as rejected.
   */
  protected abstract handle(content: string, redelivered: boolean): Promise<ProcessingOutcome>;

  /**
   * Start consuming; the broker must already be connected
   */
  start(): void {
    if (this.running) {
      this.logger.debug({}, 'consumer already running');
      return;
    }
    if (!this.broker.isConnected()) {
      throw new ConnectionError(`Cannot consume '${this.queue}': broker is not connected.`);
    }

    this.running = true;
    this.stopping = false;
    this.stopRequested = false;
    this.controller = new AbortController();
    this.loop = this.run(this.controller.signal);
    this.logger.info({}, 'consumer started');
  }

  /**
   * Gracefully stop: finish the in-flight delivery (with timeout), then cancel the consumer.
   * An unfinished delivery is left unacked and goes back to the queue.
   */
  async shutdown(options?: { timeoutMs?: number; reason?: string }): Promise<void> {
    if (!this.running || this.stopping) {
      return;
    }

    this.stopping = true;
    this.stopRequested = true;
    this.logger.info({ reason: options?.reason }, 'consumer shutting down');

    await this.waitForActiveTasks(options?.timeoutMs ?? 10_000);
    const timedOut = this.activeTasks.size > 0;

    this.controller?.abort();
    if (timedOut) {
      this.logger.warn({ pending: this.activeTasks.size }, 'shutdown timed out while waiting for delivery');
    } else {
      await this.loop;
    }
    this.controller = null;
    this.loop = null;
    this.stopping = false;
    this.logger.info({ stats: this.getStats() }, 'consumer shutdown complete');
  }

  /**
   * Resolves when the consume loop ends (shutdown or channel closed)
   */
  async done(): Promise<void> {
    await this.loop;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * True once shutdown() was called for the current run; a loop that ends
   * without it was stopped by the broker
   */
  wasStopRequested(): boolean {
    return this.stopRequested;
  }

  getQueue(): string {
    return this.queue;
  }

  getStats(): ProcessingStats {
    return { ...this.stats };
  }

  /**
   * Handle, count and ack a single delivery
   */
  async processDelivery(delivery: BrokerDelivery): Promise<ProcessingOutcome> {
    this.stats.received++;

    let outcome: ProcessingOutcome;
    try {
      outcome = await this.handle(delivery.content, delivery.redelivered);
    } catch (error) {
      this.logger.error({ err: error }, 'unhandled error while processing message');
      outcome = { kind: 'rejected', taskId: null, reason: errorMessage(error) };
    } finally {
      delivery.ack();
    }

    this.record(outcome);
    return outcome;
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      for await (const delivery of this.broker.consume(this.queue, { signal })) {
        if (this.stopping) break;
        await this.trackExecution(this.processDelivery(delivery));
      }
    } catch (error) {
      this.logger.error({ err: error }, 'consume loop failed');
    } finally {
      this.running = false;
      this.logger.info({}, 'consumer stopped');
    }
  }

  private record(outcome: ProcessingOutcome): void {
    switch (outcome.kind) {
      case 'completed':
        this.stats.completed++;
        this.logger.info({ taskId: outcome.taskId }, 'message processed: completed');
        break;
      case 'failed':
        this.stats.failed++;
        this.logger.info({ taskId: outcome.taskId, error: outcome.error }, 'message processed: failed');
        break;
      case 'rejected':
        this.stats.rejected++;
        this.logger.warn({ taskId: outcome.taskId, reason: outcome.reason }, 'message rejected');
        break;
    }
  }

  private trackExecution<T>(promise: Promise<T>): Promise<T> {
    this.activeTasks.add(promise);
    return promise.finally(() => {
      this.activeTasks.delete(promise);
    });
  }

  private async waitForActiveTasks(timeoutMs: number): Promise<void> {
    if (this.activeTasks.size === 0) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    await Promise.race([
      Promise.allSettled(Array.from(this.activeTasks)).then(() => undefined),
      new Promise<void>(resolve => {
        timer = setTimeout(resolve, timeoutMs);
      }),
    ]);
    clearTimeout(timer);
  }
}
