/**
 * In-process broker with the delivery semantics of the AMQP backend:
 * per-consumer prefetch, explicit acks, redelivery of unacked messages when a
 * consumer goes away. Queues outlive close()/connect() on the same instance.
 * Used by tests and single-process mode.
 */

import { ConnectionError, MessageError } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import { DeliveryStream } from './delivery-stream';
import type { BrokerChannel, BrokerDelivery, ConsumeOptions } from './types';

const log = getLogger({ module: 'MemoryBroker' });

interface StoredMessage {
  content: string;
  redelivered: boolean;
}

interface MemoryConsumer {
  stream: DeliveryStream<BrokerDelivery>;
  unacked: Set<StoredMessage>;
}

interface MemoryQueue {
  ready: StoredMessage[];
  consumers: MemoryConsumer[];
  nextConsumer: number;
}

export class MemoryBroker implements BrokerChannel {
  readonly driver = 'memory' as const;
  private readonly queues = new Map<string, MemoryQueue>();
  private connected = false;

  constructor(private readonly prefetch: number = 1) {}

  async connect(): Promise<void> {
    if (this.connected) return;
    this.connected = true;
    log.debug({}, 'memory broker connected');
  }

  async close(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    for (const [name, queue] of this.queues) {
      for (const consumer of [...queue.consumers]) {
        this.cancelConsumer(name, consumer);
        consumer.stream.end();
      }
    }
    log.debug({}, 'memory broker closed');
  }

  isConnected(): boolean {
    return this.connected;
  }

  async assertQueue(queue: string): Promise<void> {
    this.requireConnection();
    this.getQueue(queue);
  }

  async publish(queue: string, message: object): Promise<void> {
    this.requireConnection();

    let content: string;
    try {
      content = JSON.stringify(message);
    } catch (error) {
      throw new MessageError(`Error serializing message for queue '${queue}'.`, { cause: error });
    }

    this.getQueue(queue).ready.push({ content, redelivered: false });
    this.dispatch(queue);
  }

  consume(queue: string, options: ConsumeOptions = {}): AsyncIterable<BrokerDelivery> {
    this.requireConnection();
    const target = this.getQueue(queue);

    const consumer: MemoryConsumer = {
      stream: new DeliveryStream<BrokerDelivery>(() => this.cancelConsumer(queue, consumer)),
      unacked: new Set(),
    };
    target.consumers.push(consumer);

    if (options.signal) {
      if (options.signal.aborted) {
        void consumer.stream.return();
      } else {
        options.signal.addEventListener('abort', () => {
          void consumer.stream.return();
        }, { once: true });
      }
    }

    this.dispatch(queue);
    return consumer.stream;
  }

  /**
   * Messages waiting for a consumer
   */
  readyCount(queue: string): number {
    return this.queues.get(queue)?.ready.length ?? 0;
  }

  /**
   * Messages delivered but not yet acknowledged
   */
  unackedCount(queue: string): number {
    const target = this.queues.get(queue);
    if (!target) return 0;
    return target.consumers.reduce((sum, consumer) => sum + consumer.unacked.size, 0);
  }

  /**
   * Remove and return the ready messages of a queue, parsed
   */
  drain(queue: string): unknown[] {
    const target = this.queues.get(queue);
    if (!target) return [];
    return target.ready.splice(0).map((message) => JSON.parse(message.content));
  }

  private getQueue(name: string): MemoryQueue {
    let queue = this.queues.get(name);
    if (!queue) {
      queue = { ready: [], consumers: [], nextConsumer: 0 };
      this.queues.set(name, queue);
    }
    return queue;
  }

  private dispatch(name: string): void {
    const queue = this.getQueue(name);

    while (queue.ready.length > 0) {
      const consumer = this.pickConsumer(queue);
      if (!consumer) return;

      const message = queue.ready.shift();
      if (!message) return;

      consumer.unacked.add(message);
      consumer.stream.push({
        content: message.content,
        redelivered: message.redelivered,
        ack: () => {
          if (consumer.unacked.delete(message)) {
            this.dispatch(name);
          } else {
            log.debug({ queue: name }, 'ack for a message no longer held by this consumer');
          }
        },
      });
    }
  }

  // Round-robin over consumers that still have prefetch capacity
  private pickConsumer(queue: MemoryQueue): MemoryConsumer | null {
    const count = queue.consumers.length;
    for (let i = 0; i < count; i++) {
      const index = (queue.nextConsumer + i) % count;
      const consumer = queue.consumers[index];
      if (consumer.unacked.size < this.prefetch) {
        queue.nextConsumer = (index + 1) % count;
        return consumer;
      }
    }
    return null;
  }

  private cancelConsumer(name: string, consumer: MemoryConsumer): void {
    const queue = this.getQueue(name);
    queue.consumers = queue.consumers.filter((c) => c !== consumer);

    // Unacked messages go back to the head of the queue, flagged as redelivered
    const returned = [...consumer.unacked].map((message) => ({ ...message, redelivered: true }));
    consumer.unacked.clear();
    queue.ready.unshift(...returned);

    if (returned.length > 0) {
      log.debug({ queue: name, count: returned.length }, 'requeued unacked messages');
    }
    this.dispatch(name);
  }

  private requireConnection(): void {
    if (!this.connected) {
      throw new ConnectionError('Broker channel is not connected.');
    }
  }
}
