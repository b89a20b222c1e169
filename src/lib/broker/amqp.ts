/**
 * AMQP broker (amqplib).
 *
 * One connection and one confirm channel per process. Queues are declared
 * durable, messages are published persistent and wait for the broker's
 * publisher confirm, so a resolved publish() means the broker accepted it.
 */

import amqp from 'amqplib';
import type { ConfirmChannel, ConsumeMessage } from 'amqplib';
import { ConnectionError, MessageError } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import { redactUrl } from '~/lib/utils/redact-url';
import { DeliveryStream } from './delivery-stream';
import type { BrokerChannel, BrokerDelivery, ConsumeOptions } from './types';

const log = getLogger({ module: 'AmqpBroker' });

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

export interface AmqpBrokerOptions {
  url: string;
  /** Unacked deliveries per consumer (default: 1). */
  prefetch?: number;
}

export class AmqpBroker implements BrokerChannel {
  readonly driver = 'amqp' as const;
  private connection: AmqpConnection | null = null;
  private channel: ConfirmChannel | null = null;
  private readonly declared = new Set<string>();
  private readonly streams = new Set<DeliveryStream<BrokerDelivery>>();

  constructor(private readonly options: AmqpBrokerOptions) {}

  async connect(): Promise<void> {
    if (this.channel) return;

    try {
      const connection = await amqp.connect(this.options.url);
      const channel = await connection.createConfirmChannel();
      await channel.prefetch(this.options.prefetch ?? 1);

      connection.on('error', (error: unknown) => {
        log.error({ err: error }, 'amqp connection error');
      });
      connection.on('close', () => {
        this.handleClosed('connection');
      });
      // The server closes a channel with an error (406, consumer timeout, unknown delivery tag)
      channel.on('error', (error: unknown) => {
        log.error({ err: error }, 'amqp channel error');
      });
      channel.on('close', () => {
        this.handleClosed('channel');
      });

      this.connection = connection;
      this.channel = channel;
      log.info({ url: redactUrl(this.options.url) }, 'connected to broker');
    } catch (error) {
      log.error({ err: error }, 'failed to connect to broker');
      throw new ConnectionError('Could not connect to the message broker.', { cause: error });
    }
  }

  async close(): Promise<void> {
    const connection = this.connection;
    if (!connection) return;

    for (const stream of [...this.streams]) {
      await stream.return();
    }

    this.connection = null;
    this.channel = null;
    this.declared.clear();

    try {
      await connection.close();
      log.info({}, 'broker connection closed');
    } catch (error) {
      log.error({ err: error }, 'failed to close broker connection');
      throw new ConnectionError('Error closing broker connection.', { cause: error });
    }
  }

  isConnected(): boolean {
    return this.channel !== null;
  }

  async assertQueue(queue: string): Promise<void> {
    const channel = this.requireChannel();
    if (this.declared.has(queue)) return;
    await channel.assertQueue(queue, { durable: true });
    this.declared.add(queue);
  }

  async publish(queue: string, message: object): Promise<void> {
    const channel = this.requireChannel();

    let body: Buffer;
    try {
      body = Buffer.from(JSON.stringify(message));
    } catch (error) {
      throw new MessageError(`Error serializing message for queue '${queue}'.`, { cause: error });
    }

    try {
      await this.assertQueue(queue);
      await new Promise<void>((resolve, reject) => {
        channel.sendToQueue(
          queue,
          body,
          { persistent: true, contentType: 'application/json' },
          (error: unknown) => (error ? reject(error) : resolve())
        );
      });
      log.debug({ queue }, 'message published');
    } catch (error) {
      log.error({ err: error, queue }, 'failed to publish message');
      throw new MessageError(`Error publishing message to queue '${queue}'.`, { cause: error });
    }
  }

  consume(queue: string, options: ConsumeOptions = {}): AsyncIterable<BrokerDelivery> {
    const channel = this.requireChannel();
    let consumerTag: string | null = null;
    const raw = new WeakMap<BrokerDelivery, ConsumeMessage>();

    const stream = new DeliveryStream<BrokerDelivery>(async () => {
      this.streams.delete(stream);
      if (this.channel !== channel) return;
      try {
        if (consumerTag) {
          await channel.cancel(consumerTag);
        }
        // Deliveries received but never handed out go straight back to the queue
        for (const delivery of stream.drainBuffered()) {
          const message = raw.get(delivery);
          if (message) channel.nack(message, false, true);
        }
        log.info({ queue, consumerTag }, 'consumer cancelled');
      } catch (error) {
        log.error({ err: error, queue }, 'failed to cancel consumer');
      }
    });
    this.streams.add(stream);

    const onMessage = (message: ConsumeMessage | null) => {
      if (message !== null && stream.isEnded()) {
        // Consumer stopped before the broker saw the cancel
        if (this.channel === channel) channel.nack(message, false, true);
        return;
      }
      if (message === null) {
        log.warn({ queue }, 'consumer cancelled by broker');
        this.streams.delete(stream);
        stream.end();
        return;
      }
      const delivery: BrokerDelivery = {
        content: message.content.toString('utf-8'),
        redelivered: message.fields.redelivered,
        ack: () => {
          if (this.channel === channel) {
            channel.ack(message);
          } else {
            log.warn({ queue }, 'ack skipped, channel already closed');
          }
        },
      };
      raw.set(delivery, message);
      stream.push(delivery);
    };

    this.assertQueue(queue)
      .then(() => channel.consume(queue, onMessage, { noAck: false }))
      .then(async (reply) => {
        consumerTag = reply.consumerTag;
        if (stream.isEnded()) {
          if (this.channel === channel) await channel.cancel(reply.consumerTag);
          log.info({ queue, consumerTag }, 'consumer stopped before it started, cancelled');
          return;
        }
        log.info({ queue, consumerTag }, 'consumer started');
      })
      .catch((error: unknown) => {
        log.error({ err: error, queue }, 'failed to start consumer');
        this.streams.delete(stream);
        stream.end();
      });

    if (options.signal) {
      if (options.signal.aborted) {
        void stream.return();
      } else {
        options.signal.addEventListener('abort', () => {
          void stream.return();
        }, { once: true });
      }
    }

    return stream;
  }

  private handleClosed(source: 'connection' | 'channel'): void {
    const connection = this.connection;
    if (!connection) return;
    log.warn({ source }, 'broker connection closed unexpectedly');
    this.connection = null;
    this.channel = null;
    this.declared.clear();
    for (const stream of this.streams) {
      stream.end();
    }
    this.streams.clear();

    if (source === 'channel') {
      connection.close().catch((error: unknown) => {
        log.warn({ err: error }, 'failed to close broker connection after channel loss');
      });
    }
  }

  private requireChannel(): ConfirmChannel {
    if (!this.channel) {
      throw new ConnectionError('Broker channel is not connected.');
    }
    return this.channel;
  }
}
