/**
 * Broker Channel - durable queue abstraction shared by the coordinator,
 * the worker loop and the result reconciler.
 */

/**
 * One message handed to a consumer. It stays on the broker (unacknowledged)
 * until ack() is called; a consumer that goes away before acking gets the
 * message redelivered to the next consumer.
 */
export interface BrokerDelivery {
  /** Raw message body (UTF-8 JSON as published). */
  content: string;
  /** True when the broker has delivered this message before. */
  redelivered: boolean;
  ack(): void;
}

export interface ConsumeOptions {
  /** Stops the consumer when aborted; the iteration then ends. */
  signal?: AbortSignal;
}

export interface BrokerChannel {
  readonly driver: 'amqp' | 'memory';

  /** Open the connection and channel (idempotent). Raises ConnectionError. */
  connect(): Promise<void>;

  /** Cancel consumers and release the connection. */
  close(): Promise<void>;

  isConnected(): boolean;

  /** Declare a durable queue (publish/consume declare their queue too). */
  assertQueue(queue: string): Promise<void>;

  /**
   * Publish a persistent JSON message. Raises MessageError on serialization
   * or transport failure; nothing is delivered in that case.
   */
  publish(queue: string, message: object): Promise<void>;

  /** Lazily yield deliveries from `queue` until the signal aborts or the channel closes. */
  consume(queue: string, options?: ConsumeOptions): AsyncIterable<BrokerDelivery>;
}
