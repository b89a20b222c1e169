/**
 * Push-to-pull adapter: broker callbacks push deliveries, the consumer pulls
 * them with `for await`. Ending the iteration runs the cancel hook once.
 */

export class DeliveryStream<T> implements AsyncIterableIterator<T> {
  private readonly buffer: T[] = [];
  private readonly waiting: Array<(result: IteratorResult<T>) => void> = [];
  private ended = false;

  constructor(private readonly onCancel: () => Promise<void> | void) {}

  push(item: T): void {
    if (this.ended) return;
    const resolve = this.waiting.shift();
    if (resolve) {
      resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  /**
   * End the stream from the producer side (channel closed, consumer cancelled by broker)
   */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const resolve of this.waiting.splice(0)) {
      resolve({ value: undefined, done: true });
    }
  }

  isEnded(): boolean {
    return this.ended;
  }

  /**
   * Items received but not yet pulled
   */
  drainBuffered(): T[] {
    return this.buffer.splice(0);
  }

  next(): Promise<IteratorResult<T>> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      return Promise.resolve({ value: item, done: false });
    }
    if (this.ended) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  async return(): Promise<IteratorResult<T>> {
    if (!this.ended) {
      this.end();
      await this.onCancel();
    }
    return { value: undefined, done: true };
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
