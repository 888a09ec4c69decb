import { ChannelClosedError } from "./errors.js";

/**
 * Unbounded multi-producer, single-consumer queue.
 *
 * Producers push synchronously; the consumer drains it with `for await`,
 * which ends once the channel is closed and empty. Pushing after close
 * throws ChannelClosedError.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private closed = false;
  private notify: (() => void) | undefined;

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) {
      throw new ChannelClosedError();
    }
    this.buffer.push(item);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  private wake(): void {
    const notify = this.notify;
    this.notify = undefined;
    notify?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      if (this.buffer.length > 0) {
        const [item] = this.buffer.splice(0, 1);
        yield item;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.notify = resolve;
      });
    }
  }
}
