import { ChannelClosedError } from './errors.ts';

/**
 * Ordered many-producer / single-consumer queue.
 *
 * send() never blocks. receive() resolves with the next item, waiting if the
 * queue is empty. Closing rejects pending receivers and later sends.
 */
export class Channel<T> {
  private queue: T[] = [];
  private receivers: Array<{ resolve: (value: T) => void; reject: (error: Error) => void }> = [];
  private closed = false;

  send(item: T): void {
    if (this.closed) {
      throw new ChannelClosedError();
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(item);
    } else {
      this.queue.push(item);
    }
  }

  receive(): Promise<T> {
    if (this.queue.length > 0) {
      const [item] = this.queue.splice(0, 1);
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }
    return new Promise<T>((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  /**
   * Take the next queued item without waiting
   */
  tryReceive(): { ok: true; value: T } | { ok: false } {
    if (this.queue.length === 0) {
      return { ok: false };
    }
    const [value] = this.queue.splice(0, 1);
    return { ok: true, value };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const pending = this.receivers;
    this.receivers = [];
    for (const receiver of pending) {
      receiver.reject(new ChannelClosedError());
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get length(): number {
    return this.queue.length;
  }
}
