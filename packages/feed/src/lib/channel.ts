import { assertPositiveInt } from "@tradewatch/kit";

type Receiver<T> = (item: T | undefined) => void;

/**
 * Bounded single-producer / single-consumer async queue.
 *
 * Sending never blocks: when the queue is full (or closed) the item is
 * dropped and `trySend` returns false. The consumer awaits `receive()` or
 * iterates with `for await`, which ends once the channel is closed and drained.
 */
export class Channel<T extends NonNullable<unknown>> implements AsyncIterable<T> {
  readonly capacity: number;
  private queue: T[] = [];
  private receivers: Receiver<T>[] = [];
  private isClosed = false;
  private dropped = 0;

  constructor(capacity: number) {
    this.capacity = assertPositiveInt(capacity, "Channel capacity");
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get size(): number {
    return this.queue.length;
  }

  /** Number of items rejected by trySend since creation. */
  get droppedCount(): number {
    return this.dropped;
  }

  trySend(item: T): boolean {
    if (this.isClosed) {
      this.dropped++;
      return false;
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return true;
    }
    if (this.queue.length >= this.capacity) {
      this.dropped++;
      return false;
    }
    this.queue.push(item);
    return true;
  }

  /** Next item, or undefined once the channel is closed and drained. */
  receive(): Promise<T | undefined> {
    const next = this.queue.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.isClosed) return Promise.resolve(undefined);
    return new Promise<T | undefined>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const item = await this.receive();
      if (item === undefined) return;
      yield item;
    }
  }
}
