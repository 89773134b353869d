import { assertPositiveInt } from "@tradewatch/kit";

/**
 * Fixed-capacity, newest-first ring buffer with drop-oldest eviction.
 *
 * Every method is synchronous, so on the event loop a `push` from the feed
 * side and a snapshot from the render side never interleave. Storage stays
 * private; readers only ever get copies.
 */
export class BoundedBuffer<T> {
  readonly capacity: number;
  private items: T[];
  private head = 0;
  private length = 0;

  constructor(capacity: number) {
    this.capacity = assertPositiveInt(capacity, "BoundedBuffer capacity");
    this.items = new Array<T>(this.capacity);
  }

  get size(): number {
    return this.length;
  }

  /** Insert at the front. When full, the oldest item is overwritten. */
  push(item: T): void {
    this.head = (this.head - 1 + this.capacity) % this.capacity;
    this.items[this.head] = item;
    if (this.length < this.capacity) {
      this.length++;
    }
  }

  /** Items matching predicate, newest first. The buffer is not modified. */
  snapshotFilter(predicate: (item: T) => boolean): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.length; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (predicate(item)) out.push(item);
    }
    return out;
  }

  snapshot(): T[] {
    return this.snapshotFilter(() => true);
  }

  /** Newest item matching predicate. */
  find(predicate: (item: T) => boolean): T | undefined {
    for (let i = 0; i < this.length; i++) {
      const item = this.items[(this.head + i) % this.capacity];
      if (predicate(item)) return item;
    }
    return undefined;
  }
}
