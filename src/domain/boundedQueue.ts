/**
 * FIFO with a capacity read on every offer, so the limit can change at runtime.
 * A capacity that is not a finite number counts as 0.
 */

export class BoundedQueue<T> {
  private items: T[] = [];

  constructor(private readonly maxSize: () => number) {}

  get length(): number {
    return this.items.length;
  }

  get capacity(): number {
    const size = this.maxSize();
    return Number.isFinite(size) ? Math.max(0, Math.floor(size)) : 0;
  }

  /** Returns false (item not stored) when the queue is at capacity. */
  offer(item: T): boolean {
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  poll(): T | undefined {
    return this.items.shift();
  }
}
