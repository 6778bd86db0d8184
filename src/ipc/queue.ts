/**
 * Single-consumer async queue. `offer` never blocks: it hands the item to a
 * waiting consumer, buffers it, or refuses it once `capacity` items are queued.
 * After `close`, buffered items are still handed out, then `take` yields
 * undefined.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private closed = false;

  constructor(private readonly capacity = Number.POSITIVE_INFINITY) {}

  offer(item: T): boolean {
    if (this.closed) return false;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(item);
      return true;
    }
    if (this.items.length >= this.capacity) return false;
    this.items.push(item);
    return true;
  }

  take(): Promise<T | undefined> {
    if (this.items.length > 0) return Promise.resolve(this.items.shift());
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  remove(item: T): boolean {
    const index = this.items.indexOf(item);
    if (index === -1) return false;
    this.items.splice(index, 1);
    return true;
  }

  /** Remove and return every buffered item. */
  clear(): T[] {
    const items = this.items;
    this.items = [];
    return items;
  }

  close(): void {
    this.closed = true;
    if (this.waiter && this.items.length === 0) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(undefined);
    }
  }

  get size(): number {
    return this.items.length;
  }
}
