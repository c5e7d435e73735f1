/**
 * Fixed-capacity ring buffer with oldest-first eviction.
 *
 * Used for the session's record history and the recovery manager's attempt
 * log, both of which would otherwise grow for the lifetime of a run.
 *
 * @module domain/bounded-history
 */
export class BoundedHistory<T> {
  private readonly slots: Array<T | undefined>;
  private head = 0;
  private count = 0;
  private evicted = 0;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`BoundedHistory capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  /** Entries dropped since creation (or the last clear). */
  get evictedCount(): number {
    return this.evicted;
  }

  /** Append an entry; returns the evicted entry when the buffer was full. */
  push(item: T): T | undefined {
    const tail = (this.head + this.count) % this.capacity;
    if (this.count < this.capacity) {
      this.slots[tail] = item;
      this.count++;
      return undefined;
    }
    const dropped = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    this.evicted++;
    return dropped;
  }

  /** Oldest first. */
  toArray(): T[] {
    const out: T[] = [];
    for (let i = 0; i < this.count; i++) {
      const item = this.slots[(this.head + i) % this.capacity];
      if (item !== undefined) out.push(item);
    }
    return out;
  }

  /** The newest `n` entries, newest last. */
  recent(n: number): T[] {
    if (n <= 0) return [];
    const all = this.toArray();
    return all.slice(Math.max(0, all.length - n));
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
    this.evicted = 0;
  }
}
