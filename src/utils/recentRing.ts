/**
 * Fixed-capacity list that drops its oldest entry when a push overflows it.
 */
export class RecentRing<T> {
  private items: T[] = [];

  constructor(private readonly capacity: number) {
    if (capacity < 1) {
      throw new Error(`RecentRing capacity must be at least 1, got ${capacity}`);
    }
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.capacity) {
      this.items.shift();
    }
  }

  /** Oldest first. */
  toArray(): T[] {
    return [...this.items];
  }
}
