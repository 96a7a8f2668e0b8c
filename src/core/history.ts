import { LIMITS } from '../config/defaults.js';

/**
 * Bounded FIFO of previously generated queries, used only as prompt
 * context. The oldest entry is evicted once capacity is exceeded.
 */
export class SearchHistory {
  private readonly entries: string[] = [];

  constructor(readonly capacity: number = LIMITS.HISTORY_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${String(capacity)}`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  push(query: string): void {
    this.entries.push(query);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /** Up to `count` most recent entries, oldest first. */
  recent(count: number): string[] {
    return count <= 0 ? [] : this.entries.slice(-count);
  }

  toArray(): string[] {
    return [...this.entries];
  }
}
