import type { PendingEvent } from "./types.js";

/**
 * Bounded FIFO of events waiting for the broker. When full, the oldest entry
 * is evicted and handed back to the caller.
 */
export class PendingEventBuffer {
  private readonly entries: PendingEvent[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Invalid buffer capacity: ${capacity}. Must be an integer >= 1.`);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Append at the tail.
   *
   * @returns the evicted oldest entry, or null
   */
  push(event: PendingEvent): PendingEvent | null {
    this.entries.push(event);
    return this.entries.length > this.capacity ? (this.entries.shift() ?? null) : null;
  }

  /**
   * Put an entry back at the head after a failed replay.
   *
   * @returns the evicted oldest entry (possibly `event` itself), or null
   */
  unshift(event: PendingEvent): PendingEvent | null {
    this.entries.unshift(event);
    return this.entries.length > this.capacity ? (this.entries.shift() ?? null) : null;
  }

  shift(): PendingEvent | undefined {
    return this.entries.shift();
  }

  peek(): PendingEvent | undefined {
    return this.entries[0];
  }

  toArray(): PendingEvent[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }
}
