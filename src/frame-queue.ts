/**
 * Bounded per-connection FIFO of raw inbound messages.
 * Uses a circular buffer for O(1) enqueue/dequeue regardless of queue state.
 *
 * A full queue refuses new messages instead of evicting old ones, so the
 * frames that are accepted are always processed in arrival order.
 */

export class FrameQueue<T> {
  private buffer: Array<{ payload: T } | null>;
  private head: number; // index of the oldest element
  private tail: number; // index of the next write position
  private count: number;
  private readonly maxSize: number;
  private rejected: number;

  constructor(maxSize: number = 64) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new Error(`FrameQueue size must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
    this.buffer = new Array<{ payload: T } | null>(maxSize).fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    this.rejected = 0;
  }

  /** Append a message. Returns false, and counts the rejection, when the queue is full. */
  enqueue(payload: T): boolean {
    if (this.count === this.maxSize) {
      this.rejected++;
      return false;
    }
    this.buffer[this.tail] = { payload };
    this.tail = (this.tail + 1) % this.maxSize;
    this.count++;
    return true;
  }

  /** Dequeue the next message (FIFO), or null if empty. */
  dequeue(): T | null {
    if (this.count === 0) {
      return null;
    }
    const slot = this.buffer[this.head];
    this.buffer[this.head] = null;
    this.head = (this.head + 1) % this.maxSize;
    this.count--;
    return slot ? slot.payload : null;
  }

  /** The most recently accepted message still queued, or null if empty. */
  peekLast(): T | null {
    if (this.count === 0) {
      return null;
    }
    const slot = this.buffer[(this.tail - 1 + this.maxSize) % this.maxSize];
    return slot ? slot.payload : null;
  }

  get framesRejected(): number {
    return this.rejected;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.maxSize;
  }

  /** Drop every queued message. Returns how many were dropped. */
  clear(): number {
    const dropped = this.count;
    this.buffer.fill(null);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    return dropped;
  }
}
