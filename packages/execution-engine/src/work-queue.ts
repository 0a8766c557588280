export interface QueueItem {
  orderId: string;
  confidence: number;
}

/**
 * Bounded in-process queue shared by all workers.
 *
 * FIFO by default; with `prioritizeByConfidence` the highest-confidence
 * item goes first and ties keep arrival order. `take` parks the caller
 * until an item arrives or the queue closes.
 */
export class WorkQueue {
  private items: QueueItem[] = [];
  private waiters: Array<(item: QueueItem | null) => void> = [];
  private closed = false;

  constructor(
    private capacity: number,
    private prioritizeByConfidence = false,
  ) {}

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  hasRoom(reserved = 0): boolean {
    return this.items.length + reserved < this.capacity;
  }

  /** Returns false when full or closed */
  offer(item: QueueItem): boolean {
    if (this.closed || !this.hasRoom()) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return true;
    }

    if (!this.prioritizeByConfidence) {
      this.items.push(item);
      return true;
    }

    let i = this.items.length;
    while (i > 0 && this.items[i - 1].confidence < item.confidence) i--;
    this.items.splice(i, 0, item);
    return true;
  }

  /** Next item, or null once the queue is closed */
  take(): Promise<QueueItem | null> {
    if (this.closed) return Promise.resolve(null);

    const item = this.items.shift();
    if (item) return Promise.resolve(item);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  /** Stop handing out work; parked takers get null. Items stay for inspection. */
  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter(null);
  }

  /** Reopen after close, dropping anything left behind */
  reset(): void {
    this.closed = false;
    this.items = [];
  }

  ids(): string[] {
    return this.items.map((e) => e.orderId);
  }
}
