/**
 * Unbounded FIFO with a single waiting consumer.
 *
 * `push` never blocks. `take` resolves with the next item, or with undefined
 * once `timeoutMs` passes or the queue is closed.
 */
export class EventQueue<T> {
  private items: T[] = [];
  private waiting: ((item: T | undefined) => void) | null = null;
  private timer: NodeJS.Timeout | null = null;
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** False when the queue is closed and the item was not taken. */
  push(item: T): boolean {
    if (this.closed) return false;
    if (this.waiting) this.settle(item);
    else this.items.push(item);
    return true;
  }

  take(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length) return Promise.resolve(this.items.shift());
    if (this.closed) return Promise.resolve(undefined);
    if (this.waiting) return Promise.reject(new Error('EventQueue supports a single consumer'));

    return new Promise((resolve) => {
      this.waiting = resolve;
      this.timer = setTimeout(() => this.settle(undefined), timeoutMs);
    });
  }

  /** Wake the consumer and refuse further items. Queued items are dropped. */
  close(): void {
    this.closed = true;
    this.items = [];
    if (this.waiting) this.settle(undefined);
  }

  private settle(item: T | undefined): void {
    const resolve = this.waiting;
    this.waiting = null;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    resolve?.(item);
  }
}
