/**
 * Unbounded FIFO queue of pending work.
 *
 * Every method is synchronous. Workers are async functions sharing one
 * event loop, so a `tryTake()` call always completes before another worker
 * resumes: no item is handed out twice and none is lost, without locks.
 */
export class TaskQueue<T> {
  private items: T[] = [];
  private head = 0;

  /**
   * Append an item. Never blocks.
   */
  put(item: T): void {
    this.items.push(item);
  }

  /**
   * Remove and return the oldest item, or undefined when the queue is empty.
   */
  tryTake(): T | undefined {
    if (this.head >= this.items.length) {
      return undefined;
    }

    const item = this.items[this.head];
    this.head++;

    // Drop consumed slots once the queue has been drained past halfway
    const shouldCompact = this.head > 1024 && this.head * 2 >= this.items.length;
    if (shouldCompact) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }

    return item;
  }

  get size(): number {
    return this.items.length - this.head;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }
}
