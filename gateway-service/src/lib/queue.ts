import { QueueFullError } from './errors.js';

/**
 * 單一消費者的 FIFO 工作佇列。
 * push 永不阻塞；take 在佇列為空時掛起，close 之後回傳 null。
 * capacity 為 0 時不限長度。
 */
export class WorkQueue<T> {
  private items: T[] = [];
  private waiters: Array<(item: T | null) => void> = [];
  private closed = false;

  constructor(private readonly maxSize = 0) {}

  get size(): number {
    return this.items.length;
  }

  get capacity(): number | null {
    return this.maxSize > 0 ? this.maxSize : null;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** 佇列是否還能再收一筆 */
  hasRoom(): boolean {
    return this.maxSize === 0 || this.items.length < this.maxSize;
  }

  push(item: T): void {
    if (this.closed) {
      throw new Error('[Queue] Cannot push to a closed queue');
    }

    // 有消費者在等就直接交付，不經過 items
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }

    if (!this.hasRoom()) {
      throw new QueueFullError(this.maxSize);
    }
    this.items.push(item);
  }

  take(): Promise<T | null> {
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** 關閉佇列並喚醒所有等待中的消費者；尚未取出的項目仍可被 take 取完 */
  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }
}
