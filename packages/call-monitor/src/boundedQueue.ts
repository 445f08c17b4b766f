import { QueueEmptyError } from './errors';

interface PendingGet<T> {
  resolve: (item: T) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * @hebrew תור FIFO חסום בגודל. משמש להעברת אירועים ממשימת ההאזנה לצרכן.
 * maxSize קטן או שווה ל-0 פירושו תור ללא הגבלה.
 */
export class BoundedQueue<T> {
  readonly maxSize: number;
  private readonly items: T[] = [];
  private readonly pendingGets: PendingGet<T>[] = [];
  private readonly pendingPuts: Array<() => void> = [];

  constructor(maxSize: number = 0) {
    this.maxSize = maxSize;
  }

  get size(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  get isFull(): boolean {
    return this.maxSize > 0 && this.items.length >= this.maxSize;
  }

  /**
   * @hebrew מוסיף פריט בלי להמתין.
   * @returns false כאשר התור מלא והפריט לא נוסף.
   */
  tryPut(item: T): boolean {
    const waiting = this.pendingGets.shift();
    if (waiting) {
      if (waiting.timer) clearTimeout(waiting.timer);
      waiting.resolve(item);
      return true;
    }
    if (this.isFull) {
      return false;
    }
    this.items.push(item);
    return true;
  }

  /**
   * @hebrew מוסיף פריט וממתין עד שמתפנה מקום.
   * @param signal - ביטול ההמתנה.
   * @returns false אם ההמתנה בוטלה לפני שהפריט נוסף.
   */
  async put(item: T, signal?: AbortSignal): Promise<boolean> {
    while (!this.tryPut(item)) {
      if (signal?.aborted) {
        return false;
      }
      await new Promise<void>(resolve => {
        const wake = () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        };
        const onAbort = () => {
          const index = this.pendingPuts.indexOf(wake);
          if (index >= 0) this.pendingPuts.splice(index, 1);
          resolve();
        };
        this.pendingPuts.push(wake);
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    }
    return true;
  }

  /**
   * @hebrew מוציא את הפריט הראשון בלי להמתין.
   * @throws QueueEmptyError כאשר התור ריק.
   */
  getNowait(): T {
    if (this.items.length === 0) {
      throw new QueueEmptyError();
    }
    const item = this.items[0];
    this.items.splice(0, 1);
    this.pendingPuts.shift()?.();
    return item;
  }

  /**
   * @hebrew מוציא את הפריט הראשון, וממתין לפריט אם התור ריק.
   * @param timeoutMs - זמן המתנה מרבי; ללא ערך ממתין ללא הגבלה.
   * @throws QueueEmptyError כאשר פג זמן ההמתנה.
   */
  get(timeoutMs?: number): Promise<T> {
    if (this.items.length > 0) {
      return Promise.resolve(this.getNowait());
    }
    return new Promise<T>((resolve, reject) => {
      const pending: PendingGet<T> = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        pending.timer = setTimeout(() => {
          const index = this.pendingGets.indexOf(pending);
          if (index >= 0) this.pendingGets.splice(index, 1);
          reject(new QueueEmptyError(`No item within ${timeoutMs}ms`));
        }, timeoutMs);
      }
      this.pendingGets.push(pending);
    });
  }
}
