import { createNullLogger, type ModuleLogger } from 'tr064-core';
import type { BoundedQueue } from './boundedQueue';

export interface EventReporterOptions {
  // true: ממתינים למקום בתור; false: אירוע שאין לו מקום נזרק
  blockOnFilledQueue?: boolean;
  signal?: AbortSignal;
  logger?: ModuleLogger;
}

/**
 * @hebrew חוצץ לנתונים מופרדי שורות. כל שורה שלמה (ללא תו השורה החדשה) נכנסת לתור
 * לפי סדר ההגעה, והשארית החלקית נשמרת לקריאה הבאה.
 */
export class EventReporter {
  private buffer = '';
  private readonly queue: BoundedQueue<string>;
  private readonly blockOnFilledQueue: boolean;
  private readonly signal?: AbortSignal;
  private readonly logger: ModuleLogger;

  constructor(queue: BoundedQueue<string>, options: EventReporterOptions = {}) {
    this.queue = queue;
    this.blockOnFilledQueue = options.blockOnFilledQueue ?? false;
    this.signal = options.signal;
    this.logger = options.logger ?? createNullLogger();
  }

  /** השארית שטרם הושלמה לשורה. */
  get pending(): string {
    return this.buffer;
  }

  /**
   * @hebrew מוחק את השארית החלקית, למשל כשהחיבור שממנו הגיעה נסגר.
   * @returns השארית שנמחקה.
   */
  reset(): string {
    const discarded = this.buffer;
    this.buffer = '';
    return discarded;
  }

  async add(data: string): Promise<void> {
    this.buffer += data;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';
    for (const line of lines) {
      if (this.blockOnFilledQueue) {
        if (!(await this.queue.put(line, this.signal))) {
          return;
        }
      } else if (!this.queue.tryPut(line)) {
        this.logger.debug(`[EventReporter] queue full, dropping event: ${line}`);
      }
    }
  }
}
