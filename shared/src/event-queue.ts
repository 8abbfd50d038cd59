/**
 * Serial Event Queue
 *
 * Single-consumer FIFO. Capture callbacks push; one drain loop hands items
 * to the consumer strictly in push order. A push made while draining (for
 * example from inside the consumer) is appended, never handled recursively.
 */

import { errorMessage } from './errors';
import { LogCallback, silentLog } from './logging';

export type QueueConsumer<T> = (item: T) => void;

export class SerialEventQueue<T> {
  private items: T[] = [];
  private draining = false;
  private consumer: QueueConsumer<T>;
  private log: LogCallback;

  constructor(consumer: QueueConsumer<T>, onLog: LogCallback = silentLog) {
    this.consumer = consumer;
    this.log = onLog;
  }

  /**
   * Enqueue an item and drain unless a drain is already running
   */
  push(item: T): void {
    this.items.push(item);
    if (this.draining) {
      return;
    }
    this.drain();
  }

  /**
   * Items waiting to be consumed
   */
  size(): number {
    return this.items.length;
  }

  private drain(): void {
    this.draining = true;
    try {
      let item = this.items.shift();
      while (item !== undefined) {
        try {
          this.consumer(item);
        } catch (error) {
          this.log('error', `Event handler failed: ${errorMessage(error)}`);
        }
        item = this.items.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
