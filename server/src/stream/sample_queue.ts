import type { TelemetrySample } from '../telemetry/types.js';

export const DEFAULT_QUEUE_CAPACITY = 100;

type Waiter = {
  resolve: (sample: TelemetrySample | null) => void;
  timer: NodeJS.Timeout | null;
};

/**
 * Bounded hand-off between the device readers and the single consumer.
 * When full, the oldest undelivered sample is dropped so readers never block.
 */
export class SampleQueue {
  private readonly items: TelemetrySample[] = [];
  private readonly waiters: Waiter[] = [];
  private droppedCount = 0;
  readonly capacity: number;

  constructor(capacity = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Queue capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.items.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  push(sample: TelemetrySample) {
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(sample);
      return;
    }
    if (this.items.length >= this.capacity) {
      this.items.shift();
      this.droppedCount += 1;
    }
    this.items.push(sample);
  }

  /** Removes and returns everything queued, oldest first. */
  drain(): TelemetrySample[] {
    return this.items.splice(0, this.items.length);
  }

  /**
   * Resolves with the next sample, or null once `timeoutMs` passes or
   * `cancelWaiters()` is called.
   */
  next(timeoutMs?: number): Promise<TelemetrySample | null> {
    const head = this.items.shift();
    if (head) return Promise.resolve(head);

    return new Promise((resolve) => {
      const waiter: Waiter = { resolve, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          resolve(null);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  cancelWaiters() {
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(null);
    }
  }

  clear() {
    this.items.length = 0;
  }
}
