import type { InputEvent } from '../types.js';

type Waiter = {
  resolve: (event: InputEvent | null) => void;
  timer: ReturnType<typeof setTimeout> | null;
};

/**
 * FIFO of input events with a single awaiting reader.
 */
export class EventQueue {
  private readonly events: InputEvent[] = [];
  private waiter: Waiter | null = null;

  push(event: InputEvent): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(event);
      return;
    }
    this.events.push(event);
  }

  get size(): number {
    return this.events.length;
  }

  next(timeoutMs: number | null): Promise<InputEvent | null> {
    const queued = this.events.shift();
    if (queued) return Promise.resolve(queued);
    if (timeoutMs !== null && timeoutMs <= 0) return Promise.resolve(null);
    // A previous reader that is still waiting gets released empty-handed
    this.release();
    return new Promise(resolve => {
      const waiter: Waiter = { resolve, timer: null };
      if (timeoutMs !== null) {
        waiter.timer = setTimeout(() => {
          if (this.waiter === waiter) this.waiter = null;
          resolve(null);
        }, timeoutMs);
      }
      this.waiter = waiter;
    });
  }

  /** Resolve any pending reader with null. */
  release(): void {
    const waiter = this.waiter;
    if (!waiter) return;
    this.waiter = null;
    if (waiter.timer) clearTimeout(waiter.timer);
    waiter.resolve(null);
  }

  clear(): void {
    this.events.length = 0;
    this.release();
  }
}
