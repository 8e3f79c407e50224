/**
 * Mailbox - single-consumer message queue for the scheduler loop
 *
 * Producers `send` and get a promise that settles once the consumer has
 * taken the message. The consumer waits with `ready()` and removes messages
 * with `take()`, so a message is never consumed by a wait that lost a race.
 */

interface Delivery<T> {
  message: T;
  delivered: () => void;
}

export class Mailbox<T> {
  private readonly queue: Array<Delivery<T>> = [];
  private signal: Promise<void> | null = null;
  private notify: (() => void) | null = null;

  /**
   * Queue a message. Resolves when the consumer takes it.
   */
  send(message: T): Promise<void> {
    return new Promise<void>((resolve) => {
      this.queue.push({ message, delivered: resolve });
      if (this.notify) {
        const notify = this.notify;
        this.notify = null;
        this.signal = null;
        notify();
      }
    });
  }

  /**
   * Resolves once at least one message is waiting.
   */
  ready(): Promise<void> {
    if (this.queue.length > 0) return Promise.resolve();
    if (!this.signal) {
      this.signal = new Promise<void>((resolve) => {
        this.notify = resolve;
      });
    }
    return this.signal;
  }

  /**
   * Drop the pending `ready()` promise after a wait that lost its race, so
   * reactions from abandoned waits are not kept alive. The next `ready()`
   * hands out a fresh promise.
   */
  cancelWait(): void {
    this.signal = null;
    this.notify = null;
  }

  /**
   * Remove the oldest message, if any.
   */
  take(): T | undefined {
    const delivery = this.queue.shift();
    if (!delivery) return undefined;
    delivery.delivered();
    return delivery.message;
  }

  get size(): number {
    return this.queue.length;
  }
}

/**
 * Counts in-flight work and lets callers wait for it to drain.
 */
export class JobWaiter {
  private active = 0;
  private waiters: Array<() => void> = [];

  add(): void {
    this.active += 1;
  }

  done(): void {
    this.active = Math.max(0, this.active - 1);
    if (this.active === 0) {
      const waiters = this.waiters;
      this.waiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  /**
   * Resolves when no work is in flight.
   */
  wait(): Promise<void> {
    if (this.active === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  get inFlight(): number {
    return this.active;
  }
}
