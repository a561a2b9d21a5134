import type { Decimal } from "../utils/decimal.js";

interface Waiter {
  resolve: (price: Decimal) => void;
  reject: (error: Error) => void;
}

/**
 * Hand-off between a push-based socket and the pull-based tick loop.
 *
 * Holds only the newest unconsumed price: ticks that arrive while nobody is
 * waiting overwrite each other.
 */
export class TickBuffer {
  private latest: Decimal | null = null;
  private waiters: Waiter[] = [];
  private closedWith: Error | null = null;

  push(price: Decimal): void {
    if (this.closedWith) return;
    if (this.waiters.length > 0) {
      const waiters = this.waiters;
      this.waiters = [];
      for (const waiter of waiters) waiter.resolve(price);
      return;
    }
    this.latest = price;
  }

  next(): Promise<Decimal> {
    if (this.latest) {
      const price = this.latest;
      this.latest = null;
      return Promise.resolve(price);
    }
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Fail current and future waiters. An unconsumed price is still handed out first.
   */
  close(error: Error): void {
    if (this.closedWith) return;
    this.closedWith = error;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter.reject(error);
  }

  /** Allow pushes again after a reconnect */
  reopen(): void {
    this.closedWith = null;
  }

  get hasPending(): boolean {
    return this.latest !== null;
  }

  get closed(): boolean {
    return this.closedWith !== null;
  }
}
