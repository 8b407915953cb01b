import type { OrderSide } from '@ladderbook/types';
import { BookOrder, compareTime, comparePrice } from './order';

/**
 * All active orders at one price, in time priority
 */
export class PriceLevel {
  readonly orders: BookOrder[] = [];

  constructor(readonly price: number) {}

  get size(): number {
    return this.orders.length;
  }

  get front(): BookOrder | undefined {
    return this.orders[0];
  }

  /**
   * Insert after every order with an equal or earlier time key
   */
  insert(order: BookOrder): void {
    let lo = 0;
    let hi = this.orders.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareTime(this.orders[mid], order) <= 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    this.orders.splice(lo, 0, order);
  }

  remove(order: BookOrder): boolean {
    let lo = 0;
    let hi = this.orders.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareTime(this.orders[mid], order) < 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    if (lo < this.orders.length && this.orders[lo] === order) {
      this.orders.splice(lo, 1);
      return true;
    }
    return false;
  }

  totalQuantity(): number {
    let total = 0;
    for (const order of this.orders) {
      total += order.remainingQuantity;
    }
    return total;
  }
}

/**
 * One side of the book.
 *
 * Price levels live in a map for direct lookup, and their prices in an array
 * kept in priority order (bids high to low, asks low to high) by binary insertion.
 * Finding the best order, inserting and cancelling are all binary searches.
 */
export class BookLadder {
  private levels: Map<number, PriceLevel> = new Map();
  private prices: number[] = [];
  private count = 0;

  constructor(readonly side: OrderSide) {}

  /** Number of active orders */
  get size(): number {
    return this.count;
  }

  get levelCount(): number {
    return this.prices.length;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  insert(order: BookOrder): void {
    let level = this.levels.get(order.price);
    if (!level) {
      level = new PriceLevel(order.price);
      this.levels.set(order.price, level);
      this.prices.splice(this.findPriceSlot(order.price), 0, order.price);
    }
    level.insert(order);
    this.count++;
  }

  remove(order: BookOrder): boolean {
    const level = this.levels.get(order.price);
    if (!level || !level.remove(order)) {
      return false;
    }
    this.count--;

    if (level.size === 0) {
      this.levels.delete(order.price);
      this.prices.splice(this.findPriceSlot(order.price), 1);
    }
    return true;
  }

  best(): BookOrder | undefined {
    if (this.prices.length === 0) return undefined;
    return this.levels.get(this.prices[0])?.front;
  }

  bestPrice(): number | undefined {
    return this.prices.length > 0 ? this.prices[0] : undefined;
  }

  *levelsInOrder(): IterableIterator<PriceLevel> {
    for (const price of this.prices) {
      const level = this.levels.get(price);
      if (level) yield level;
    }
  }

  *orders(): IterableIterator<BookOrder> {
    for (const level of this.levelsInOrder()) {
      yield* level.orders;
    }
  }

  clear(): void {
    this.levels.clear();
    this.prices = [];
    this.count = 0;
  }

  /**
   * Index of the first price that does not rank ahead of the given one
   */
  private findPriceSlot(price: number): number {
    let lo = 0;
    let hi = this.prices.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (comparePrice(this.side, this.prices[mid], price) < 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
