import type { OrderSide, OrderSnapshot, OrderStatus } from '@ladderbook/types';

/**
 * Mutable order as stored by a book. Identity, side, price and time key never change;
 * only the matcher and cancellation touch remainingQuantity and status.
 */
export class BookOrder {
  status: OrderStatus = 'open';
  remainingQuantity: number;

  constructor(
    readonly id: number,
    readonly side: OrderSide,
    readonly price: number,
    readonly originalQuantity: number,
    readonly timestamp: number,
    readonly sequence: number
  ) {
    this.remainingQuantity = originalQuantity;
  }

  /**
   * Quantity taken by matches. Cancellation leaves remainingQuantity as it was,
   * so this stays correct for cancelled orders too.
   */
  get filledQuantity(): number {
    return this.originalQuantity - this.remainingQuantity;
  }

  isActive(): boolean {
    return this.status === 'open' || this.status === 'partial';
  }

  toSnapshot(): OrderSnapshot {
    return {
      id: this.id,
      side: this.side,
      price: this.price,
      originalQuantity: this.originalQuantity,
      remainingQuantity: this.remainingQuantity,
      filledQuantity: this.filledQuantity,
      timestamp: this.timestamp,
      sequence: this.sequence,
      status: this.status,
    };
  }
}

/**
 * Time priority: earlier timestamp first, then earlier insertion
 */
export function compareTime(a: BookOrder, b: BookOrder): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp < b.timestamp ? -1 : 1;
  }
  return a.sequence - b.sequence;
}

/**
 * Negative when price a ranks ahead of price b on the given side
 */
export function comparePrice(side: OrderSide, a: number, b: number): number {
  if (a === b) return 0;
  if (side === 'BUY') {
    return a > b ? -1 : 1;
  }
  return a < b ? -1 : 1;
}

/**
 * Full price-time priority. Negative when a matches before b.
 */
export function comparePriority(a: BookOrder, b: BookOrder): number {
  return comparePrice(a.side, a.price, b.price) || compareTime(a, b);
}
