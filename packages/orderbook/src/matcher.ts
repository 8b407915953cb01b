import type { Match, PriceConvention } from '@ladderbook/types';
import type { BookLadder } from './ladder';
import type { InvariantGuard } from './invariants';
import type { BookOrder } from './order';

export interface MatcherConfig {
  priceConvention: PriceConvention;
  /** Remainders at or below this fraction of the original quantity are treated as fully filled */
  quantityEpsilon: number;
}

/**
 * Resolves a crossed book into trades by price-time priority.
 *
 * Each pass takes the front bid and front ask, trades the smaller remaining quantity
 * between them, and retires whichever is exhausted. The order with the earlier timestamp
 * is the maker, the bid on a tie: it sets the price under the default convention and
 * the other order's timestamp is stamped on the match. Insertion sequence only orders
 * orders within one side. Every iteration retires at least one order, so a
 * pass ends after at most bids.size + asks.size iterations.
 */
export class Matcher {
  constructor(
    private readonly config: MatcherConfig,
    private readonly guard: InvariantGuard
  ) {}

  run(bids: BookLadder, asks: BookLadder): Match[] {
    const matches: Match[] = [];
    const maxIterations = bids.size + asks.size;
    let iterations = 0;

    for (;;) {
      const bid = bids.best();
      const ask = asks.best();
      if (!bid || !ask || bid.price < ask.price) {
        break;
      }

      if (!this.guard.check(iterations < maxIterations, 'Matching pass exceeded its iteration bound', {
        iterations,
        maxIterations,
      })) {
        break;
      }
      iterations++;

      const bidIsMaker = bid.timestamp <= ask.timestamp;
      const maker = bidIsMaker ? bid : ask;
      const taker = bidIsMaker ? ask : bid;
      const quantity = Math.min(bid.remainingQuantity, ask.remainingQuantity);

      matches.push({
        buyOrderId: bid.id,
        sellOrderId: ask.id,
        price: this.executionPrice(maker, taker),
        quantity,
        timestamp: taker.timestamp,
        takerSide: taker.side,
      });

      this.fill(bid, quantity, bids);
      this.fill(ask, quantity, asks);
    }

    return matches;
  }

  private executionPrice(maker: BookOrder, taker: BookOrder): number {
    switch (this.config.priceConvention) {
      case 'maker':
        return maker.price;
      case 'taker':
        return taker.price;
      case 'midpoint':
        return (maker.price + taker.price) / 2;
    }
  }

  private fill(order: BookOrder, quantity: number, ladder: BookLadder): void {
    let remaining = order.remainingQuantity - quantity;

    if (!this.guard.check(remaining >= 0, 'Remaining quantity went negative', {
      orderId: order.id,
      remaining,
    })) {
      remaining = 0;
    }

    if (remaining <= this.config.quantityEpsilon * order.originalQuantity) {
      order.remainingQuantity = 0;
      order.status = 'filled';
      const removed = ladder.remove(order);
      this.guard.check(removed, 'Filled order was not at its ladder position', { orderId: order.id });
      return;
    }

    order.remainingQuantity = remaining;
    order.status = 'partial';
  }
}
