import type {
  DepthSnapshot,
  Match,
  OrderInput,
  OrderSide,
  OrderSideInput,
  OrderSnapshot,
  TopOfBook,
} from '@ladderbook/types';
import {
  NewOrderSchema,
  LoadOrdersSchema,
  OrderBookConfigSchema,
  NO_PRICE,
  createLogger,
} from '@ladderbook/utils';
import type { Logger, OrderBookConfig, OrderBookConfigInput } from '@ladderbook/utils';
import { BookLadder } from './ladder';
import { BookOrder, comparePriority } from './order';
import { Matcher } from './matcher';
import { InvariantGuard } from './invariants';
import { aggregateDepth } from './depth';
import { CapacityExceededError, DuplicateOrderIdError, InvalidOrderError } from './errors';

export interface OrderBookOptions extends OrderBookConfigInput {
  logger?: Logger;
}

interface BookState {
  bids: BookLadder;
  asks: BookLadder;
  /** Every order seen this session, terminal ones included, by id */
  orders: Map<number, BookOrder>;
  nextSequence: number;
}

interface ValidOrder {
  id: number;
  side: OrderSide;
  price: number;
  quantity: number;
  timestamp: number;
}

const defaultLogger = createLogger({ service: 'orderbook' });

function createState(): BookState {
  return {
    bids: new BookLadder('BUY'),
    asks: new BookLadder('SELL'),
    orders: new Map(),
    nextSequence: 0,
  };
}

/**
 * In-memory limit order book for a single market.
 *
 * Orders rest in two ladders in price-time priority. Adding never trades;
 * crossed interest is resolved only when matchOrders() is called, so a batch
 * of inserts followed by one matching pass is a normal way to drive it.
 * Every call is synchronous and instances share no state.
 */
export class OrderBook {
  readonly config: OrderBookConfig;

  private state: BookState = createState();
  private readonly logger: Logger;
  private readonly guard: InvariantGuard;
  private readonly matcher: Matcher;

  constructor(options: OrderBookOptions = {}) {
    const { logger, ...config } = options;
    this.config = OrderBookConfigSchema.parse(config);
    this.logger = logger ?? defaultLogger;
    this.guard = new InvariantGuard(this.config.invariantMode, this.logger);
    this.matcher = new Matcher(
      {
        priceConvention: this.config.priceConvention,
        quantityEpsilon: this.config.quantityEpsilon,
      },
      this.guard
    );
  }

  // ============================================
  // Order Management
  // ============================================

  /**
   * Rest a new order on its side of the book.
   *
   * @throws InvalidOrderError when price or quantity is not positive, or id/side/timestamp is malformed
   * @throws DuplicateOrderIdError when the id was already used this session
   * @throws CapacityExceededError when the side is full
   */
  addOrder(
    id: number,
    side: OrderSideInput,
    price: number,
    quantity: number,
    timestamp: number
  ): OrderSnapshot {
    const parsed = NewOrderSchema.safeParse({ id, side, price, quantity, timestamp });
    if (!parsed.success) {
      throw new InvalidOrderError(parsed.error.issues);
    }

    const order = this.insert(this.state, parsed.data);
    this.logger.debug(
      { orderId: order.id, side: order.side, price: order.price, quantity: order.originalQuantity },
      'Order added'
    );
    return order.toSnapshot();
  }

  /**
   * Replace the whole book with the given orders, applied in sequence.
   * Entries without a timestamp use their position in the input.
   * All or nothing: on any error the previous book is left as it was.
   *
   * @returns number of orders loaded
   */
  loadOrders(orders: readonly OrderInput[]): number {
    const parsed = LoadOrdersSchema.safeParse(orders);
    if (!parsed.success) {
      throw new InvalidOrderError(parsed.error.issues);
    }

    const staging = createState();
    parsed.data.forEach((input, index) => {
      this.insert(staging, { ...input, timestamp: input.timestamp ?? index });
    });

    this.state = staging;
    this.logger.debug(
      { orderCount: parsed.data.length, bidCount: staging.bids.size, askCount: staging.asks.size },
      'Orders loaded'
    );
    return parsed.data.length;
  }

  /**
   * Cancel an active order. Returns false, without side effects, when the id is
   * unknown or the order is already filled or cancelled.
   */
  cancelOrder(id: number): boolean {
    const order = this.state.orders.get(id);
    if (!order || !order.isActive()) {
      return false;
    }

    const removed = this.ladderFor(order.side).remove(order);
    this.guard.check(removed, 'Active order missing from its ladder', { orderId: id });
    order.status = 'cancelled';

    this.logger.debug({ orderId: id, remaining: order.remainingQuantity }, 'Order cancelled');
    return true;
  }

  /**
   * Drop every order and forget every id
   */
  clear(): void {
    this.state = createState();
  }

  // ============================================
  // Matching
  // ============================================

  /**
   * Trade away all crossed interest. Returns the matches in execution order.
   */
  matchOrders(): Match[] {
    const matches = this.matcher.run(this.state.bids, this.state.asks);

    const bestBid = this.bestBidPrice();
    const bestAsk = this.bestAskPrice();
    this.guard.check(
      bestBid === NO_PRICE || bestAsk === NO_PRICE || bestBid < bestAsk,
      'Book still crossed after matching',
      { bestBid, bestAsk }
    );

    if (matches.length > 0) {
      this.logger.debug(
        { matchCount: matches.length, bidCount: this.bidCount(), askCount: this.askCount() },
        'Matching pass complete'
      );
    }
    return matches;
  }

  // ============================================
  // Queries
  // ============================================

  getDepth(levels: number): DepthSnapshot {
    return {
      bids: aggregateDepth(this.state.bids, levels),
      asks: aggregateDepth(this.state.asks, levels),
    };
  }

  bestBidPrice(): number {
    return this.state.bids.bestPrice() ?? NO_PRICE;
  }

  bestAskPrice(): number {
    return this.state.asks.bestPrice() ?? NO_PRICE;
  }

  spread(): number {
    const bid = this.state.bids.bestPrice();
    const ask = this.state.asks.bestPrice();
    if (bid === undefined || ask === undefined) return NO_PRICE;
    return ask - bid;
  }

  midPrice(): number {
    const bid = this.state.bids.bestPrice();
    const ask = this.state.asks.bestPrice();
    if (bid === undefined || ask === undefined) return NO_PRICE;
    return (bid + ask) / 2;
  }

  bidCount(): number {
    return this.state.bids.size;
  }

  askCount(): number {
    return this.state.asks.size;
  }

  getTopOfBook(): TopOfBook {
    return {
      bestBid: this.bestBidPrice(),
      bestAsk: this.bestAskPrice(),
      spread: this.spread(),
      midPrice: this.midPrice(),
      bidCount: this.bidCount(),
      askCount: this.askCount(),
    };
  }

  /**
   * Look up any order seen this session, including filled and cancelled ones
   */
  getOrder(id: number): OrderSnapshot | undefined {
    return this.state.orders.get(id)?.toSnapshot();
  }

  /**
   * Active orders on one side, in priority order
   */
  getOrders(side: OrderSide): OrderSnapshot[] {
    return Array.from(this.ladderFor(side).orders(), order => order.toSnapshot());
  }

  /**
   * Walk the whole book and describe every broken invariant found.
   * An empty list means the book is consistent.
   */
  checkIntegrity(): string[] {
    const problems: string[] = [];
    let active = 0;

    for (const ladder of [this.state.bids, this.state.asks]) {
      let previous: BookOrder | undefined;
      let seen = 0;

      for (const order of ladder.orders()) {
        seen++;
        if (order.side !== ladder.side) {
          problems.push(`order ${order.id} is on the ${ladder.side} ladder but is a ${order.side} order`);
        }
        if (!order.isActive()) {
          problems.push(`order ${order.id} is ${order.status} but still on the ${ladder.side} ladder`);
        }
        if (!(order.remainingQuantity > 0)) {
          problems.push(`order ${order.id} rests with remaining quantity ${order.remainingQuantity}`);
        }
        if (this.state.orders.get(order.id) !== order) {
          problems.push(`order ${order.id} is on the ${ladder.side} ladder but not indexed`);
        }
        if (previous && comparePriority(previous, order) > 0) {
          problems.push(`order ${order.id} is ahead of its priority on the ${ladder.side} ladder`);
        }
        previous = order;
      }

      if (seen !== ladder.size) {
        problems.push(`${ladder.side} ladder counts ${ladder.size} orders but holds ${seen}`);
      }
    }

    for (const order of this.state.orders.values()) {
      if (order.isActive()) active++;
    }
    if (active !== this.bidCount() + this.askCount()) {
      problems.push(`index holds ${active} active orders but the ladders hold ${this.bidCount() + this.askCount()}`);
    }

    return problems;
  }

  // ============================================
  // Private Helpers
  // ============================================

  private ladderFor(side: OrderSide, state: BookState = this.state): BookLadder {
    return side === 'BUY' ? state.bids : state.asks;
  }

  private insert(state: BookState, input: ValidOrder): BookOrder {
    if (state.orders.has(input.id)) {
      throw new DuplicateOrderIdError(input.id);
    }

    const ladder = this.ladderFor(input.side, state);
    if (ladder.size >= this.config.maxOrdersPerSide) {
      throw new CapacityExceededError(input.side, this.config.maxOrdersPerSide);
    }

    const order = new BookOrder(
      input.id,
      input.side,
      input.price,
      input.quantity,
      input.timestamp,
      state.nextSequence++
    );
    ladder.insert(order);
    state.orders.set(order.id, order);
    return order;
  }
}
