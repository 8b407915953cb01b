import type { TopOfBook } from '@ladderbook/types';
import { OrderBook } from '@ladderbook/orderbook';
import type { OrderBookOptions } from '@ladderbook/orderbook';
import { createChildLogger, createLogger } from '@ladderbook/utils';
import type { Logger, OrderBookConfigInput } from '@ladderbook/utils';

export class UnknownMarketError extends Error {
  constructor(public readonly symbol: string) {
    super(`No order book for market '${symbol}'`);
    this.name = 'UnknownMarketError';
  }
}

/**
 * Owns one independent order book per market symbol.
 * Books never see each other's orders; there is no cross-market netting.
 */
export class MarketEngine {
  private orderBooks: Map<string, OrderBook> = new Map();
  private readonly logger: Logger;

  constructor(
    private readonly bookConfig: OrderBookConfigInput = {},
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ service: 'engine' });
  }

  /**
   * Create order books for symbols that do not have one yet
   */
  initialize(symbols: string[]): void {
    for (const symbol of symbols) {
      this.addMarket(symbol);
    }
  }

  /**
   * Open a market, or return its book if it is already open
   */
  addMarket(symbol: string): OrderBook {
    const existing = this.orderBooks.get(symbol);
    if (existing) {
      return existing;
    }

    const options: OrderBookOptions = {
      ...this.bookConfig,
      logger: createChildLogger(this.logger, { symbol }),
    };
    const book = new OrderBook(options);
    this.orderBooks.set(symbol, book);
    this.logger.debug({ symbol }, 'Market opened');
    return book;
  }

  getOrderBook(symbol: string): OrderBook | undefined {
    return this.orderBooks.get(symbol);
  }

  /**
   * @throws UnknownMarketError when the market was never opened
   */
  requireOrderBook(symbol: string): OrderBook {
    const book = this.orderBooks.get(symbol);
    if (!book) {
      throw new UnknownMarketError(symbol);
    }
    return book;
  }

  removeMarket(symbol: string): boolean {
    return this.orderBooks.delete(symbol);
  }

  getSymbols(): string[] {
    return Array.from(this.orderBooks.keys());
  }

  getTopOfBook(symbol: string): TopOfBook | undefined {
    return this.orderBooks.get(symbol)?.getTopOfBook();
  }

  /**
   * Clear all order books (for reset)
   */
  clearAll(): void {
    for (const book of this.orderBooks.values()) {
      book.clear();
    }
  }
}
