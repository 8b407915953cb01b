/**
 * Order book exports
 *
 * - OrderBook: single-market book with price-time priority matching
 * - BookLadder: one side of the book, ordered by price then time
 * - Matcher: resolves a crossed book into trades
 * - aggregateDepth: per-price-level depth with running totals
 */

export { OrderBook } from './order-book';
export type { OrderBookOptions } from './order-book';
export { BookLadder, PriceLevel } from './ladder';
export { BookOrder, compareTime, comparePrice, comparePriority } from './order';
export { Matcher } from './matcher';
export type { MatcherConfig } from './matcher';
export { InvariantGuard } from './invariants';
export { aggregateDepth } from './depth';
export {
  OrderBookError,
  InvalidOrderError,
  DuplicateOrderIdError,
  CapacityExceededError,
  InvariantViolationError,
} from './errors';
export type { OrderBookErrorCode } from './errors';
