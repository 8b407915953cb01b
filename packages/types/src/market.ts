import type { OrderSide } from './order';

export interface Match {
  buyOrderId: number;
  sellOrderId: number;
  price: number;
  quantity: number;
  /** Timestamp of the taker, the later of the two orders */
  timestamp: number;
  takerSide: OrderSide;
}

export interface DepthLevel {
  price: number;
  quantity: number;
  cumulativeQuantity: number;
  orderCount: number;
}

export interface DepthSnapshot {
  bids: DepthLevel[];
  asks: DepthLevel[];
}

export interface TopOfBook {
  bestBid: number;
  bestAsk: number;
  spread: number;
  midPrice: number;
  bidCount: number;
  askCount: number;
}

/**
 * Which order's price a trade executes at.
 * - maker: the order that was resting first
 * - taker: the order that crossed later
 * - midpoint: halfway between the two limits
 */
export type PriceConvention = 'maker' | 'taker' | 'midpoint';

/**
 * assert: throw on a broken invariant. clamp: log it and repair the value.
 */
export type InvariantMode = 'assert' | 'clamp';
