export type OrderSide = 'BUY' | 'SELL';

/** Wire encoding also accepted on input: 0 = buy, 1 = sell */
export type OrderSideInput = OrderSide | 0 | 1;

export type OrderStatus =
  | 'open'       // Resting on the book, untouched
  | 'partial'    // Resting on the book with some quantity matched
  | 'filled'
  | 'cancelled';

/**
 * Read-only view of an order as held by a book.
 */
export interface OrderSnapshot {
  id: number;
  side: OrderSide;
  price: number;
  originalQuantity: number;
  remainingQuantity: number;
  filledQuantity: number;
  /** Exact only up to Number.MAX_SAFE_INTEGER (2^53 - 1); larger values may compare equal */
  timestamp: number;
  /** Book-wide insertion counter, breaks ties between equal timestamps */
  sequence: number;
  status: OrderStatus;
}

/**
 * One entry of a bulk load. A missing timestamp takes the entry's position in the input.
 * Timestamps are plain numbers: 64-bit nanosecond clocks beyond 2^53 lose precision, so
 * rebase them (e.g. subtract a session start) before handing them to a book.
 */
export interface OrderInput {
  id: number;
  side: OrderSideInput;
  price: number;
  quantity: number;
  timestamp?: number;
}
