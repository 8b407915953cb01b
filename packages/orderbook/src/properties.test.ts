import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import type { Match, OrderSide } from '@ladderbook/types';
import { OrderBook } from './order-book';

type Operation =
  | { kind: 'add'; side: OrderSide; price: number; quantity: number; timestamp: number }
  | { kind: 'cancel'; target: number }
  | { kind: 'match' };

// Whole-number prices and quantities keep float arithmetic exact
const operationArb: fc.Arbitrary<Operation> = fc.oneof(
  fc.record({
    kind: fc.constant('add' as const),
    side: fc.constantFrom<OrderSide>('BUY', 'SELL'),
    price: fc.integer({ min: 1, max: 20 }),
    quantity: fc.integer({ min: 1, max: 20 }),
    timestamp: fc.integer({ min: 0, max: 50 }),
  }),
  fc.record({ kind: fc.constant('cancel' as const), target: fc.nat(60) }),
  fc.record({ kind: fc.constant('match' as const) })
);

interface Replayed {
  book: OrderBook;
  matches: Match[];
  addedIds: number[];
}

function replay(operations: Operation[]): Replayed {
  const book = new OrderBook();
  const matches: Match[] = [];
  const addedIds: number[] = [];
  let nextId = 0;

  for (const op of operations) {
    if (op.kind === 'add') {
      book.addOrder(nextId, op.side, op.price, op.quantity, op.timestamp);
      addedIds.push(nextId);
      nextId++;
    } else if (op.kind === 'cancel') {
      book.cancelOrder(op.target);
    } else {
      matches.push(...book.matchOrders());
    }
  }

  return { book, matches, addedIds };
}

describe('order book properties', () => {
  it('conserves quantity for every order', () => {
    fc.assert(
      fc.property(fc.array(operationArb, { maxLength: 80 }), operations => {
        const { book, matches, addedIds } = replay(operations);
        const matched = new Map<number, number>();
        for (const m of matches) {
          matched.set(m.buyOrderId, (matched.get(m.buyOrderId) ?? 0) + m.quantity);
          matched.set(m.sellOrderId, (matched.get(m.sellOrderId) ?? 0) + m.quantity);
        }

        for (const id of addedIds) {
          const order = book.getOrder(id);
          expect(order).toBeDefined();
          if (!order) continue;
          expect(order.remainingQuantity + (matched.get(id) ?? 0)).toBe(order.originalQuantity);
          expect(order.filledQuantity).toBe(matched.get(id) ?? 0);
        }
      })
    );
  });

  it('never leaves the book crossed after matching', () => {
    fc.assert(
      fc.property(fc.array(operationArb, { maxLength: 80 }), operations => {
        const { book } = replay(operations);
        book.matchOrders();

        const bid = book.bestBidPrice();
        const ask = book.bestAskPrice();
        expect(bid === -1 || ask === -1 || bid < ask).toBe(true);
        expect(book.checkIntegrity()).toEqual([]);
      })
    );
  });

  it('prices every match within both limits', () => {
    fc.assert(
      fc.property(fc.array(operationArb, { maxLength: 80 }), operations => {
        const { book, matches } = replay(operations);

        for (const m of matches) {
          const buy = book.getOrder(m.buyOrderId);
          const sell = book.getOrder(m.sellOrderId);
          expect(buy?.side).toBe('BUY');
          expect(sell?.side).toBe('SELL');
          if (!buy || !sell) continue;
          expect(m.price).toBeLessThanOrEqual(buy.price);
          expect(m.price).toBeGreaterThanOrEqual(sell.price);
          expect(m.quantity).toBeGreaterThan(0);
        }
      })
    );
  });

  it('cancels an active order exactly once', () => {
    fc.assert(
      fc.property(
        fc.array(operationArb, { maxLength: 40 }),
        fc.integer({ min: 2, max: 5 }),
        (operations, repeats) => {
          const { book, addedIds } = replay(operations);
          const active = addedIds.filter(id => {
            const status = book.getOrder(id)?.status;
            return status === 'open' || status === 'partial';
          });

          for (const id of active) {
            expect(book.cancelOrder(id)).toBe(true);
            for (let i = 1; i < repeats; i++) {
              expect(book.cancelOrder(id)).toBe(false);
            }
          }
          expect(book.bidCount()).toBe(0);
          expect(book.askCount()).toBe(0);
        }
      )
    );
  });

  it('reports depth with non-decreasing totals that extend shallower requests', () => {
    fc.assert(
      fc.property(
        fc.array(operationArb, { maxLength: 80 }),
        fc.integer({ min: 0, max: 10 }),
        fc.integer({ min: 0, max: 10 }),
        (operations, a, b) => {
          const { book } = replay(operations);
          const shallow = book.getDepth(Math.min(a, b));
          const deep = book.getDepth(Math.max(a, b));

          for (const side of [deep.bids, deep.asks]) {
            for (let i = 1; i < side.length; i++) {
              expect(side[i].cumulativeQuantity).toBeGreaterThanOrEqual(side[i - 1].cumulativeQuantity);
            }
          }
          expect(deep.bids.slice(0, shallow.bids.length)).toEqual(shallow.bids);
          expect(deep.asks.slice(0, shallow.asks.length)).toEqual(shallow.asks);
        }
      )
    );
  });

  it('matches equal-priced orders on one side in timestamp order', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(fc.integer({ min: 0, max: 1000 }), { minLength: 2, maxLength: 10 }),
        timestamps => {
          const book = new OrderBook();
          timestamps.forEach((timestamp, id) => book.addOrder(id, 'BUY', 10, 1, timestamp));
          book.addOrder(999, 'SELL', 10, timestamps.length, 2000);

          const filledIds = book.matchOrders().map(m => m.buyOrderId);
          const expected = timestamps
            .map((timestamp, id) => ({ timestamp, id }))
            .sort((x, y) => x.timestamp - y.timestamp)
            .map(entry => entry.id);
          expect(filledIds).toEqual(expected);
        }
      )
    );
  });
});
