import { describe, it, expect } from 'vitest';
import {
  EnvSchema,
  NewOrderSchema,
  LoadOrdersSchema,
  OrderBookConfigSchema,
  OrderSideInputSchema,
  ReplayEventSchema,
  safeValidateEnv,
  validateEnv,
} from './validation';

describe('OrderSideInputSchema', () => {
  it('should accept named sides', () => {
    expect(OrderSideInputSchema.parse('BUY')).toBe('BUY');
    expect(OrderSideInputSchema.parse('SELL')).toBe('SELL');
  });

  it('should map wire codes to named sides', () => {
    expect(OrderSideInputSchema.parse(0)).toBe('BUY');
    expect(OrderSideInputSchema.parse(1)).toBe('SELL');
  });

  it('should reject anything else', () => {
    expect(OrderSideInputSchema.safeParse(2).success).toBe(false);
    expect(OrderSideInputSchema.safeParse('buy').success).toBe(false);
  });
});

describe('NewOrderSchema', () => {
  const valid = { id: 7, side: 'BUY', price: 10.5, quantity: 2, timestamp: 100 };

  it('should pass a well-formed order', () => {
    expect(NewOrderSchema.parse(valid)).toEqual(valid);
  });

  it('should accept the largest 32-bit id', () => {
    expect(NewOrderSchema.safeParse({ ...valid, id: 4294967295 }).success).toBe(true);
  });

  it('should fail on a non-positive price', () => {
    const result = NewOrderSchema.safeParse({ ...valid, price: 0 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['price']);
    }
  });

  it('should fail on a non-positive quantity', () => {
    const result = NewOrderSchema.safeParse({ ...valid, quantity: -1 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['quantity']);
    }
  });

  it('should fail on a non-finite timestamp', () => {
    expect(NewOrderSchema.safeParse({ ...valid, timestamp: Number.POSITIVE_INFINITY }).success).toBe(false);
  });

  it('should fail when timestamp is missing', () => {
    const { timestamp: _, ...order } = valid;
    expect(NewOrderSchema.safeParse(order).success).toBe(false);
  });
});

describe('LoadOrdersSchema', () => {
  it('should allow entries without a timestamp', () => {
    const result = LoadOrdersSchema.parse([{ id: 1, side: 1, price: 3, quantity: 4 }]);
    expect(result).toEqual([{ id: 1, side: 'SELL', price: 3, quantity: 4 }]);
  });

  it('should locate the failing entry', () => {
    const result = LoadOrdersSchema.safeParse([
      { id: 1, side: 'BUY', price: 3, quantity: 4 },
      { id: 2, side: 'BUY', price: 3, quantity: 0 },
    ]);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual([1, 'quantity']);
    }
  });
});

describe('OrderBookConfigSchema', () => {
  it('should fill in defaults', () => {
    expect(OrderBookConfigSchema.parse({})).toEqual({
      maxOrdersPerSide: 1000,
      priceConvention: 'maker',
      quantityEpsilon: 1e-9,
      invariantMode: 'assert',
    });
  });

  it('should reject an unknown price convention', () => {
    expect(OrderBookConfigSchema.safeParse({ priceConvention: 'vwap' }).success).toBe(false);
  });

  it('should reject a zero capacity', () => {
    expect(OrderBookConfigSchema.safeParse({ maxOrdersPerSide: 0 }).success).toBe(false);
  });
});

describe('ReplayEventSchema', () => {
  it('should parse each event type', () => {
    expect(ReplayEventSchema.parse({ type: 'match' })).toEqual({ type: 'match' });
    expect(ReplayEventSchema.parse({ type: 'cancel', id: 3 })).toEqual({ type: 'cancel', id: 3 });
    expect(ReplayEventSchema.parse({ type: 'depth', levels: 4 })).toEqual({ type: 'depth', levels: 4 });
  });

  it('should reject a negative depth request', () => {
    expect(ReplayEventSchema.safeParse({ type: 'depth', levels: -1 }).success).toBe(false);
  });
});

describe('EnvSchema', () => {
  describe('defaults', () => {
    it('should default NODE_ENV to development', () => {
      expect(EnvSchema.parse({}).NODE_ENV).toBe('development');
    });

    it('should default book settings', () => {
      const env = EnvSchema.parse({});
      expect(env.ORDERBOOK_MAX_ORDERS_PER_SIDE).toBe(1000);
      expect(env.ORDERBOOK_PRICE_CONVENTION).toBe('maker');
      expect(env.ORDERBOOK_INVARIANT_MODE).toBeUndefined();
      expect(env.REPLAY_DEPTH_LEVELS).toBe(10);
    });
  });

  describe('coercion', () => {
    it('should coerce numeric strings', () => {
      const env = EnvSchema.parse({ ORDERBOOK_MAX_ORDERS_PER_SIDE: '500', REPLAY_DEPTH_LEVELS: '3' });
      expect(env.ORDERBOOK_MAX_ORDERS_PER_SIDE).toBe(500);
      expect(env.REPLAY_DEPTH_LEVELS).toBe(3);
    });

    it('should fail on a non-numeric capacity', () => {
      const result = EnvSchema.safeParse({ ORDERBOOK_MAX_ORDERS_PER_SIDE: 'lots' });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].path).toContain('ORDERBOOK_MAX_ORDERS_PER_SIDE');
      }
    });
  });

  it('should fail on an unknown log level', () => {
    expect(EnvSchema.safeParse({ LOG_LEVEL: 'loud' }).success).toBe(false);
  });
});

describe('validateEnv', () => {
  it('should return the parsed config', () => {
    expect(validateEnv({ NODE_ENV: 'test', LOG_LEVEL: 'warn' })).toMatchObject({
      NODE_ENV: 'test',
      LOG_LEVEL: 'warn',
    });
  });

  it('should throw on invalid input', () => {
    expect(() => validateEnv({ NODE_ENV: 'staging' })).toThrow();
  });
});

describe('safeValidateEnv', () => {
  it('should report failure without throwing', () => {
    const result = safeValidateEnv({ ORDERBOOK_PRICE_CONVENTION: 'best' });
    expect(result.success).toBe(false);
  });
});
