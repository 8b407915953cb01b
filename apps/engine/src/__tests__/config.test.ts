import { describe, it, expect } from 'vitest';
import { validateEnv } from '@ladderbook/utils';
import { buildBookConfig } from '../config';

describe('buildBookConfig', () => {
  it('uses defaults outside production', () => {
    expect(buildBookConfig(validateEnv({ NODE_ENV: 'development' }))).toEqual({
      maxOrdersPerSide: 1000,
      priceConvention: 'maker',
      invariantMode: 'assert',
    });
  });

  it('clamps invariant violations in production by default', () => {
    expect(buildBookConfig(validateEnv({ NODE_ENV: 'production' })).invariantMode).toBe('clamp');
  });

  it('honours explicit settings', () => {
    const config = buildBookConfig(
      validateEnv({
        NODE_ENV: 'production',
        ORDERBOOK_MAX_ORDERS_PER_SIDE: '250',
        ORDERBOOK_PRICE_CONVENTION: 'midpoint',
        ORDERBOOK_INVARIANT_MODE: 'assert',
      })
    );

    expect(config).toEqual({
      maxOrdersPerSide: 250,
      priceConvention: 'midpoint',
      invariantMode: 'assert',
    });
  });
});
