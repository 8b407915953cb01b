import type { EnvConfig, OrderBookConfigInput } from '@ladderbook/utils';

/**
 * Book settings from the validated environment. Invariant checks assert
 * everywhere except production, where they clamp and log unless told otherwise.
 */
export function buildBookConfig(env: EnvConfig): OrderBookConfigInput {
  return {
    maxOrdersPerSide: env.ORDERBOOK_MAX_ORDERS_PER_SIDE,
    priceConvention: env.ORDERBOOK_PRICE_CONVENTION,
    invariantMode: env.ORDERBOOK_INVARIANT_MODE ?? (env.NODE_ENV === 'production' ? 'clamp' : 'assert'),
  };
}
