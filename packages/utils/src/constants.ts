import type { InvariantMode, PriceConvention } from '@ladderbook/types';

// Book limits
export const MAX_ORDERS_PER_SIDE = 1000;
export const MAX_ORDER_ID = 0xffff_ffff;

// Returned by price queries when the answer is undefined (empty side)
export const NO_PRICE = -1;

// Matching
export const DEFAULT_PRICE_CONVENTION: PriceConvention = 'maker';
export const DEFAULT_INVARIANT_MODE: InvariantMode = 'assert';
export const DEFAULT_QUANTITY_EPSILON = 1e-9;

// Rendering
export const DEFAULT_DEPTH_LEVELS = 10;
