import { z } from 'zod';
import type { OrderSide } from '@ladderbook/types';
import {
  MAX_ORDER_ID,
  MAX_ORDERS_PER_SIDE,
  DEFAULT_PRICE_CONVENTION,
  DEFAULT_INVARIANT_MODE,
  DEFAULT_QUANTITY_EPSILON,
  DEFAULT_DEPTH_LEVELS,
} from './constants';

// Order validation schemas
export const OrderSideSchema = z.enum(['BUY', 'SELL']);

export const OrderSideInputSchema = z.union([
  OrderSideSchema,
  z.literal(0).transform((): OrderSide => 'BUY'),
  z.literal(1).transform((): OrderSide => 'SELL'),
]);

export const OrderIdSchema = z.number().int().min(0).max(MAX_ORDER_ID);

export const PriceSchema = z.number().finite().positive();

export const QuantitySchema = z.number().finite().positive();

// Ordering is exact only for timestamps within Number.MAX_SAFE_INTEGER
export const TimestampSchema = z.number().finite();

export const NewOrderSchema = z.object({
  id: OrderIdSchema,
  side: OrderSideInputSchema,
  price: PriceSchema,
  quantity: QuantitySchema,
  timestamp: TimestampSchema,
});

export const LoadOrderSchema = NewOrderSchema.extend({
  timestamp: TimestampSchema.optional(),
});

export const LoadOrdersSchema = z.array(LoadOrderSchema);

// Book configuration
export const PriceConventionSchema = z.enum(['maker', 'taker', 'midpoint']);

export const InvariantModeSchema = z.enum(['assert', 'clamp']);

export const OrderBookConfigSchema = z.object({
  maxOrdersPerSide: z.number().int().positive().default(MAX_ORDERS_PER_SIDE),
  priceConvention: PriceConventionSchema.default(DEFAULT_PRICE_CONVENTION),
  quantityEpsilon: z.number().finite().nonnegative().default(DEFAULT_QUANTITY_EPSILON),
  invariantMode: InvariantModeSchema.default(DEFAULT_INVARIANT_MODE),
});

// Replay events. Numeric fields are only type-checked here so that bad
// orders reach the book and are rejected there, one event at a time.
const RawOrderSchema = z.object({
  id: z.number(),
  side: z.union([OrderSideSchema, z.literal(0), z.literal(1)]),
  price: z.number(),
  quantity: z.number(),
});

export const ReplayEventSchema = z.discriminatedUnion('type', [
  RawOrderSchema.extend({ type: z.literal('add'), timestamp: z.number() }),
  z.object({
    type: z.literal('load'),
    orders: z.array(RawOrderSchema.extend({ timestamp: z.number().optional() })),
  }),
  z.object({ type: z.literal('cancel'), id: z.number() }),
  z.object({ type: z.literal('match') }),
  z.object({ type: z.literal('clear') }),
  z.object({ type: z.literal('depth'), levels: z.number().int().nonnegative() }),
]);

export const ReplayFileSchema = z.object({
  symbol: z.string().min(1).max(10).regex(/^[A-Z]+$/, 'Symbol must be uppercase letters only'),
  events: z.array(ReplayEventSchema),
});

// Log level validation
export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

// Environment validation
export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging configuration
  LOG_LEVEL: LogLevelSchema.optional(),

  // Book configuration
  ORDERBOOK_MAX_ORDERS_PER_SIDE: z.coerce.number().int().positive().default(MAX_ORDERS_PER_SIDE),
  ORDERBOOK_PRICE_CONVENTION: PriceConventionSchema.default(DEFAULT_PRICE_CONVENTION),
  ORDERBOOK_INVARIANT_MODE: InvariantModeSchema.optional(),

  // Replay configuration
  REPLAY_FILE: z.string().min(1).optional(),
  REPLAY_DEPTH_LEVELS: z.coerce.number().int().nonnegative().default(DEFAULT_DEPTH_LEVELS),
});

/**
 * Validate environment variables at application startup.
 * Throws a ZodError if validation fails, with detailed messages.
 *
 * @example
 * ```typescript
 * import { validateEnv } from '@ladderbook/utils';
 *
 * const env = validateEnv();
 * console.log(env.ORDERBOOK_PRICE_CONVENTION);
 * ```
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return EnvSchema.parse(env);
}

/**
 * Safely validate environment variables without throwing.
 *
 * @example
 * ```typescript
 * const result = safeValidateEnv();
 * if (!result.success) {
 *   console.error('Invalid env:', result.error.issues);
 * }
 * ```
 */
export function safeValidateEnv(
  env: NodeJS.ProcessEnv = process.env
): z.SafeParseReturnType<unknown, EnvConfig> {
  return EnvSchema.safeParse(env);
}

// Type exports
export type NewOrderInput = z.infer<typeof NewOrderSchema>;
export type LoadOrderInput = z.infer<typeof LoadOrderSchema>;
export type OrderBookConfigInput = z.input<typeof OrderBookConfigSchema>;
export type OrderBookConfig = z.infer<typeof OrderBookConfigSchema>;
export type ReplayEvent = z.infer<typeof ReplayEventSchema>;
export type ReplayFile = z.infer<typeof ReplayFileSchema>;
export type EnvConfig = z.infer<typeof EnvSchema>;
