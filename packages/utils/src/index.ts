// Constants
export {
  MAX_ORDERS_PER_SIDE,
  MAX_ORDER_ID,
  NO_PRICE,
  DEFAULT_PRICE_CONVENTION,
  DEFAULT_INVARIANT_MODE,
  DEFAULT_QUANTITY_EPSILON,
  DEFAULT_DEPTH_LEVELS,
} from './constants';

// Validation schemas
export {
  OrderSideSchema,
  OrderSideInputSchema,
  OrderIdSchema,
  PriceSchema,
  QuantitySchema,
  TimestampSchema,
  NewOrderSchema,
  LoadOrderSchema,
  LoadOrdersSchema,
  PriceConventionSchema,
  InvariantModeSchema,
  OrderBookConfigSchema,
  ReplayEventSchema,
  ReplayFileSchema,
  LogLevelSchema,
  EnvSchema,
  validateEnv,
  safeValidateEnv,
} from './validation';

export type {
  NewOrderInput,
  LoadOrderInput,
  OrderBookConfigInput,
  OrderBookConfig,
  ReplayEvent,
  ReplayFile,
  EnvConfig,
} from './validation';

// Formatting utilities
export {
  formatPrice,
  formatNumber,
  formatQuantity,
  round,
} from './formatting';

// Logger utilities
export {
  createLogger,
  createChildLogger,
  getLogLevel,
  isValidLogLevel,
  LOG_LEVELS,
  DEFAULT_LOG_LEVELS,
} from './logger';

export type {
  Logger,
  Level,
  LoggerConfig,
  LogLevel,
  Environment,
} from './logger';
