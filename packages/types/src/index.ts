// Order types
export type {
  OrderSide,
  OrderSideInput,
  OrderStatus,
  OrderSnapshot,
  OrderInput,
} from './order';

// Market types
export type {
  Match,
  DepthLevel,
  DepthSnapshot,
  TopOfBook,
  PriceConvention,
  InvariantMode,
} from './market';
