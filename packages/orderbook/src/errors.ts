import type { ZodIssue } from 'zod';
import type { OrderSide } from '@ladderbook/types';

export type OrderBookErrorCode =
  | 'INVALID_ORDER'
  | 'DUPLICATE_ORDER_ID'
  | 'CAPACITY_EXCEEDED'
  | 'INVARIANT_VIOLATION';

/**
 * Base class for every error the book raises
 */
export class OrderBookError extends Error {
  constructor(
    public readonly code: OrderBookErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'OrderBookError';
  }
}

function describeIssues(issues: ZodIssue[]): string {
  return issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : 'order'}: ${issue.message}`)
    .join('; ');
}

/**
 * Thrown before any mutation when an order fails validation
 * (non-positive price or quantity, non-finite numbers, bad id or side)
 */
export class InvalidOrderError extends OrderBookError {
  constructor(public readonly issues: ZodIssue[]) {
    super('INVALID_ORDER', `Invalid order: ${describeIssues(issues)}`);
    this.name = 'InvalidOrderError';
  }
}

export class DuplicateOrderIdError extends OrderBookError {
  constructor(public readonly orderId: number) {
    super('DUPLICATE_ORDER_ID', `Order id ${orderId} is already known to this book`);
    this.name = 'DuplicateOrderIdError';
  }
}

export class CapacityExceededError extends OrderBookError {
  constructor(
    public readonly side: OrderSide,
    public readonly limit: number
  ) {
    super('CAPACITY_EXCEEDED', `${side} side already holds ${limit} active orders`);
    this.name = 'CapacityExceededError';
  }
}

/**
 * A broken internal invariant. Indicates a defect, not bad input.
 */
export class InvariantViolationError extends OrderBookError {
  constructor(
    message: string,
    public readonly context: Record<string, string | number>
  ) {
    super('INVARIANT_VIOLATION', message);
    this.name = 'InvariantViolationError';
  }
}
