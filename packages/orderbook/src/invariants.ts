import type { InvariantMode } from '@ladderbook/types';
import type { Logger } from '@ladderbook/utils';
import { InvariantViolationError } from './errors';

/**
 * Reports broken internal invariants.
 *
 * In assert mode a violation throws. In clamp mode it is logged at error level and
 * check() returns false so the caller can repair the value and carry on.
 */
export class InvariantGuard {
  constructor(
    private readonly mode: InvariantMode,
    private readonly logger: Logger
  ) {}

  check(condition: boolean, message: string, context: Record<string, string | number> = {}): boolean {
    if (condition) {
      return true;
    }
    if (this.mode === 'assert') {
      throw new InvariantViolationError(message, context);
    }
    this.logger.error({ ...context, invariant: message }, 'Order book invariant violated');
    return false;
  }
}
