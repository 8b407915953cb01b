import type { DepthLevel } from '@ladderbook/types';
import type { BookLadder } from './ladder';

/**
 * Collapse a ladder into per-price levels, best first, with a running total.
 * A non-positive or NaN level count yields no levels.
 */
export function aggregateDepth(ladder: BookLadder, levels: number): DepthLevel[] {
  if (Number.isNaN(levels) || levels <= 0) {
    return [];
  }
  const limit = Math.floor(levels);
  const result: DepthLevel[] = [];
  let cumulative = 0;

  for (const level of ladder.levelsInOrder()) {
    if (result.length >= limit) break;

    const quantity = level.totalQuantity();
    cumulative += quantity;
    result.push({
      price: level.price,
      quantity,
      cumulativeQuantity: cumulative,
      orderCount: level.size,
    });
  }

  return result;
}
