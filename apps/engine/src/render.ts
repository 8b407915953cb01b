import type { DepthSnapshot, Match } from '@ladderbook/types';
import { formatPrice, formatQuantity } from '@ladderbook/utils';

/**
 * Render depth as a side-by-side price-level table, best levels on the first row
 */
export function formatDepthTable(depth: DepthSnapshot): string[] {
  const lines = [
    `${'BID CUM'.padStart(10)} ${'BID QTY'.padStart(10)} ${'BID'.padStart(10)} | ${'ASK'.padEnd(10)} ${'ASK QTY'.padEnd(10)} ${'ASK CUM'.padEnd(10)}`,
  ];
  const rows = Math.max(depth.bids.length, depth.asks.length);

  for (let i = 0; i < rows; i++) {
    const bid = depth.bids[i];
    const ask = depth.asks[i];
    const left = bid
      ? `${formatQuantity(bid.cumulativeQuantity).padStart(10)} ${formatQuantity(bid.quantity).padStart(10)} ${formatPrice(bid.price).padStart(10)}`
      : ' '.repeat(32);
    const right = ask
      ? `${formatPrice(ask.price).padEnd(10)} ${formatQuantity(ask.quantity).padEnd(10)} ${formatQuantity(ask.cumulativeQuantity).padEnd(10)}`
      : '';
    lines.push(`${left} | ${right}`.trimEnd());
  }

  return lines;
}

export function formatMatch(match: Match): string {
  return `#${match.buyOrderId} x #${match.sellOrderId} ${formatQuantity(match.quantity)} @ ${formatPrice(match.price)} (taker ${match.takerSide})`;
}
