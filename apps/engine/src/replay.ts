import { readFile } from 'fs/promises';
import type { DepthSnapshot, Match, TopOfBook } from '@ladderbook/types';
import { OrderBookError } from '@ladderbook/orderbook';
import type { OrderBook } from '@ladderbook/orderbook';
import { NO_PRICE, ReplayFileSchema, round } from '@ladderbook/utils';
import type { Logger, ReplayEvent, ReplayFile } from '@ladderbook/utils';

export interface ReplayStep {
  index: number;
  type: ReplayEvent['type'];
  ok: boolean;
  error?: { code: string; message: string };
  matches: Match[];
  cancelled?: boolean;
  loaded?: number;
  depth?: DepthSnapshot;
}

export interface ReplaySummary {
  eventsApplied: number;
  failures: number;
  matches: Match[];
  volume: number;
  /** Volume-weighted trade price, or -1 with no trades */
  vwap: number;
  topOfBook: TopOfBook;
  steps: ReplayStep[];
}

export interface ReplayOptions {
  /** Stop at the first rejected event instead of carrying on */
  stopOnError: boolean;
}

const DEFAULT_OPTIONS: ReplayOptions = {
  stopOnError: false,
};

/**
 * Feeds recorded order flow into one book, event by event, the way a host
 * application would drive it from user input or a network capture.
 */
export class ReplaySession {
  private options: ReplayOptions;

  constructor(
    private readonly book: OrderBook,
    private readonly logger: Logger,
    options: Partial<ReplayOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  run(events: ReplayEvent[]): ReplaySummary {
    const steps: ReplayStep[] = [];

    for (const [index, event] of events.entries()) {
      const step = this.apply(event, index);
      steps.push(step);
      if (!step.ok && this.options.stopOnError) {
        this.logger.warn({ index }, 'Replay stopped at rejected event');
        break;
      }
    }

    const matches = steps.flatMap(step => step.matches);
    const volume = matches.reduce((sum, m) => sum + m.quantity, 0);
    const notional = matches.reduce((sum, m) => sum + m.price * m.quantity, 0);

    return {
      eventsApplied: steps.filter(step => step.ok).length,
      failures: steps.filter(step => !step.ok).length,
      matches,
      volume,
      vwap: volume > 0 ? round(notional / volume, 6) : NO_PRICE,
      topOfBook: this.book.getTopOfBook(),
      steps,
    };
  }

  /**
   * Apply one event. Rejections raised by the book are recorded on the step;
   * anything else propagates.
   */
  apply(event: ReplayEvent, index: number): ReplayStep {
    const step: ReplayStep = { index, type: event.type, ok: true, matches: [] };

    try {
      switch (event.type) {
        case 'add':
          this.book.addOrder(event.id, event.side, event.price, event.quantity, event.timestamp);
          break;
        case 'load':
          step.loaded = this.book.loadOrders(event.orders);
          break;
        case 'cancel':
          step.cancelled = this.book.cancelOrder(event.id);
          break;
        case 'match':
          step.matches = this.book.matchOrders();
          break;
        case 'clear':
          this.book.clear();
          break;
        case 'depth':
          step.depth = this.book.getDepth(event.levels);
          break;
      }
    } catch (error) {
      if (!(error instanceof OrderBookError)) {
        throw error;
      }
      this.logger.warn({ index, type: event.type, code: error.code }, error.message);
      return { ...step, ok: false, error: { code: error.code, message: error.message } };
    }

    return step;
  }
}

/**
 * Validate parsed JSON as a replay file
 */
export function parseReplayFile(raw: unknown): ReplayFile {
  return ReplayFileSchema.parse(raw);
}

export async function loadReplayFile(path: string): Promise<ReplayFile> {
  const content = await readFile(path, 'utf-8');
  return parseReplayFile(JSON.parse(content));
}
