import { NO_PRICE, createLogger, formatNumber, formatPrice, formatQuantity, safeValidateEnv } from '@ladderbook/utils';
import { MarketEngine } from './market-engine';
import { ReplaySession, loadReplayFile } from './replay';
import { buildBookConfig } from './config';
import { formatDepthTable, formatMatch } from './render';

// Validate environment variables at startup
const envResult = safeValidateEnv();
if (!envResult.success) {
  console.error('Environment validation failed:');
  for (const issue of envResult.error.issues) {
    console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
  }
  process.exit(1);
}
const env = envResult.data;

const logger = createLogger({ service: 'engine', level: env.LOG_LEVEL });

async function main(): Promise<void> {
  if (!env.REPLAY_FILE) {
    logger.warn('REPLAY_FILE is not set, nothing to replay');
    return;
  }

  const replay = await loadReplayFile(env.REPLAY_FILE);
  const bookConfig = buildBookConfig(env);
  const engine = new MarketEngine(bookConfig, logger);
  const book = engine.addMarket(replay.symbol);

  logger.info(
    { symbol: replay.symbol, events: replay.events.length, ...bookConfig },
    `Replaying ${replay.events.length} events`
  );

  const session = new ReplaySession(book, logger);
  const summary = session.run(replay.events);

  for (const match of summary.matches) {
    logger.info(`  ${formatMatch(match)}`);
  }

  logger.info(
    {
      applied: summary.eventsApplied,
      rejected: summary.failures,
      trades: summary.matches.length,
      volume: formatQuantity(summary.volume),
      vwap: summary.vwap === NO_PRICE ? 'n/a' : formatPrice(summary.vwap, 4),
    },
    'Replay complete'
  );

  const top = summary.topOfBook;
  logger.info(
    { bestBid: top.bestBid, bestAsk: top.bestAsk, spread: top.spread, midPrice: top.midPrice },
    `Book ${replay.symbol}: ${formatNumber(top.bidCount)} bids, ${formatNumber(top.askCount)} asks`
  );

  for (const line of formatDepthTable(book.getDepth(env.REPLAY_DEPTH_LEVELS))) {
    logger.info(line);
  }
}

main().catch(error => {
  logger.error({ err: error }, 'Replay failed');
  process.exit(1);
});
