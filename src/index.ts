// tf-signal-trader - timeframe-scheduled signals, gated orders, supervised exits

import { Config } from './config';
import { RiskConfigSource } from './config/riskConfigSource';
import { TelegramController } from './controllers/telegramController';
import { TradingEngine } from './engine/tradingEngine';
import { PaperExchange } from './exchange/paperExchange';
import { BinanceCandleFetcher } from './feeds/candleFetcher';
import { MarketDataFeed } from './feeds/marketDataFeed';
import { ConfigurationError, errorMessage } from './lib/errors';
import { logger, setLogLevel } from './lib/logger';
import { MemoryStateSink } from './sinks/memoryStateSink';
import { buildStrategies } from './strategies';

async function main(): Promise<void> {
  logger.info('Main', '🤖 Signal trader starting...');

  const config = Config.load();
  setLogLevel(config.logLevel);

  const marketFeed = new MarketDataFeed(config);
  const exchange = new PaperExchange(marketFeed, config.exchange.paperBalance);
  const candles = new BinanceCandleFetcher({
    restUrl: config.exchange.restUrl,
    quoteAsset: config.exchange.quoteAsset,
    timeoutMs: config.requests.timeoutMs,
  });
  const sink = new MemoryStateSink();
  sink.on('trade', (trade) => {
    logger.info('Main', `💰 ${trade.coin} ${trade.reason}: ${trade.pnl.toFixed(2)} (${trade.pnlPercent.toFixed(2)}%)`);
  });

  const engine = new TradingEngine({
    config,
    exchange,
    strategies: buildStrategies(config, candles),
    risk: new RiskConfigSource(() => Config.reload().risk),
    sink,
  });
  const telegram = config.telegram.botToken ? new TelegramController(config, engine) : null;

  await marketFeed.connect();
  engine.start();
  if (telegram) {
    await telegram.start();
  } else {
    logger.info('Main', 'TELEGRAM_BOT_TOKEN not set, Telegram control disabled');
  }

  logger.info('Main', '✅ Signal trader is running');

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Main', `🛑 ${signal} received, shutting down...`);
    await engine.stop();
    if (telegram) await telegram.stop();
    await marketFeed.disconnect();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Main', 'Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error('Main', 'Configuration invalid, refusing to start', { issues: error.issues });
  } else {
    logger.error('Main', 'Fatal error', { error: errorMessage(error) });
  }
  process.exit(1);
});
