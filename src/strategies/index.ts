import type { Config, StrategyId } from '../config';
import type { CandleSource } from '../feeds/candleFetcher';
import type { CandleStrategyDeps } from './candleStrategy';
import { MacdStrategy } from './macdStrategy';
import { DEFAULT_RANGE_LOW_PARAMS, RangeLowStrategy } from './rangeLowStrategy';
import { RsiStrategy } from './rsiStrategy';
import { ScalpingStrategy } from './scalpingStrategy';
import { SmaCrossStrategy } from './smaCrossStrategy';
import type { Strategy } from './strategy';

export type { Strategy } from './strategy';

function createStrategy(id: StrategyId, deps: CandleStrategyDeps): Strategy {
  switch (id) {
    case 'rsi_1m':
      return new RsiStrategy(id, '1m', deps);
    case 'rsi_5m':
      return new RsiStrategy(id, '5m', deps);
    case 'rsi_1h':
      return new RsiStrategy(id, '1h', deps);
    case 'rsi_4h':
      return new RsiStrategy(id, '4h', deps);
    case 'sma_5m':
      return new SmaCrossStrategy(id, '5m', deps);
    case 'scalping_1m':
      return new ScalpingStrategy(id, '1m', deps);
    case 'range_24h_low':
      return new RangeLowStrategy(id, '1h', deps, { ...DEFAULT_RANGE_LOW_PARAMS, lookback: 24 });
    case 'range_7d_low':
      return new RangeLowStrategy(id, '1d', deps, { ...DEFAULT_RANGE_LOW_PARAMS, lookback: 7 });
    case 'macd_15m':
      return new MacdStrategy(id, '15m', deps);
  }
}

export interface ConfiguredStrategy {
  strategy: Strategy;
  intervalSeconds: number;
  enabled: boolean;
}

/** One instance per configured strategy id, each with its own rate limiter. */
export function buildStrategies(config: Config, candles: CandleSource): ConfiguredStrategy[] {
  return config.scheduler.strategies.map((setting) => ({
    strategy: createStrategy(setting.id, {
      candles,
      minRequestIntervalMs: config.requests.minRequestIntervalMs,
    }),
    intervalSeconds: setting.intervalSeconds,
    enabled: setting.enabled,
  }));
}
