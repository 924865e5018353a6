import type { CandleInterval } from '../feeds/candleFetcher';
import { logger } from '../lib/logger';
import type { Signal } from '../types';
import { CandleStrategy, round } from './candleStrategy';
import type { CandleStrategyDeps } from './candleStrategy';

export interface RangeLowParams {
  /** candles that make up the lookback window */
  lookback: number;
  /** band start relative to the window low, percent */
  offsetPercent: number;
  /** band width, percent of the window low */
  tolerancePercent: number;
}

export const DEFAULT_RANGE_LOW_PARAMS: Omit<RangeLowParams, 'lookback'> = {
  offsetPercent: -1,
  tolerancePercent: 2,
};

export function buyBand(low: number, offsetPercent: number, tolerancePercent: number): [number, number] {
  const offset = offsetPercent / 100;
  return [low * (1 + offset), low * (1 + offset + tolerancePercent / 100)];
}

/** 1.0 at the bottom of the band down to 0.7 at the top. */
export function rangeStrength(price: number, bandLow: number, bandHigh: number): number {
  const width = bandHigh - bandLow;
  if (width === 0) return 0.85;
  const position = (price - bandLow) / width;
  return Math.min(1, Math.max(0.7, 1 - position * 0.3));
}

/**
 * Buys when price sits in a band just around the lowest low of the lookback
 * window. Never sells. The last candle is the one still forming, so its close
 * is the current price.
 */
export class RangeLowStrategy extends CandleStrategy {
  readonly id: string;
  private params: RangeLowParams;

  constructor(id: string, timeframe: CandleInterval, deps: CandleStrategyDeps, params: RangeLowParams) {
    super(timeframe, id, deps);
    this.id = id;
    this.params = params;
  }

  async generate(coin: string): Promise<Signal | null> {
    const { lookback, offsetPercent, tolerancePercent } = this.params;
    const candles = await this.fetchCandles(coin, lookback);
    const last = candles[candles.length - 1];
    if (candles.length < lookback || last === undefined) {
      logger.warn('Strategy', `${this.id}: insufficient data for ${coin}`, { candles: candles.length, lookback });
      return null;
    }

    const low = Math.min(...candles.map((c) => c.low));
    const high = Math.max(...candles.map((c) => c.high));
    const price = last.close;
    const [bandLow, bandHigh] = buyBand(low, offsetPercent, tolerancePercent);
    const inRange = price >= bandLow && price <= bandHigh;

    if (inRange) {
      logger.info('Strategy', `${this.id}: ${coin} at ${price} inside [${round(bandLow, 6)}, ${round(bandHigh, 6)}]`);
    }
    return this.signal(coin, inRange ? 'BUY' : 'HOLD', inRange ? rangeStrength(price, bandLow, bandHigh) : 0, {
      price: round(price, 6),
      low: round(low, 6),
      high: round(high, 6),
      bandLow: round(bandLow, 6),
      bandHigh: round(bandHigh, 6),
      inRange,
      lookback,
    });
  }
}
