import { SMA } from 'technicalindicators';
import type { CandleInterval } from '../feeds/candleFetcher';
import { logger } from '../lib/logger';
import type { Signal, SignalAction } from '../types';
import { CandleStrategy, round } from './candleStrategy';
import type { CandleStrategyDeps } from './candleStrategy';

export interface SmaParams {
  shortPeriod: number;
  longPeriod: number;
}

type Trend = 'bullish' | 'bearish';

/**
 * Strength from SMA separation, and only when price confirms the side:
 * above the short SMA for BUY, below it for SELL.
 */
export function smaStrength(shortSma: number, longSma: number, price: number, action: SignalAction): number {
  const separation = Math.abs(shortSma - longSma) / longSma;
  if (action === 'BUY' && shortSma > longSma && price > shortSma) {
    return Math.min(1, 0.6 + separation * 20);
  }
  if (action === 'SELL' && shortSma < longSma && price < shortSma) {
    return Math.min(1, 0.6 + separation * 20);
  }
  return 0;
}

/**
 * SMA crossover. Signals on a cross, or once per trend when the averages are
 * already apart the first time a coin is seen.
 */
export class SmaCrossStrategy extends CandleStrategy {
  readonly id: string;
  private params: SmaParams;
  private lastTrend: Map<string, Trend> = new Map();

  constructor(id: string, timeframe: CandleInterval, deps: CandleStrategyDeps, params: SmaParams = { shortPeriod: 10, longPeriod: 20 }) {
    super(timeframe, id, deps);
    this.id = id;
    this.params = params;
  }

  async generate(coin: string): Promise<Signal | null> {
    const { shortPeriod, longPeriod } = this.params;
    const candles = await this.fetchCandles(coin, longPeriod + 50);
    if (candles.length < longPeriod + 1) {
      logger.warn('Strategy', `${this.id}: insufficient data for ${coin}`, { candles: candles.length });
      return null;
    }

    const closes = candles.map((c) => c.close);
    const shortSma = SMA.calculate({ values: closes, period: shortPeriod });
    const longSma = SMA.calculate({ values: closes, period: longPeriod });
    const curShort = shortSma[shortSma.length - 1];
    const prevShort = shortSma[shortSma.length - 2];
    const curLong = longSma[longSma.length - 1];
    const prevLong = longSma[longSma.length - 2];
    const price = closes[closes.length - 1];
    if (
      curShort === undefined ||
      prevShort === undefined ||
      curLong === undefined ||
      prevLong === undefined ||
      price === undefined
    ) {
      return null;
    }

    const action = this.nextAction(coin, prevShort, prevLong, curShort, curLong);
    return this.signal(coin, action, smaStrength(curShort, curLong, price, action), {
      shortSma: round(curShort, 2),
      longSma: round(curLong, 2),
      price: round(price, 2),
      shortPeriod,
      longPeriod,
      separationPct: round((Math.abs(curShort - curLong) / curLong) * 100, 2),
    });
  }

  private nextAction(coin: string, prevShort: number, prevLong: number, curShort: number, curLong: number): SignalAction {
    const trend = this.lastTrend.get(coin);
    if (prevShort <= prevLong && curShort > curLong) {
      this.lastTrend.set(coin, 'bullish');
      return 'BUY';
    }
    if (prevShort >= prevLong && curShort < curLong) {
      this.lastTrend.set(coin, 'bearish');
      return 'SELL';
    }
    if (curShort > curLong && trend !== 'bullish') {
      this.lastTrend.set(coin, 'bullish');
      return 'BUY';
    }
    if (curShort < curLong && trend !== 'bearish') {
      this.lastTrend.set(coin, 'bearish');
      return 'SELL';
    }
    return 'HOLD';
  }
}
