import { MACD } from 'technicalindicators';
import type { CandleInterval } from '../feeds/candleFetcher';
import { logger } from '../lib/logger';
import type { Signal, SignalAction } from '../types';
import { CandleStrategy, round } from './candleStrategy';
import type { CandleStrategyDeps } from './candleStrategy';

export interface MacdParams {
  fast: number;
  slow: number;
  signal: number;
}

export function macdStrength(histogram: number, prevHistogram: number, action: SignalAction): number {
  if (action === 'HOLD') return 0;
  const momentum = Math.abs(histogram - prevHistogram);
  const histogramBoost = Math.min(0.2, Math.abs(histogram) * 0.05);
  const momentumBoost = Math.min(0.1, momentum * 0.02);
  return Math.min(1, 0.7 + histogramBoost + momentumBoost);
}

/** Histogram zero-cross: BUY when it turns positive, SELL when it turns negative. */
export class MacdStrategy extends CandleStrategy {
  readonly id: string;
  private params: MacdParams;

  constructor(id: string, timeframe: CandleInterval, deps: CandleStrategyDeps, params: MacdParams = { fast: 12, slow: 26, signal: 9 }) {
    super(timeframe, id, deps);
    this.id = id;
    this.params = params;
  }

  async generate(coin: string): Promise<Signal | null> {
    const { fast, slow, signal } = this.params;
    const required = slow + signal + 10;
    const candles = await this.fetchCandles(coin, Math.min(required, 200));
    if (candles.length < required) {
      logger.warn('Strategy', `${this.id}: insufficient data for ${coin}`, { candles: candles.length });
      return null;
    }

    const output = MACD.calculate({
      values: candles.map((c) => c.close),
      fastPeriod: fast,
      slowPeriod: slow,
      signalPeriod: signal,
      SimpleMAOscillator: false,
      SimpleMASignal: false,
    });
    const current = output[output.length - 1];
    const hist = current?.histogram;
    const prevHist = output[output.length - 2]?.histogram;
    if (current === undefined || hist === undefined || prevHist === undefined) return null;

    let action: SignalAction = 'HOLD';
    if (prevHist <= 0 && hist > 0) action = 'BUY';
    else if (prevHist >= 0 && hist < 0) action = 'SELL';

    return this.signal(coin, action, macdStrength(hist, prevHist, action), {
      macd: round(current.MACD ?? 0, 6),
      signal: round(current.signal ?? 0, 6),
      histogram: round(hist, 6),
      fast,
      slow,
      signalPeriod: signal,
    });
  }
}
