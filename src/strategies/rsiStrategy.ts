import { RSI } from 'technicalindicators';
import type { CandleInterval } from '../feeds/candleFetcher';
import { logger } from '../lib/logger';
import type { Signal, SignalAction } from '../types';
import { CandleStrategy, round } from './candleStrategy';
import type { CandleStrategyDeps } from './candleStrategy';

export interface RsiParams {
  period: number;
  oversold: number;
  overbought: number;
}

export const DEFAULT_RSI_PARAMS: RsiParams = { period: 14, oversold: 30, overbought: 70 };

/** Strength grows with the distance past the threshold, never below 0.6. */
export function rsiStrength(rsi: number, action: SignalAction, params: RsiParams): number {
  if (action === 'BUY' && rsi <= params.oversold) {
    return Math.min(1, Math.max(0.6, 1 - rsi / params.oversold));
  }
  if (action === 'SELL' && rsi >= params.overbought) {
    return Math.min(1, Math.max(0.6, (rsi - params.overbought) / (100 - params.overbought)));
  }
  return 0;
}

/** Mean reversion on RSI: BUY when oversold, SELL when overbought. */
export class RsiStrategy extends CandleStrategy {
  readonly id: string;
  private params: RsiParams;

  constructor(id: string, timeframe: CandleInterval, deps: CandleStrategyDeps, params: RsiParams = DEFAULT_RSI_PARAMS) {
    super(timeframe, id, deps);
    this.id = id;
    this.params = params;
  }

  async generate(coin: string): Promise<Signal | null> {
    const { period, oversold, overbought } = this.params;
    const candles = await this.fetchCandles(coin, period + 50);
    if (candles.length < period + 1) {
      logger.warn('Strategy', `${this.id}: insufficient data for ${coin}`, { candles: candles.length });
      return null;
    }

    const values = RSI.calculate({ values: candles.map((c) => c.close), period });
    const rsi = values[values.length - 1];
    if (rsi === undefined) return null;

    const action: SignalAction = rsi <= oversold ? 'BUY' : rsi >= overbought ? 'SELL' : 'HOLD';
    return this.signal(coin, action, rsiStrength(rsi, action, this.params), {
      rsi: round(rsi, 2),
      period,
      oversold,
      overbought,
    });
  }
}
