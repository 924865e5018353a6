import { EMA, RSI } from 'technicalindicators';
import type { CandleInterval } from '../feeds/candleFetcher';
import { logger } from '../lib/logger';
import type { Signal, SignalAction } from '../types';
import { CandleStrategy, round } from './candleStrategy';
import type { CandleStrategyDeps } from './candleStrategy';

export interface ScalpingParams {
  fastEma: number;
  slowEma: number;
  rsiPeriod: number;
  rsiOversold: number;
  rsiOverbought: number;
  volumeMultiplier: number;
}

export const DEFAULT_SCALPING_PARAMS: ScalpingParams = {
  fastEma: 5,
  slowEma: 13,
  rsiPeriod: 7,
  rsiOversold: 30,
  rsiOverbought: 70,
  volumeMultiplier: 1.5,
};

const VOLUME_WINDOW = 20;

/** Last volume above the window average times the multiplier. */
export function isVolumeSpike(volumes: number[], multiplier: number): boolean {
  if (volumes.length < VOLUME_WINDOW) return false;
  const window = volumes.slice(-VOLUME_WINDOW);
  const average = window.reduce((sum, v) => sum + v, 0) / VOLUME_WINDOW;
  const current = window[window.length - 1] ?? 0;
  return current > average * multiplier;
}

/** 0.6 base, +0.1 per RSI extreme step, wide EMA gap, and volume spike. */
export function scalpingStrength(rsi: number, emaDiffPct: number, volumeSpike: boolean, action: SignalAction): number {
  if (action === 'HOLD') return 0;
  let strength = 0.6;
  if (action === 'BUY') {
    if (rsi < 35) strength += 0.1;
    if (rsi < 30) strength += 0.1;
  } else {
    if (rsi > 65) strength += 0.1;
    if (rsi > 70) strength += 0.1;
  }
  if (Math.abs(emaDiffPct) > 0.5) strength += 0.1;
  if (volumeSpike) strength += 0.1;
  return Math.min(1, strength);
}

/**
 * Fast/slow EMA cross on short candles, taken only with RSI away from both
 * extremes and a volume spike on the crossing candle.
 */
export class ScalpingStrategy extends CandleStrategy {
  readonly id: string;
  private params: ScalpingParams;

  constructor(id: string, timeframe: CandleInterval, deps: CandleStrategyDeps, params: ScalpingParams = DEFAULT_SCALPING_PARAMS) {
    super(timeframe, id, deps);
    this.id = id;
    this.params = params;
  }

  async generate(coin: string): Promise<Signal | null> {
    const { fastEma, slowEma, rsiPeriod, rsiOversold, rsiOverbought, volumeMultiplier } = this.params;
    const candles = await this.fetchCandles(coin, 100);
    if (candles.length < Math.max(slowEma, VOLUME_WINDOW) + 5) {
      logger.warn('Strategy', `${this.id}: insufficient data for ${coin}`, { candles: candles.length });
      return null;
    }

    const closes = candles.map((c) => c.close);
    const fast = EMA.calculate({ values: closes, period: fastEma });
    const slow = EMA.calculate({ values: closes, period: slowEma });
    const rsiValues = RSI.calculate({ values: closes, period: rsiPeriod });
    const curFast = fast[fast.length - 1];
    const prevFast = fast[fast.length - 2];
    const curSlow = slow[slow.length - 1];
    const prevSlow = slow[slow.length - 2];
    const rsi = rsiValues[rsiValues.length - 1];
    if (
      curFast === undefined ||
      prevFast === undefined ||
      curSlow === undefined ||
      prevSlow === undefined ||
      rsi === undefined
    ) {
      return null;
    }

    const volumeSpike = isVolumeSpike(
      candles.map((c) => c.volume),
      volumeMultiplier,
    );
    const bullishCross = curFast > curSlow && prevFast <= prevSlow;
    const bearishCross = curFast < curSlow && prevFast >= prevSlow;
    const rsiNeutral = rsi > rsiOversold && rsi < rsiOverbought;

    let action: SignalAction = 'HOLD';
    if (bullishCross && rsiNeutral && volumeSpike) action = 'BUY';
    else if (bearishCross && rsiNeutral && volumeSpike) action = 'SELL';

    const emaDiffPct = ((curFast - curSlow) / curSlow) * 100;
    return this.signal(coin, action, scalpingStrength(rsi, emaDiffPct, volumeSpike, action), {
      fastEma: round(curFast, 8),
      slowEma: round(curSlow, 8),
      emaDiffPct: round(emaDiffPct, 4),
      rsi: round(rsi, 2),
      volumeSpike,
      bullishCross,
      bearishCross,
    });
  }
}
