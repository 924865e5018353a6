import type { Candle, CandleInterval, CandleSource } from '../feeds/candleFetcher';
import { RateLimiter } from '../lib/rateLimiter';
import type { Signal, SignalAction, SignalMetadata } from '../types';
import type { Strategy } from './strategy';

export interface CandleStrategyDeps {
  candles: CandleSource;
  /** ms between two candle requests of this strategy */
  minRequestIntervalMs: number;
  now?: () => number;
}

/**
 * Shared plumbing for strategies that read closed candles: a per-instance
 * rate limiter in front of the candle source, and signal construction that
 * keeps HOLD at strength 0.
 */
export abstract class CandleStrategy implements Strategy {
  abstract readonly id: string;
  readonly timeframe: CandleInterval;
  private source: CandleSource;
  private limiter: RateLimiter;
  private now: () => number;

  protected constructor(timeframe: CandleInterval, owner: string, deps: CandleStrategyDeps) {
    this.timeframe = timeframe;
    this.source = deps.candles;
    this.limiter = new RateLimiter(owner, { minRequestIntervalMs: deps.minRequestIntervalMs });
    this.now = deps.now ?? Date.now;
  }

  abstract generate(coin: string): Promise<Signal | null>;

  protected fetchCandles(coin: string, limit: number): Promise<Candle[]> {
    return this.limiter.schedule(() => this.source.fetchCandles(coin, this.timeframe, limit));
  }

  protected signal(coin: string, action: SignalAction, strength: number, metadata: SignalMetadata): Signal {
    const actionable = action !== 'HOLD' && strength > 0;
    return {
      coin,
      action: actionable ? action : 'HOLD',
      strength: actionable ? Math.min(1, strength) : 0,
      timestamp: this.now(),
      source: this.id,
      metadata: { ...metadata, timeframe: this.timeframe },
    };
  }
}

export function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
