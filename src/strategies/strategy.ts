import type { Signal } from '../types';

/**
 * A signal source. `generate` reads market data for one coin and returns an
 * opinion, or null when it has none (not enough data, fetch failed).
 */
export interface Strategy {
  readonly id: string;
  /** Candle size the strategy reads, e.g. "5m" */
  readonly timeframe: string;
  generate(coin: string): Promise<Signal | null>;
}
