import { fetch } from 'undici';
import { z } from 'zod';
import { errorMessage, TransientFetchError } from '../lib/errors';

export interface Candle {
  openTime: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export type CandleInterval = '1m' | '5m' | '15m' | '1h' | '4h' | '1d';

export interface CandleSource {
  fetchCandles(coin: string, interval: CandleInterval, limit: number): Promise<Candle[]>;
}

// [openTime, open, high, low, close, volume, closeTime, ...]
const KlineRowSchema = z
  .tuple([z.number(), z.string(), z.string(), z.string(), z.string(), z.string()])
  .rest(z.unknown());

const KlinesSchema = z.array(KlineRowSchema);

export interface CandleFetcherOptions {
  restUrl: string;
  quoteAsset: string;
  timeoutMs: number;
}

/** Public kline endpoint; no key needed. */
export class BinanceCandleFetcher implements CandleSource {
  private options: CandleFetcherOptions;

  constructor(options: CandleFetcherOptions) {
    this.options = options;
  }

  async fetchCandles(coin: string, interval: CandleInterval, limit: number): Promise<Candle[]> {
    const symbol = `${coin.toUpperCase()}${this.options.quoteAsset}`;
    const params = new URLSearchParams({ symbol, interval, limit: String(limit) });
    const url = `${this.options.restUrl}/api/v3/klines?${params.toString()}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    let body: unknown;
    try {
      const res = await fetch(url, { method: 'GET', signal: controller.signal });
      if (!res.ok) {
        const text = await res.text();
        throw new TransientFetchError(`Klines ${symbol} ${interval}: HTTP ${res.status} ${text.slice(0, 100)}`);
      }
      body = await res.json();
    } catch (error) {
      if (error instanceof TransientFetchError) throw error;
      throw new TransientFetchError(`Klines ${symbol} ${interval}: ${errorMessage(error)}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    const parsed = KlinesSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientFetchError(`Klines ${symbol} ${interval}: unexpected payload`);
    }
    return parsed.data.map((row) => ({
      openTime: row[0],
      open: parseFloat(row[1]),
      high: parseFloat(row[2]),
      low: parseFloat(row[3]),
      close: parseFloat(row[4]),
      volume: parseFloat(row[5]),
    }));
  }
}
