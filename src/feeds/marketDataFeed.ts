import WebSocket from 'ws';
import { z } from 'zod';
import type { Config } from '../config';
import type { PriceSource } from '../exchange/paperExchange';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

export interface Ticker {
  coin: string;
  symbol: string;
  bid: number;
  ask: number;
  last: number;
  volume: number;
  timestamp: number;
}

const TickerMessageSchema = z.object({
  e: z.literal('24hrTicker'),
  E: z.number(),
  s: z.string(),
  b: z.string(),
  a: z.string(),
  c: z.string(),
  v: z.string(),
});

const RECONNECT_DELAY_MS = 5000;

/** Parse one stream frame; null for anything that is not a 24h ticker (acks, other events). */
export function parseTickerMessage(raw: string, quoteAsset: string): Ticker | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = TickerMessageSchema.safeParse(json);
  if (!parsed.success) return null;
  const msg = parsed.data;
  const coin = msg.s.endsWith(quoteAsset) ? msg.s.slice(0, -quoteAsset.length) : msg.s;
  return {
    coin,
    symbol: msg.s,
    bid: parseFloat(msg.b),
    ask: parseFloat(msg.a),
    last: parseFloat(msg.c),
    volume: parseFloat(msg.v),
    timestamp: msg.E,
  };
}

/**
 * Live 24h tickers over the exchange's public WebSocket. Keeps the last
 * ticker per coin as the paper account's price source and reconnects after a
 * drop.
 */
export class MarketDataFeed implements PriceSource {
  private ws: WebSocket | null = null;
  private config: Config;
  private latest: Map<string, Ticker> = new Map();
  private reconnectTimer: NodeJS.Timeout | null = null;
  private isConnected = false;
  private stopping = false;

  constructor(config: Config) {
    this.config = config;
  }

  async connect(): Promise<void> {
    const { tickerUrl } = this.config.exchange;
    this.stopping = false;

    logger.info('MarketFeed', `📡 Connecting to ticker stream: ${tickerUrl}`);

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(tickerUrl);
      this.ws = ws;

      ws.on('open', () => {
        this.isConnected = true;
        logger.info('MarketFeed', '✅ Market data feed connected');
        this.subscribeTickers(ws);
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => {
        this.handleMessage(data.toString());
      });

      ws.on('error', (error) => {
        logger.error('MarketFeed', 'WebSocket error', { error: error.message });
        if (!this.isConnected) {
          reject(error);
        }
      });

      ws.on('close', () => {
        this.isConnected = false;
        if (this.stopping) return;
        logger.warn('MarketFeed', '🔌 WebSocket disconnected, reconnecting...');
        this.scheduleReconnect();
      });
    });
  }

  private subscribeTickers(ws: WebSocket): void {
    const quote = this.config.exchange.quoteAsset.toLowerCase();
    const streams = this.config.trading.coins.map((c) => `${c.toLowerCase()}${quote}@ticker`);

    ws.send(
      JSON.stringify({
        method: 'SUBSCRIBE',
        params: streams,
        id: 1,
      }),
    );
  }

  private handleMessage(data: string): void {
    const ticker = parseTickerMessage(data, this.config.exchange.quoteAsset);
    if (!ticker) return;
    this.latest.set(ticker.coin, ticker);
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((error: unknown) => {
        logger.error('MarketFeed', 'Reconnect failed', { error: errorMessage(error) });
        this.scheduleReconnect();
      });
    }, RECONNECT_DELAY_MS);
  }

  getLastPrice(coin: string): number | undefined {
    return this.latest.get(coin)?.last;
  }

  async disconnect(): Promise<void> {
    this.stopping = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.ws) {
      this.ws.close();
      this.ws = null;
    }
  }
}
