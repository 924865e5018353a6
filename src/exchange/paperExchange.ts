import { TransientExchangeError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { Position, PositionSide } from '../types';
import type { AccountState, ClosedOrder, ExchangeClient, PlacedOrder } from './exchangeClient';

export interface PriceSource {
  getLastPrice(coin: string): number | undefined;
}

interface PaperHolding {
  side: PositionSide;
  size: number;
  entryPrice: number;
}

/**
 * Simulated account that fills market orders at the last streamed price.
 * No order ever leaves the process.
 */
export class PaperExchange implements ExchangeClient {
  private prices: PriceSource;
  private cash: number;
  private holdings: Map<string, PaperHolding> = new Map();
  private orderSeq = 0;

  constructor(prices: PriceSource, startingBalance: number) {
    this.prices = prices;
    this.cash = startingBalance;
  }

  async getMarkPrice(coin: string): Promise<number> {
    const price = this.prices.getLastPrice(coin);
    if (price === undefined || !Number.isFinite(price) || price <= 0) {
      throw new TransientExchangeError(`No mark price for ${coin} yet`);
    }
    return price;
  }

  async placeOrder(coin: string, side: PositionSide, size: number): Promise<PlacedOrder> {
    if (this.holdings.has(coin)) {
      throw new TransientExchangeError(`Paper account already holds ${coin}`);
    }
    const price = await this.getMarkPrice(coin);
    const notional = price * size;
    if (notional > this.cash) {
      throw new TransientExchangeError(`Insufficient paper balance for ${coin}: ${notional.toFixed(2)} > ${this.cash.toFixed(2)}`);
    }
    this.cash -= notional;
    this.holdings.set(coin, { side, size, entryPrice: price });
    const orderId = `paper_${++this.orderSeq}_${Date.now()}`;
    logger.info('PaperExchange', `📝 Filled ${side} ${coin} ${size} @ ${price}`, { orderId });
    return { orderId, entryPrice: price };
  }

  async closePosition(position: Readonly<Position>): Promise<ClosedOrder> {
    const holding = this.holdings.get(position.coin);
    if (!holding) {
      throw new TransientExchangeError(`Paper account holds no ${position.coin}`);
    }
    const price = await this.getMarkPrice(position.coin);
    const direction = holding.side === 'LONG' ? 1 : -1;
    const pnl = (price - holding.entryPrice) * holding.size * direction;
    this.cash += holding.entryPrice * holding.size + pnl;
    this.holdings.delete(position.coin);
    const orderId = `paper_${++this.orderSeq}_${Date.now()}`;
    logger.info('PaperExchange', `📝 Closed ${holding.side} ${position.coin} ${holding.size} @ ${price}`, { orderId, pnl });
    return { orderId, exitPrice: price };
  }

  async getAccountState(): Promise<AccountState> {
    let equity = this.cash;
    for (const [coin, holding] of this.holdings) {
      const price = this.prices.getLastPrice(coin) ?? holding.entryPrice;
      const direction = holding.side === 'LONG' ? 1 : -1;
      equity += holding.entryPrice * holding.size + (price - holding.entryPrice) * holding.size * direction;
    }
    return { equity, available: this.cash };
  }
}
