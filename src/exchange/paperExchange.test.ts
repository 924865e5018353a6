import { describe, expect, it } from 'vitest';
import { TransientExchangeError } from '../lib/errors';
import { makeOpenPosition } from '../testing/fakes';
import { PaperExchange } from './paperExchange';
import type { PriceSource } from './paperExchange';

class StaticPrices implements PriceSource {
  prices: Map<string, number> = new Map();

  getLastPrice(coin: string): number | undefined {
    return this.prices.get(coin);
  }
}

describe('PaperExchange', () => {
  it('fills at the last price and settles P&L into cash on close', async () => {
    const prices = new StaticPrices();
    prices.prices.set('BTC', 100);
    const exchange = new PaperExchange(prices, 1_000);

    const order = await exchange.placeOrder('BTC', 'LONG', 2);
    expect(order.entryPrice).toBe(100);
    expect(await exchange.getAccountState()).toEqual({ equity: 1_000, available: 800 });

    prices.prices.set('BTC', 110);
    expect(await exchange.getAccountState()).toEqual({ equity: 1_020, available: 800 });

    const closed = await exchange.closePosition(makeOpenPosition('BTC', 'LONG', 100, undefined, { size: 2 }));
    expect(closed.exitPrice).toBe(110);
    expect(await exchange.getAccountState()).toEqual({ equity: 1_020, available: 1_020 });
  });

  it('credits a SHORT when the price falls', async () => {
    const prices = new StaticPrices();
    prices.prices.set('ETH', 50);
    const exchange = new PaperExchange(prices, 100);

    await exchange.placeOrder('ETH', 'SHORT', 1);
    prices.prices.set('ETH', 40);
    await exchange.closePosition(makeOpenPosition('ETH', 'SHORT', 50));
    expect((await exchange.getAccountState()).available).toBe(110);
  });

  it('rejects without a price, over the balance, twice per coin, or closing nothing', async () => {
    const prices = new StaticPrices();
    const exchange = new PaperExchange(prices, 100);

    await expect(exchange.getMarkPrice('BTC')).rejects.toThrow(TransientExchangeError);
    prices.prices.set('BTC', 100);
    await expect(exchange.placeOrder('BTC', 'LONG', 2)).rejects.toThrow('Insufficient paper balance for BTC: 200.00 > 100.00');
    await exchange.placeOrder('BTC', 'LONG', 0.5);
    await expect(exchange.placeOrder('BTC', 'LONG', 0.1)).rejects.toThrow('Paper account already holds BTC');
    await expect(exchange.closePosition(makeOpenPosition('SOL', 'LONG', 10))).rejects.toThrow('Paper account holds no SOL');
  });
});
