import { describe, expect, it } from 'vitest';
import { configFromEnv, parseConfig } from '../config';
import type { Candle, CandleInterval, CandleSource } from '../feeds/candleFetcher';
import type { SignalAction } from '../types';
import { buildStrategies } from './index';
import { macdStrength, MacdStrategy } from './macdStrategy';
import { DEFAULT_RSI_PARAMS, rsiStrength, RsiStrategy } from './rsiStrategy';
import { buyBand, rangeStrength, RangeLowStrategy } from './rangeLowStrategy';
import { isVolumeSpike, scalpingStrength, ScalpingStrategy } from './scalpingStrategy';
import { smaStrength, SmaCrossStrategy } from './smaCrossStrategy';

class FixedCandles implements CandleSource {
  requests: Array<{ coin: string; interval: CandleInterval; limit: number }> = [];
  closes: number[];
  volumes: number[];

  constructor(closes: number[], volumes: number[] = []) {
    this.closes = closes;
    this.volumes = volumes;
  }

  async fetchCandles(coin: string, interval: CandleInterval, limit: number): Promise<Candle[]> {
    this.requests.push({ coin, interval, limit });
    return this.closes.map((close, i) => ({
      openTime: i * 60_000,
      open: close,
      high: close,
      low: close,
      close,
      volume: this.volumes[i] ?? 1,
    }));
  }
}

function series(length: number, at: (i: number) => number): number[] {
  return Array.from({ length }, (_, i) => at(i));
}

function deps(candles: CandleSource) {
  return { candles, minRequestIntervalMs: 0, now: () => 42 };
}

describe('rsiStrength', () => {
  it.each<[number, SignalAction, number]>([
    [20, 'BUY', 0.6],
    [6, 'BUY', 0.8],
    [85, 'SELL', 0.6],
    [94, 'SELL', 0.8],
    [50, 'HOLD', 0],
  ])('rsi %d %s -> %d', (rsi, action, expected) => {
    expect(rsiStrength(rsi, action, DEFAULT_RSI_PARAMS)).toBeCloseTo(expected, 10);
  });
});

describe('RsiStrategy', () => {
  it('sells a market that only went up', async () => {
    const candles = new FixedCandles(series(64, (i) => 100 + i));
    const signal = await new RsiStrategy('rsi_1h', '1h', deps(candles)).generate('BTC');

    expect(signal).toMatchObject({ coin: 'BTC', action: 'SELL', strength: 1, source: 'rsi_1h', timestamp: 42 });
    expect(signal?.metadata).toMatchObject({ rsi: 100, period: 14, timeframe: '1h' });
    expect(candles.requests).toEqual([{ coin: 'BTC', interval: '1h', limit: 64 }]);
  });

  it('buys a market that only went down', async () => {
    const candles = new FixedCandles(series(64, (i) => 200 - i));
    const signal = await new RsiStrategy('rsi_5m', '5m', deps(candles)).generate('ETH');
    expect(signal).toMatchObject({ action: 'BUY', strength: 1 });
  });

  it('holds in a sideways market', async () => {
    const candles = new FixedCandles(series(64, (i) => (i % 2 === 0 ? 100 : 101)));
    const signal = await new RsiStrategy('rsi_5m', '5m', deps(candles)).generate('ETH');
    expect(signal).toMatchObject({ action: 'HOLD', strength: 0 });
  });

  it('has no opinion without enough candles', async () => {
    const candles = new FixedCandles(series(10, (i) => 100 + i));
    expect(await new RsiStrategy('rsi_1m', '1m', deps(candles)).generate('BTC')).toBeNull();
  });
});

describe('smaStrength', () => {
  it('scales with separation when price confirms the side', () => {
    expect(smaStrength(101, 100, 102, 'BUY')).toBeCloseTo(0.8, 10);
    expect(smaStrength(101, 100, 100.5, 'BUY')).toBe(0);
    expect(smaStrength(99, 100, 98, 'SELL')).toBeCloseTo(0.8, 10);
    expect(smaStrength(101, 100, 102, 'SELL')).toBe(0);
  });
});

describe('SmaCrossStrategy', () => {
  it('signals a trend once per coin', async () => {
    const candles = new FixedCandles(series(70, (i) => i + 1));
    const strategy = new SmaCrossStrategy('sma_5m', '5m', deps(candles));

    const first = await strategy.generate('BTC');
    expect(first).toMatchObject({ action: 'BUY', strength: 1, source: 'sma_5m' });
    expect(first?.metadata).toMatchObject({ shortSma: 65.5, longSma: 60.5, price: 70 });

    expect(await strategy.generate('BTC')).toMatchObject({ action: 'HOLD', strength: 0 });
    expect(await strategy.generate('ETH')).toMatchObject({ action: 'BUY' });
  });
});

describe('macdStrength', () => {
  it('starts at 0.7 and adds histogram and momentum boosts', () => {
    expect(macdStrength(1, -0.5, 'BUY')).toBeCloseTo(0.78, 10);
    expect(macdStrength(-10, 10, 'SELL')).toBeCloseTo(1, 10);
    expect(macdStrength(1, 0.5, 'HOLD')).toBe(0);
  });
});

describe('MacdStrategy', () => {
  it('has no opinion without enough candles', async () => {
    const candles = new FixedCandles(series(30, (i) => 100 + i));
    expect(await new MacdStrategy('macd_15m', '15m', deps(candles)).generate('BTC')).toBeNull();
    expect(candles.requests[0]).toEqual({ coin: 'BTC', interval: '15m', limit: 45 });
  });
});

describe('scalping helpers', () => {
  it('spots a volume spike against the last 20 candles', () => {
    expect(isVolumeSpike([...series(19, () => 1), 5], 1.5)).toBe(true);
    expect(isVolumeSpike([...series(19, () => 1), 1.5], 1.5)).toBe(false);
    expect(isVolumeSpike([1, 1, 9], 1.5)).toBe(false);
  });

  it('adds confluence on top of 0.6', () => {
    expect(scalpingStrength(50, 0.1, true, 'BUY')).toBeCloseTo(0.7, 10);
    expect(scalpingStrength(28, 0.8, true, 'BUY')).toBeCloseTo(1, 10);
    expect(scalpingStrength(68, -0.2, false, 'SELL')).toBeCloseTo(0.7, 10);
    expect(scalpingStrength(20, 2, true, 'HOLD')).toBe(0);
  });
});

describe('ScalpingStrategy', () => {
  // alternating closes cross the fast EMA over the slow one on every candle
  const zigzag = (length: number) => series(length, (i) => (i % 2 === 0 ? 100 : 101));
  const spike = (length: number) => series(length, (i) => (i === length - 1 ? 5 : 1));

  it('buys an upward cross on a volume spike', async () => {
    const candles = new FixedCandles(zigzag(100), spike(100));
    const signal = await new ScalpingStrategy('scalping_1m', '1m', deps(candles)).generate('BTC');

    expect(signal).toMatchObject({ action: 'BUY', source: 'scalping_1m' });
    expect(signal?.strength).toBeCloseTo(0.7, 10);
    expect(signal?.metadata).toMatchObject({ bullishCross: true, volumeSpike: true, timeframe: '1m' });
    expect(candles.requests).toEqual([{ coin: 'BTC', interval: '1m', limit: 100 }]);
  });

  it('sells a downward cross on a volume spike', async () => {
    const candles = new FixedCandles(zigzag(99), spike(99));
    const signal = await new ScalpingStrategy('scalping_1m', '1m', deps(candles)).generate('BTC');
    expect(signal).toMatchObject({ action: 'SELL' });
    expect(signal?.metadata).toMatchObject({ bearishCross: true });
  });

  it('holds a cross without volume', async () => {
    const candles = new FixedCandles(zigzag(100));
    const signal = await new ScalpingStrategy('scalping_1m', '1m', deps(candles)).generate('BTC');
    expect(signal).toMatchObject({ action: 'HOLD', strength: 0 });
    expect(signal?.metadata).toMatchObject({ bullishCross: true, volumeSpike: false });
  });

  it('has no opinion without enough candles', async () => {
    const candles = new FixedCandles(zigzag(24));
    expect(await new ScalpingStrategy('scalping_1m', '1m', deps(candles)).generate('BTC')).toBeNull();
  });
});

describe('range low helpers', () => {
  it('places the band from the offset and tolerance', () => {
    const [low, high] = buyBand(200, -1, 2);
    expect(low).toBeCloseTo(198, 10);
    expect(high).toBeCloseTo(202, 10);
  });

  it('is strongest at the bottom of the band', () => {
    expect(rangeStrength(198, 198, 202)).toBeCloseTo(1, 10);
    expect(rangeStrength(200, 198, 202)).toBeCloseTo(0.85, 10);
    expect(rangeStrength(202, 198, 202)).toBeCloseTo(0.7, 10);
    expect(rangeStrength(5, 5, 5)).toBe(0.85);
  });
});

describe('RangeLowStrategy', () => {
  const params = { lookback: 24, offsetPercent: -1, tolerancePercent: 2 };

  it('buys near the low of the window', async () => {
    const candles = new FixedCandles(series(24, (i) => (i === 23 ? 100 : 110)));
    const signal = await new RangeLowStrategy('range_24h_low', '1h', deps(candles), params).generate('SOL');

    expect(signal).toMatchObject({ coin: 'SOL', action: 'BUY', source: 'range_24h_low' });
    expect(signal?.strength).toBeCloseTo(0.85, 10);
    expect(signal?.metadata).toMatchObject({ low: 100, high: 110, bandLow: 99, bandHigh: 101, inRange: true });
    expect(candles.requests).toEqual([{ coin: 'SOL', interval: '1h', limit: 24 }]);
  });

  it('holds once price left the band', async () => {
    const candles = new FixedCandles(series(24, (i) => (i === 0 ? 100 : 110)));
    const signal = await new RangeLowStrategy('range_24h_low', '1h', deps(candles), params).generate('SOL');
    expect(signal).toMatchObject({ action: 'HOLD', strength: 0 });
    expect(signal?.metadata).toMatchObject({ price: 110, inRange: false });
  });

  it('has no opinion on a short window', async () => {
    const candles = new FixedCandles(series(23, () => 100));
    expect(await new RangeLowStrategy('range_24h_low', '1h', deps(candles), params).generate('SOL')).toBeNull();
  });
});

describe('buildStrategies', () => {
  it('builds every configured strategy with its cadence and flag', () => {
    const config = parseConfig(configFromEnv({ STRATEGY_RSI_4H_INTERVAL: '7200' }));
    const built = buildStrategies(config, new FixedCandles([]));

    expect(built.map((b) => [b.strategy.id, b.strategy.timeframe, b.intervalSeconds, b.enabled])).toEqual([
      ['rsi_1m', '1m', 60, true],
      ['rsi_5m', '5m', 300, true],
      ['rsi_1h', '1h', 3600, true],
      ['rsi_4h', '4h', 7200, true],
      ['sma_5m', '5m', 300, true],
      ['scalping_1m', '1m', 60, true],
      ['range_24h_low', '1h', 1800, false],
      ['range_7d_low', '1d', 3600, false],
      ['macd_15m', '15m', 900, false],
    ]);
  });
});
