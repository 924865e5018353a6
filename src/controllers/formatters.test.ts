import { describe, expect, it } from 'vitest';
import type { EngineStatus } from '../engine/tradingEngine';
import { makeOpenPosition, makeSignal, TEST_RISK } from '../testing/fakes';
import type { ClosedTrade } from '../types';
import {
  commandArgument,
  formatErrors,
  formatPosition,
  formatPositions,
  formatSignals,
  formatStatus,
  formatTrades,
} from './formatters';
import { isAllowedUser } from './telegramController';

const trade: ClosedTrade = {
  positionId: 'pos_BTC_test',
  coin: 'BTC',
  side: 'LONG',
  source: 'rsi_1h',
  entryPrice: 100,
  exitPrice: 104,
  size: 1,
  reason: 'TAKE_PROFIT',
  pnl: 4,
  pnlPercent: 4,
  openedAt: 0,
  closedAt: 1_000,
};

describe('formatters', () => {
  it('formats an open position with its levels and move', () => {
    const position = makeOpenPosition('BTC', 'LONG', 50_000, TEST_RISK, { size: 0.002, lastPrice: 50_500 });
    expect(formatPosition(position)).toBe(
      ['🟢 BTC LONG 0.002 @ 50000.00 [OPEN]', '   SL 49000.00 | TP 52000.00', '   Last 50500.00 (+1.00%)'].join('\n'),
    );
  });

  it('shows the trailing band once armed and flags failed closes', () => {
    const position = makeOpenPosition('ETH', 'SHORT', 100, TEST_RISK, {
      status: 'FAILED',
      trailingArmed: true,
      trailingWatermark: 99,
      trailingStopPrice: 99.5,
      closeAttempts: 3,
      error: 'close rejected',
    });
    expect(formatPosition(position)).toBe(
      [
        '🔴 ETH SHORT 1 @ 100.0000 [FAILED]',
        '   SL 102.0000 | TP 96.0000',
        '   Trail 99.5000 (peak 99.0000)',
        '   ⚠️ Close failed 3x: close rejected',
      ].join('\n'),
    );
  });

  it('reports empty lists', () => {
    expect(formatPositions([])).toBe('📭 No open positions');
    expect(formatSignals([])).toBe('📭 No recent signals');
    expect(formatTrades([])).toBe('📭 No closed trades');
    expect(formatErrors([])).toBe('✅ No recent errors');
  });

  it('lists signals newest first', () => {
    const text = formatSignals([
      makeSignal({ coin: 'BTC', timestamp: 0 }),
      makeSignal({ coin: 'ETH', action: 'SELL', strength: 0.9, timestamp: 61_000 }),
    ]);
    expect(text).toBe(
      ['📈 Recent Signals:', '00:01:01 test_strategy: SELL ETH (0.90)', '00:00:00 test_strategy: BUY BTC (0.80)'].join('\n'),
    );
  });

  it('lists trades with a total', () => {
    const loss: ClosedTrade = { ...trade, coin: 'SOL', exitPrice: 98, pnl: -2, pnlPercent: -2, reason: 'STOP_LOSS' };
    expect(formatTrades([trade, loss])).toBe(
      [
        '💰 Recent Trades:',
        '❌ SOL LONG 100.0000 → 98.0000 -2.00 (-2.00%) STOP_LOSS',
        '✅ BTC LONG 100.0000 → 104.0000 +4.00 (+4.00%) TAKE_PROFIT',
        'Total: +2.00',
      ].join('\n'),
    );
  });

  it('summarizes engine status', () => {
    const status: EngineStatus = {
      running: true,
      startedAt: 0,
      coins: ['BTC', 'ETH'],
      strategies: [
        { id: 'rsi_1h', timeframe: '1h', intervalSeconds: 3600, enabled: true },
        { id: 'macd_15m', timeframe: '15m', intervalSeconds: 900, enabled: false },
      ],
      risk: TEST_RISK,
      account: { equity: 1020.5, available: 900 },
      scheduler: { running: true, entries: 4, dispatched: 10, failed: 1, skippedOverlaps: 0, signals: 7, invalidSignals: 0, droppedSignals: 0 },
      gate: { admitted: 2, rejected: {}, day: '2024-01-01', dailyTrades: { BTC: 2 }, totalDailyTrades: 2 },
      lifecycle: { monitoring: true, open: 1, closing: 0, needsAttention: 0, closed: 1, closeFailures: 0, priceFailures: 0 },
    };
    expect(formatStatus(status)).toBe(
      [
        '🤖 Engine running',
        'Coins: BTC, ETH',
        'Strategies: rsi_1h',
        'Disabled: macd_15m',
        'Positions: 1 open, 0 closing, 0 need attention (max 3)',
        'Signals: 7 | Admitted: 2 | Closed: 1',
        'Trades today: 2',
        'Equity: 1020.50 | Available: 900.00',
      ].join('\n'),
    );
  });

  it('extracts the first command argument', () => {
    expect(commandArgument('/close btc')).toBe('btc');
    expect(commandArgument('/enable   rsi_1h  extra')).toBe('rsi_1h');
    expect(commandArgument('/close')).toBeNull();
  });
});

describe('formatErrors', () => {
  it('lists errors newest first with their source', () => {
    expect(
      formatErrors([
        { source: 'Lifecycle', message: 'close rejected for BTC', timestamp: 1_000 },
        { source: 'Scheduler', message: 'rsi_1m BTC: timeout', timestamp: 61_000 },
      ]),
    ).toBe(
      ['⚠️ Recent Errors:', '00:01:01 [Scheduler] rsi_1m BTC: timeout', '00:00:01 [Lifecycle] close rejected for BTC'].join('\n'),
    );
  });
});

describe('isAllowedUser', () => {
  it('allows everyone when no list is configured', () => {
    expect(isAllowedUser([], 123)).toBe(true);
  });

  it('allows only listed ids otherwise', () => {
    expect(isAllowedUser(['123'], 123)).toBe(true);
    expect(isAllowedUser(['123'], 456)).toBe(false);
    expect(isAllowedUser(['123'], undefined)).toBe(false);
  });
});
