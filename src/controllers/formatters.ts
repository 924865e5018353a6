import type { EngineStatus } from '../engine/tradingEngine';
import type { ErrorEntry } from '../sinks/memoryStateSink';
import type { ClosedTrade, Position, Signal } from '../types';

function price(value: number): string {
  if (value >= 1000) return value.toFixed(2);
  if (value >= 1) return value.toFixed(4);
  return value.toPrecision(4);
}

function signed(value: number, decimals = 2): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(decimals)}`;
}

function time(ms: number): string {
  return new Date(ms).toISOString().slice(11, 19);
}

export function formatPosition(p: Position): string {
  const lines = [`${p.side === 'LONG' ? '🟢' : '🔴'} ${p.coin} ${p.side} ${p.size} @ ${price(p.entryPrice)} [${p.status}]`];
  if (p.status === 'OPENING') return lines[0] ?? '';
  lines.push(`   SL ${price(p.stopLossPrice)} | TP ${price(p.takeProfitPrice)}`);
  if (p.trailingArmed) {
    lines.push(`   Trail ${price(p.trailingStopPrice)} (peak ${price(p.trailingWatermark)})`);
  }
  if (p.lastPrice !== undefined && p.entryPrice > 0) {
    const move = ((p.lastPrice - p.entryPrice) / p.entryPrice) * 100 * (p.side === 'LONG' ? 1 : -1);
    lines.push(`   Last ${price(p.lastPrice)} (${signed(move)}%)`);
  }
  if (p.status === 'FAILED') {
    lines.push(`   ⚠️ Close failed ${p.closeAttempts}x: ${p.error ?? 'unknown error'}`);
  }
  return lines.join('\n');
}

export function formatPositions(positions: Position[]): string {
  if (positions.length === 0) return '📭 No open positions';
  return `📊 Positions:\n${positions.map(formatPosition).join('\n')}`;
}

export function formatSignal(s: Signal): string {
  return `${time(s.timestamp)} ${s.source}: ${s.action} ${s.coin} (${s.strength.toFixed(2)})`;
}

export function formatSignals(signals: Signal[]): string {
  if (signals.length === 0) return '📭 No recent signals';
  return `📈 Recent Signals:\n${[...signals].reverse().map(formatSignal).join('\n')}`;
}

export function formatTrade(t: ClosedTrade): string {
  const icon = t.pnl >= 0 ? '✅' : '❌';
  return `${icon} ${t.coin} ${t.side} ${price(t.entryPrice)} → ${price(t.exitPrice)} ${signed(t.pnl)} (${signed(t.pnlPercent)}%) ${t.reason}`;
}

export function formatTrades(trades: ClosedTrade[]): string {
  if (trades.length === 0) return '📭 No closed trades';
  const total = trades.reduce((sum, t) => sum + t.pnl, 0);
  return `💰 Recent Trades:\n${[...trades].reverse().map(formatTrade).join('\n')}\nTotal: ${signed(total)}`;
}

export function formatErrors(errors: ErrorEntry[]): string {
  if (errors.length === 0) return '✅ No recent errors';
  const lines = [...errors].reverse().map((e) => `${time(e.timestamp)} [${e.source}] ${e.message}`);
  return `⚠️ Recent Errors:\n${lines.join('\n')}`;
}

export function formatStatus(status: EngineStatus): string {
  const enabled = status.strategies.filter((s) => s.enabled).map((s) => s.id);
  const disabled = status.strategies.filter((s) => !s.enabled).map((s) => s.id);
  const lines = [
    `🤖 Engine ${status.running ? 'running' : 'stopped'}`,
    `Coins: ${status.coins.join(', ')}`,
    `Strategies: ${enabled.join(', ') || 'none'}`,
  ];
  if (disabled.length > 0) lines.push(`Disabled: ${disabled.join(', ')}`);
  lines.push(
    `Positions: ${status.lifecycle.open} open, ${status.lifecycle.closing} closing, ${status.lifecycle.needsAttention} need attention (max ${status.risk.maxPositions})`,
    `Signals: ${status.scheduler.signals} | Admitted: ${status.gate.admitted} | Closed: ${status.lifecycle.closed}`,
    `Trades today: ${status.gate.totalDailyTrades}`,
  );
  if (status.account) {
    lines.push(`Equity: ${status.account.equity.toFixed(2)} | Available: ${status.account.available.toFixed(2)}`);
  }
  return lines.join('\n');
}

export const HELP_TEXT = [
  '🤖 Commands',
  '',
  '/status - Engine status',
  '/positions - Open positions',
  '/signals - Recent signals',
  '/trades - Recent closed trades',
  '/errors - Recent errors',
  '/enable <strategy> - Enable a strategy',
  '/disable <strategy> - Disable a strategy',
  '/close <coin> - Close a position',
  '/retry <coin> - Retry a failed close',
  '/dismiss <coin> - Forget a failed position',
  '/reload - Reload risk settings',
  '/stop - Emergency stop: close all and halt',
  '/ping - Health check',
].join('\n');

/** First argument of a command message, e.g. "/close btc" -> "btc". */
export function commandArgument(text: string): string | null {
  const [, arg] = text.trim().split(/\s+/);
  return arg ? arg : null;
}
