import type { Config } from '../config';
import type { RiskConfigSource } from '../config/riskConfigSource';
import type { AccountState, ExchangeClient } from '../exchange/exchangeClient';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import { TimeframeScheduler } from '../scheduler/timeframeScheduler';
import type { SchedulerStats } from '../scheduler/timeframeScheduler';
import type { ErrorEntry, MemoryStateSink } from '../sinks/memoryStateSink';
import type { ConfiguredStrategy } from '../strategies';
import type { ClosedTrade, Position, RiskConfig, Signal } from '../types';
import { OrderGate } from './orderGate';
import type { OrderGateStats } from './orderGate';
import { PositionBook } from './positionBook';
import { PositionLifecycleManager } from './positionLifecycle';
import type { LifecycleStats } from './positionLifecycle';

export interface EngineDeps {
  config: Config;
  exchange: ExchangeClient;
  strategies: ConfiguredStrategy[];
  risk: RiskConfigSource;
  sink: MemoryStateSink;
  now?: () => number;
}

export interface StrategyStatus {
  id: string;
  timeframe: string;
  intervalSeconds: number;
  enabled: boolean;
}

export interface EngineStatus {
  running: boolean;
  startedAt: number | null;
  coins: string[];
  strategies: StrategyStatus[];
  risk: Readonly<RiskConfig>;
  account: AccountState | null;
  scheduler: SchedulerStats;
  gate: OrderGateStats;
  lifecycle: LifecycleStats;
}

/**
 * One trading session. Builds the position book, order gate, lifecycle
 * manager and scheduler, registers every strategy for every coin, and exposes
 * the control surface used by the CLI and Telegram.
 */
export class TradingEngine {
  private config: Config;
  private exchange: ExchangeClient;
  private strategies: ConfiguredStrategy[];
  private risk: RiskConfigSource;
  private sink: MemoryStateSink;
  private now: () => number;
  private book = new PositionBook();
  private gate: OrderGate;
  private lifecycle: PositionLifecycleManager;
  private scheduler: TimeframeScheduler;
  private loop: Promise<void> | null = null;
  private startedAt: number | null = null;

  constructor(deps: EngineDeps) {
    this.config = deps.config;
    this.exchange = deps.exchange;
    this.strategies = deps.strategies;
    this.risk = deps.risk;
    this.sink = deps.sink;
    this.now = deps.now ?? Date.now;

    const timeoutMs = this.config.requests.timeoutMs;
    this.lifecycle = new PositionLifecycleManager(this.book, this.exchange, this.risk, this.sink, {
      tickMs: this.config.monitor.tickMs,
      timeoutMs,
      now: this.now,
    });
    this.gate = new OrderGate(this.book, this.exchange, this.risk, this.lifecycle, this.sink, {
      timeoutMs,
      now: this.now,
    });
    this.scheduler = new TimeframeScheduler(this.gate, this.sink, {
      tickMs: this.config.scheduler.tickMs,
      timeoutMs,
      queueCapacity: this.config.scheduler.queueCapacity,
      now: this.now,
    });

    for (const { strategy, intervalSeconds, enabled } of this.strategies) {
      for (const coin of this.config.trading.coins) {
        this.scheduler.register(strategy, coin, intervalSeconds);
      }
      if (!enabled) this.scheduler.setEnabled(strategy.id, false);
    }
  }

  start(): void {
    if (this.loop) return;
    this.startedAt = this.now();
    this.lifecycle.start();
    this.loop = this.scheduler.runForever();
    logger.info('Engine', `🚀 Session started: ${this.config.trading.coins.join(', ')}`, {
      strategies: this.strategies.filter((s) => s.enabled).map((s) => s.strategy.id),
    });
  }

  /** Stop both loops; open positions stay on the exchange. */
  async stop(): Promise<void> {
    await this.scheduler.stop();
    await this.lifecycle.stop();
    if (this.loop) {
      await this.loop;
      this.loop = null;
    }
    logger.info('Engine', '🛑 Session stopped');
  }

  /** Halt signal dispatch, close every position, then stop monitoring. */
  async emergencyStop(): Promise<Position[]> {
    logger.warn('Engine', '🚨 Emergency stop requested');
    await this.scheduler.stop();
    await this.lifecycle.closeAll('EMERGENCY');
    await this.stop();
    const remaining = this.lifecycle.getPositions();
    if (remaining.length > 0) {
      logger.error('Engine', `${remaining.length} position(s) could not be closed`, {
        coins: remaining.map((p) => p.coin),
      });
    }
    return remaining;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  async getStatus(): Promise<EngineStatus> {
    const entries = this.scheduler.getEntries();
    const strategies = this.strategies.map(({ strategy, intervalSeconds }) => ({
      id: strategy.id,
      timeframe: strategy.timeframe,
      intervalSeconds,
      enabled: entries.some((e) => e.strategyId === strategy.id && e.enabled),
    }));
    return {
      running: this.running,
      startedAt: this.startedAt,
      coins: [...this.config.trading.coins],
      strategies,
      risk: this.risk.current(),
      account: await this.accountState(),
      scheduler: this.scheduler.getStats(),
      gate: this.gate.getStats(),
      lifecycle: this.lifecycle.getStats(),
    };
  }

  getPositions(): Position[] {
    return this.lifecycle.getPositions();
  }

  getSignals(limit = 10): Signal[] {
    return this.sink.getSignals(limit);
  }

  getTrades(limit = 10): ClosedTrade[] {
    return this.sink.getTrades(limit);
  }

  getErrors(limit = 10): ErrorEntry[] {
    return this.sink.getErrors(limit);
  }

  enableStrategy(id: string): boolean {
    return this.scheduler.setEnabled(id, true);
  }

  disableStrategy(id: string): boolean {
    return this.scheduler.setEnabled(id, false);
  }

  closePosition(coin: string): Promise<boolean> {
    return this.lifecycle.closePosition(coin, 'MANUAL');
  }

  retryClose(coin: string): Promise<boolean> {
    return this.lifecycle.retryClose(coin);
  }

  dismissPosition(coin: string): Promise<boolean> {
    return this.lifecycle.dismiss(coin);
  }

  /** Swap in a fresh risk snapshot; throws ConfigurationError and keeps the old one on failure. */
  reloadRisk(): Readonly<RiskConfig> {
    return this.risk.reload();
  }

  private async accountState(): Promise<AccountState | null> {
    try {
      return await withTimeout(this.exchange.getAccountState(), this.config.requests.timeoutMs, 'getAccountState');
    } catch (error) {
      logger.warn('Engine', 'Account state unavailable', { error: errorMessage(error) });
      return null;
    }
  }
}
