import type { ExchangeClient } from '../exchange/exchangeClient';
import { errorMessage } from '../lib/errors';
import { KeyedLock } from '../lib/keyedLock';
import { logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import type { StateSink } from '../sinks/stateSink';
import type { CloseReason, ClosedTrade, Position } from '../types';
import { evaluateExit, realizedPnl } from './exitRules';
import type { PositionHandoff, RiskProvider } from './orderGate';
import type { PositionBook } from './positionBook';

export interface LifecycleOptions {
  tickMs: number;
  timeoutMs: number;
  now?: () => number;
}

export interface LifecycleStats {
  monitoring: boolean;
  open: number;
  closing: number;
  needsAttention: number;
  closed: number;
  closeFailures: number;
  priceFailures: number;
}

/**
 * Supervises positions from OPEN to CLOSED. A fixed-interval loop polls the
 * mark price of every OPEN position, advances its trailing stop and closes it
 * when an exit rule fires; CLOSING positions get their close retried until
 * maxCloseRetries, after which they are parked as FAILED for an operator.
 *
 *   OPENING -> OPEN -> CLOSING -> CLOSED
 *   OPENING -> FAILED (order gate)      CLOSING -> FAILED (retries exhausted)
 */
export class PositionLifecycleManager implements PositionHandoff {
  private book: PositionBook;
  private exchange: ExchangeClient;
  private risk: RiskProvider;
  private sink: StateSink;
  private tickMs: number;
  private timeoutMs: number;
  private now: () => number;
  private timer: NodeJS.Timeout | null = null;
  /** One supervision task per position id at a time. */
  private supervision = new KeyedLock();
  private pending: Set<Promise<void>> = new Set();
  private closedCount = 0;
  private closeFailures = 0;
  private priceFailures = 0;

  constructor(book: PositionBook, exchange: ExchangeClient, risk: RiskProvider, sink: StateSink, options: LifecycleOptions) {
    this.book = book;
    this.exchange = exchange;
    this.risk = risk;
    this.sink = sink;
    this.tickMs = options.tickMs;
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.timer) return;
    logger.info('Lifecycle', `Position monitoring started (interval=${this.tickMs}ms)`);
    this.timer = setInterval(() => {
      this.trackPending(this.tick());
    }, this.tickMs);
  }

  /** Stops new ticks; checks and closes already in flight run to completion or timeout. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      logger.info('Lifecycle', 'Position monitoring stopped');
    }
    await Promise.allSettled(Array.from(this.pending));
  }

  track(position: Position): void {
    logger.info('Lifecycle', `👁 Monitoring ${position.side} ${position.coin}`, {
      positionId: position.id,
      entry: position.entryPrice,
      stopLoss: position.stopLossPrice,
      takeProfit: position.takeProfitPrice,
    });
    this.sink.publishPositionUpdate(position);
  }

  /** One monitoring pass. Positions are checked concurrently and independently. */
  async tick(): Promise<void> {
    const work: Promise<void>[] = [];
    for (const position of this.book.list()) {
      if (position.status !== 'OPEN' && position.status !== 'CLOSING') continue;
      if (this.supervision.isBusy(position.id)) continue;
      work.push(this.exclusive(position, () => this.check(position)));
    }
    await Promise.allSettled(work);
  }

  /** Manual or emergency close of an OPEN position. */
  async closePosition(coin: string, reason: CloseReason = 'MANUAL'): Promise<boolean> {
    const position = this.book.get(coin);
    if (!position || position.status !== 'OPEN') return false;
    this.markClosing(position, reason);
    let closed = false;
    // waits behind an in-flight check, which sees CLOSING and backs off
    await this.exclusive(position, async () => {
      if (position.status === 'CLOSING') closed = await this.attemptClose(position);
    });
    return closed;
  }

  async closeAll(reason: CloseReason = 'EMERGENCY'): Promise<void> {
    logger.warn('Lifecycle', `🚨 Closing all positions (${reason})`);
    const work = this.book.list().map(async (position) => {
      if (position.status === 'OPEN') {
        await this.closePosition(position.coin, reason);
      } else if (position.status === 'CLOSING') {
        await this.exclusive(position, async () => {
          if (position.status === 'CLOSING') await this.attemptClose(position);
        });
      }
    });
    await Promise.allSettled(work);
  }

  /** Re-arm a parked FAILED close for another round of attempts. */
  async retryClose(coin: string): Promise<boolean> {
    const position = this.book.get(coin);
    if (!position || position.status !== 'FAILED') return false;
    position.status = 'CLOSING';
    position.closeAttempts = 0;
    position.closeReason = position.closeReason ?? 'MANUAL';
    this.sink.publishPositionUpdate(position);
    let closed = false;
    await this.exclusive(position, async () => {
      if (position.status === 'CLOSING') closed = await this.attemptClose(position);
    });
    return closed;
  }

  /**
   * Forget a parked FAILED position after it was resolved on the exchange by
   * hand. Frees the coin slot.
   */
  async dismiss(coin: string): Promise<boolean> {
    return this.book.withCoinLock(coin, () => {
      const position = this.book.get(coin);
      if (!position || position.status !== 'FAILED') return false;
      this.book.remove(coin, position.id);
      position.status = 'CLOSED';
      position.closedAt = this.now();
      position.error = 'dismissed';
      logger.warn('Lifecycle', `Dismissed failed position ${position.id}`, { coin });
      this.sink.publishPositionUpdate(position);
      return true;
    });
  }

  getPositions(): Position[] {
    return this.book.list().map((p) => ({ ...p }));
  }

  getStats(): LifecycleStats {
    const positions = this.book.list();
    return {
      monitoring: this.timer !== null,
      open: positions.filter((p) => p.status === 'OPEN').length,
      closing: positions.filter((p) => p.status === 'CLOSING').length,
      needsAttention: positions.filter((p) => p.status === 'FAILED').length,
      closed: this.closedCount,
      closeFailures: this.closeFailures,
      priceFailures: this.priceFailures,
    };
  }

  private async check(position: Position): Promise<void> {
    if (position.status === 'CLOSING') {
      await this.attemptClose(position);
      return;
    }

    let price: number;
    try {
      price = await withTimeout(this.exchange.getMarkPrice(position.coin), this.timeoutMs, `getMarkPrice(${position.coin})`);
    } catch (error) {
      this.priceFailures++;
      logger.warn('Lifecycle', `Mark price unavailable for ${position.coin}`, { error: errorMessage(error) });
      this.sink.publishError('Lifecycle', error);
      return;
    }
    if (position.status !== 'OPEN') return;
    if (!Number.isFinite(price) || price <= 0) {
      this.priceFailures++;
      logger.warn('Lifecycle', `Ignoring unusable mark price for ${position.coin}`, { price });
      return;
    }

    const decision = evaluateExit(position, price, this.risk.current());
    const { trailing } = decision;
    if (trailing.trailingArmed && !position.trailingArmed) {
      logger.info('Lifecycle', `Trailing stop armed for ${position.coin}`, { watermark: trailing.trailingWatermark });
    }
    position.lastPrice = price;
    position.trailingWatermark = trailing.trailingWatermark;
    position.trailingStopPrice = trailing.trailingStopPrice;
    position.trailingArmed = trailing.trailingArmed;

    if (!decision.reason) {
      this.sink.publishPositionUpdate(position);
      return;
    }

    logger.info('Lifecycle', `🔴 EXIT SIGNAL: ${position.coin} - ${decision.reason}`, {
      price,
      entry: position.entryPrice,
      stopLoss: position.stopLossPrice,
      takeProfit: position.takeProfitPrice,
      trailingStop: position.trailingStopPrice,
    });
    this.markClosing(position, decision.reason);
    await this.attemptClose(position);
  }

  private markClosing(position: Position, reason: CloseReason): void {
    position.status = 'CLOSING';
    position.closeReason = reason;
    this.sink.publishPositionUpdate(position);
  }

  private async attemptClose(position: Position): Promise<boolean> {
    position.closeAttempts++;
    const reason = position.closeReason ?? 'MANUAL';
    try {
      const result = await withTimeout(
        this.exchange.closePosition(position),
        this.timeoutMs,
        `closePosition(${position.coin})`,
      );
      const trade = await this.book.withCoinLock(position.coin, () => this.confirmClose(position, result.exitPrice, reason));
      this.closedCount++;
      logger.info('Lifecycle', `✅ Closed ${position.side} ${position.coin} @ ${trade.exitPrice} (${reason})`, {
        pnl: trade.pnl,
        pnlPercent: trade.pnlPercent,
      });
      this.sink.publishPositionUpdate(position);
      this.sink.publishTrade(trade);
      return true;
    } catch (error) {
      this.closeFailures++;
      position.error = errorMessage(error);
      const maxRetries = this.risk.current().maxCloseRetries;
      if (position.closeAttempts >= maxRetries) {
        position.status = 'FAILED';
        logger.error('Lifecycle', `❌ Close of ${position.coin} failed ${position.closeAttempts} times, manual intervention required`, {
          positionId: position.id,
          error: position.error,
        });
      } else {
        logger.warn('Lifecycle', `Close of ${position.coin} failed, retrying next tick`, {
          attempt: position.closeAttempts,
          maxRetries,
          error: position.error,
        });
      }
      this.sink.publishError('Lifecycle', error);
      this.sink.publishPositionUpdate(position);
      return false;
    }
  }

  private confirmClose(position: Position, exitPrice: number, reason: CloseReason): ClosedTrade {
    const closedAt = this.now();
    const { pnl, pnlPercent } = realizedPnl(position.side, position.entryPrice, exitPrice, position.size);
    position.status = 'CLOSED';
    position.exitPrice = exitPrice;
    position.closedAt = closedAt;
    position.realizedPnl = pnl;
    position.error = undefined;
    this.book.remove(position.coin, position.id);
    return {
      positionId: position.id,
      coin: position.coin,
      side: position.side,
      source: position.source,
      entryPrice: position.entryPrice,
      exitPrice,
      size: position.size,
      reason,
      pnl,
      pnlPercent,
      openedAt: position.openedAt,
      closedAt,
    };
  }

  /** Holds the position's supervision lock for the duration of fn; ticks skip busy positions. */
  private async exclusive(position: Position, fn: () => Promise<void>): Promise<void> {
    try {
      await this.supervision.run(position.id, fn);
    } catch (error) {
      logger.error('Lifecycle', `Unexpected error while supervising ${position.coin}`, { error: errorMessage(error) });
      this.sink.publishError('Lifecycle', error);
    }
  }

  private trackPending(work: Promise<void>): void {
    this.pending.add(work);
    work.finally(() => this.pending.delete(work)).catch((error: unknown) => {
      logger.error('Lifecycle', 'Monitoring tick failed', { error: errorMessage(error) });
    });
  }
}
