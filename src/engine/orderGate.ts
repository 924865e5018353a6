import type { ExchangeClient, PlacedOrder } from '../exchange/exchangeClient';
import { errorMessage, InvalidSignalError, TransientExchangeError } from '../lib/errors';
import { logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import type { StateSink } from '../sinks/stateSink';
import { sideForAction } from '../types';
import type { AdmissionResult, Position, PositionSide, RejectionReason, RiskConfig, Signal } from '../types';
import { entryLevels } from './exitRules';
import type { PositionBook } from './positionBook';
import { describeSignal, findSignalViolation } from './signalRules';

export interface RiskProvider {
  current(): Readonly<RiskConfig>;
}

/** Receives a freshly opened position for supervision. */
export interface PositionHandoff {
  track(position: Position): void;
}

export interface OrderGateOptions {
  timeoutMs: number;
  now?: () => number;
}

export interface OrderGateStats {
  admitted: number;
  rejected: Partial<Record<RejectionReason, number>>;
  /** UTC day the daily counters belong to, YYYY-MM-DD */
  day: string;
  dailyTrades: Record<string, number>;
  totalDailyTrades: number;
}

type Reservation = { ok: true; position: Position } | { ok: false; reason: RejectionReason; detail: string };

/** Coin units are rounded to five decimals before hitting the exchange. */
const SIZE_DECIMALS = 5;

function roundSize(size: number): number {
  const factor = 10 ** SIZE_DECIMALS;
  return Math.round(size * factor) / factor;
}

function utcDay(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/**
 * Turns signals into positions. Admission for one coin is serialized by the
 * book's coin lock; the slot is reserved as OPENING before the exchange is
 * called, so a second signal for that coin is refused while the order is in
 * flight.
 */
export class OrderGate {
  private book: PositionBook;
  private exchange: ExchangeClient;
  private risk: RiskProvider;
  private handoff: PositionHandoff;
  private sink: StateSink;
  private timeoutMs: number;
  private now: () => number;
  private lastOrderAt: Map<string, number> = new Map();
  private positionSeq = 0;
  private stats: OrderGateStats;

  constructor(
    book: PositionBook,
    exchange: ExchangeClient,
    risk: RiskProvider,
    handoff: PositionHandoff,
    sink: StateSink,
    options: OrderGateOptions,
  ) {
    this.book = book;
    this.exchange = exchange;
    this.risk = risk;
    this.handoff = handoff;
    this.sink = sink;
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? Date.now;
    this.stats = { admitted: 0, rejected: {}, day: utcDay(this.now()), dailyTrades: {}, totalDailyTrades: 0 };
  }

  async submit(signal: Signal): Promise<AdmissionResult> {
    const violation = findSignalViolation(signal);
    if (violation) {
      logger.warn('OrderGate', `Invalid signal dropped: ${violation}`, { source: String(signal.source), coin: String(signal.coin) });
      this.sink.publishError('OrderGate', new InvalidSignalError(violation));
      return this.reject('INVALID_SIGNAL', violation);
    }
    if (signal.action === 'HOLD') {
      return this.reject('HOLD', 'HOLD signals are never admitted');
    }

    const risk = this.risk.current();
    if (signal.strength < risk.minSignalStrength) {
      logger.debug('OrderGate', `Signal too weak: ${describeSignal(signal)}`, { min: risk.minSignalStrength });
      return this.reject('WEAK_SIGNAL', `strength ${signal.strength} < ${risk.minSignalStrength}`);
    }

    const side = sideForAction(signal.action);
    const reservation = await this.book.withCoinLock(signal.coin, () => this.reserve(signal, side, risk));
    if (!reservation.ok) {
      logger.info('OrderGate', `✗ ${describeSignal(signal)} rejected: ${reservation.detail}`);
      return this.reject(reservation.reason, reservation.detail);
    }

    return this.execute(reservation.position, risk);
  }

  getStats(): OrderGateStats {
    this.rollDay();
    return { ...this.stats, rejected: { ...this.stats.rejected }, dailyTrades: { ...this.stats.dailyTrades } };
  }

  /** Runs under the coin lock and contains no await: check and reserve are one step. */
  private reserve(signal: Signal, side: PositionSide, risk: Readonly<RiskConfig>): Reservation {
    const { coin } = signal;
    const existing = this.book.get(coin);
    if (existing) {
      if (existing.status === 'FAILED') {
        return { ok: false, reason: 'NEEDS_ATTENTION', detail: `${coin} has an unresolved failed close (${existing.id})` };
      }
      return { ok: false, reason: 'DUPLICATE_POSITION', detail: `${coin} already ${existing.status}` };
    }
    if (this.book.size >= risk.maxPositions) {
      return { ok: false, reason: 'MAX_POSITIONS', detail: `position limit reached: ${this.book.size}/${risk.maxPositions}` };
    }
    const last = this.lastOrderAt.get(coin);
    if (last !== undefined) {
      const elapsed = this.now() - last;
      if (elapsed < risk.cooldownSeconds * 1000) {
        const remaining = Math.ceil((risk.cooldownSeconds * 1000 - elapsed) / 1000);
        return { ok: false, reason: 'COOLDOWN', detail: `${coin} in cooldown: ${remaining}s remaining` };
      }
    }

    const position: Position = {
      id: `pos_${coin}_${this.now()}_${++this.positionSeq}`,
      coin,
      side,
      source: signal.source,
      status: 'OPENING',
      entryPrice: 0,
      size: 0,
      openedAt: this.now(),
      stopLossPrice: 0,
      takeProfitPrice: 0,
      trailingWatermark: 0,
      trailingStopPrice: 0,
      trailingArmed: false,
      closeAttempts: 0,
    };
    this.book.insert(position);
    this.sink.publishPositionUpdate(position);
    return { ok: true, position };
  }

  private async execute(position: Position, risk: Readonly<RiskConfig>): Promise<AdmissionResult> {
    const { coin, side } = position;
    let order: PlacedOrder;
    let size: number;
    try {
      const price = await withTimeout(this.exchange.getMarkPrice(coin), this.timeoutMs, `getMarkPrice(${coin})`);
      if (!Number.isFinite(price) || price <= 0) {
        throw new TransientExchangeError(`Unusable mark price for ${coin}: ${price}`);
      }
      size = roundSize(risk.positionSize / price);
      if (size <= 0) {
        throw new TransientExchangeError(`Position size rounds to zero for ${coin} @ ${price}`);
      }

      const account = await withTimeout(this.exchange.getAccountState(), this.timeoutMs, 'getAccountState');
      if (account.available < risk.positionSize) {
        const detail = `insufficient balance: ${account.available.toFixed(2)} < ${risk.positionSize.toFixed(2)}`;
        return this.abandon(position, 'INSUFFICIENT_BALANCE', detail);
      }

      logger.info('OrderGate', `Placing ${side} order: ${coin} size=${size} @ ~${price}`);
      order = await withTimeout(this.exchange.placeOrder(coin, side, size), this.timeoutMs, `placeOrder(${coin})`);
    } catch (error) {
      this.sink.publishError('OrderGate', error);
      return this.abandon(position, 'EXCHANGE_ERROR', errorMessage(error));
    }

    const filled = order;
    const filledSize = size;
    await this.book.withCoinLock(coin, () => {
      const levels = entryLevels(side, filled.entryPrice, risk);
      position.orderId = filled.orderId;
      position.entryPrice = filled.entryPrice;
      position.size = filledSize;
      position.openedAt = this.now();
      position.stopLossPrice = levels.stopLossPrice;
      position.takeProfitPrice = levels.takeProfitPrice;
      position.trailingWatermark = levels.trailingWatermark;
      position.trailingStopPrice = levels.trailingStopPrice;
      position.lastPrice = filled.entryPrice;
      position.status = 'OPEN';
      this.lastOrderAt.set(coin, this.now());
    });

    this.countTrade(coin);
    this.stats.admitted++;
    logger.info('OrderGate', `✓ Opened ${side} ${coin} ${filledSize} @ ${filled.entryPrice}`, {
      orderId: filled.orderId,
      stopLoss: position.stopLossPrice,
      takeProfit: position.takeProfitPrice,
    });
    this.handoff.track(position);
    return { admitted: true, position };
  }

  /** Placeholder goes FAILED and its coin slot is freed. No retry here. */
  private async abandon(position: Position, reason: RejectionReason, detail: string): Promise<AdmissionResult> {
    await this.book.withCoinLock(position.coin, () => {
      position.status = 'FAILED';
      position.error = detail;
      this.book.remove(position.coin, position.id);
    });
    logger.warn('OrderGate', `✗ Open ${position.coin} failed: ${detail}`, { positionId: position.id });
    this.sink.publishPositionUpdate(position);
    return this.reject(reason, detail);
  }

  private reject(reason: RejectionReason, detail?: string): AdmissionResult {
    this.stats.rejected[reason] = (this.stats.rejected[reason] ?? 0) + 1;
    return { admitted: false, reason, detail };
  }

  private countTrade(coin: string): void {
    this.rollDay();
    this.stats.dailyTrades[coin] = (this.stats.dailyTrades[coin] ?? 0) + 1;
    this.stats.totalDailyTrades++;
  }

  private rollDay(): void {
    const today = utcDay(this.now());
    if (today !== this.stats.day) {
      this.stats.day = today;
      this.stats.dailyTrades = {};
      this.stats.totalDailyTrades = 0;
      logger.info('OrderGate', 'Daily trade counters reset');
    }
  }
}
