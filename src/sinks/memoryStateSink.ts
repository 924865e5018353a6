import { EventEmitter } from 'events';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import type { ClosedTrade, Position, Signal } from '../types';
import type { StateSink } from './stateSink';

export interface ErrorEntry {
  source: string;
  message: string;
  timestamp: number;
}

export interface StateSinkEvents {
  signal: [signal: Signal];
  position: [position: Position];
  trade: [trade: ClosedTrade];
  error: [entry: ErrorEntry];
}

type EventName = keyof StateSinkEvents;

const DEFAULT_HISTORY = 100;

/**
 * Keeps bounded history for status surfaces and re-broadcasts every update.
 * Listeners run on a later turn of the event loop, never inside the caller.
 */
export class MemoryStateSink implements StateSink {
  private emitter = new EventEmitter();
  private signals: Signal[] = [];
  private trades: ClosedTrade[] = [];
  private errors: ErrorEntry[] = [];
  private positions: Map<string, Position> = new Map();
  private readonly historySize: number;

  constructor(historySize = DEFAULT_HISTORY) {
    this.historySize = historySize;
  }

  publishSignal(signal: Signal): void {
    this.signals = this.append(this.signals, signal);
    this.dispatch('signal', signal);
  }

  publishPositionUpdate(position: Readonly<Position>): void {
    // copy: the lifecycle manager keeps mutating its own object
    const snapshot: Position = { ...position };
    // a failed open holds nothing on the exchange
    if (snapshot.status === 'CLOSED' || (snapshot.status === 'FAILED' && snapshot.orderId === undefined)) {
      this.positions.delete(snapshot.id);
    } else {
      this.positions.set(snapshot.id, snapshot);
    }
    this.dispatch('position', snapshot);
  }

  publishTrade(trade: ClosedTrade): void {
    this.trades = this.append(this.trades, trade);
    this.dispatch('trade', trade);
  }

  publishError(source: string, error: unknown): void {
    const entry: ErrorEntry = { source, message: errorMessage(error), timestamp: Date.now() };
    this.errors = this.append(this.errors, entry);
    this.dispatch('error', entry);
  }

  on<K extends EventName>(event: K, listener: (...args: StateSinkEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  getSignals(limit = 10): Signal[] {
    return this.signals.slice(-limit);
  }

  getTrades(limit = 10): ClosedTrade[] {
    return this.trades.slice(-limit);
  }

  getErrors(limit = 10): ErrorEntry[] {
    return this.errors.slice(-limit);
  }

  getPositions(): Position[] {
    return Array.from(this.positions.values());
  }

  private append<T>(list: T[], item: T): T[] {
    const next = [...list, item];
    return next.length > this.historySize ? next.slice(-this.historySize) : next;
  }

  private dispatch<K extends EventName>(event: K, ...args: StateSinkEvents[K]): void {
    if (this.emitter.listenerCount(event) === 0) return;
    setImmediate(() => {
      try {
        this.emitter.emit(event, ...args);
      } catch (error) {
        logger.warn('StateSink', `${event} listener failed`, { error: errorMessage(error) });
      }
    });
  }
}
