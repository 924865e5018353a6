import type { ClosedTrade, Position, Signal } from '../types';

/**
 * Read-only publication of engine state. Calls are fire-and-forget: an
 * implementation must return immediately and must not throw.
 */
export interface StateSink {
  publishSignal(signal: Signal): void;
  publishPositionUpdate(position: Readonly<Position>): void;
  publishTrade(trade: ClosedTrade): void;
  publishError(source: string, error: unknown): void;
}
