import type { Position, PositionSide } from '../types';

export interface PlacedOrder {
  orderId: string;
  entryPrice: number;
}

export interface ClosedOrder {
  exitPrice: number;
  orderId?: string;
}

export interface AccountState {
  equity: number;
  /** Margin still free for new positions */
  available: number;
}

/**
 * What the core needs from an exchange. Implementations reject with
 * TransientExchangeError; callers wrap every call in their own timeout.
 */
export interface ExchangeClient {
  placeOrder(coin: string, side: PositionSide, size: number): Promise<PlacedOrder>;
  closePosition(position: Readonly<Position>): Promise<ClosedOrder>;
  getMarkPrice(coin: string): Promise<number>;
  getAccountState(): Promise<AccountState>;
}
