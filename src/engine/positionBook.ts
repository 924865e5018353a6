import { KeyedLock } from '../lib/keyedLock';
import type { Position } from '../types';

/**
 * The session's live positions, at most one per coin, with the per-coin lock
 * that serializes every structural change. Holds OPENING, OPEN and CLOSING
 * positions, plus FAILED ones parked for manual intervention.
 */
export class PositionBook {
  private positions: Map<string, Position> = new Map();
  private locks = new KeyedLock();

  /** Run fn while holding the lock for `coin`. */
  withCoinLock<T>(coin: string, fn: () => Promise<T> | T): Promise<T> {
    return this.locks.run(coin, fn);
  }

  get(coin: string): Position | undefined {
    return this.positions.get(coin);
  }

  list(): Position[] {
    return Array.from(this.positions.values());
  }

  get size(): number {
    return this.positions.size;
  }

  /** Caller must hold the coin lock. */
  insert(position: Position): void {
    const existing = this.positions.get(position.coin);
    if (existing && existing.id !== position.id) {
      throw new Error(`Position book already holds ${existing.id} for ${position.coin}`);
    }
    this.positions.set(position.coin, position);
  }

  /** Caller must hold the coin lock. Only removes the entry if it is still `positionId`. */
  remove(coin: string, positionId: string): boolean {
    const existing = this.positions.get(coin);
    if (!existing || existing.id !== positionId) return false;
    this.positions.delete(coin);
    return true;
  }
}
