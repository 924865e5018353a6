import type { CloseReason, Position, PositionSide, RiskConfig } from '../types';

type ExitRisk = Pick<RiskConfig, 'trailingStopPercent' | 'trailingActivationPercent'>;

export interface EntryLevels {
  stopLossPrice: number;
  takeProfitPrice: number;
  trailingWatermark: number;
  trailingStopPrice: number;
}

export interface TrailingState {
  trailingWatermark: number;
  trailingStopPrice: number;
  trailingArmed: boolean;
}

export interface ExitDecision {
  reason: CloseReason | null;
  trailing: TrailingState;
}

/** +1 when a higher price is favourable, -1 otherwise. */
export function direction(side: PositionSide): 1 | -1 {
  return side === 'LONG' ? 1 : -1;
}

function offset(price: number, percent: number, sign: 1 | -1): number {
  return price * (1 + (sign * percent) / 100);
}

export function entryLevels(
  side: PositionSide,
  entryPrice: number,
  risk: Pick<RiskConfig, 'stopLossPercent' | 'takeProfitPercent'>,
): EntryLevels {
  const dir = direction(side);
  const stopLossPrice = offset(entryPrice, risk.stopLossPercent, dir === 1 ? -1 : 1);
  return {
    stopLossPrice,
    takeProfitPrice: offset(entryPrice, risk.takeProfitPercent, dir),
    trailingWatermark: entryPrice,
    // the stop-loss is the floor until the trailing band arms
    trailingStopPrice: stopLossPrice,
  };
}

/** True when `price` is at or beyond `level` in the position's adverse direction. */
function breachedAgainst(side: PositionSide, price: number, level: number): boolean {
  return side === 'LONG' ? price <= level : price >= level;
}

function breachedFavourably(side: PositionSide, price: number, level: number): boolean {
  return side === 'LONG' ? price >= level : price <= level;
}

/**
 * Moves the watermark to the best price seen and tightens the trailing stop.
 * The stop never loosens: for a LONG it only rises, for a SHORT it only falls.
 */
export function advanceTrailing(position: Readonly<Position>, price: number, risk: ExitRisk): TrailingState {
  const { side, entryPrice } = position;
  const dir = direction(side);
  const trailingWatermark =
    side === 'LONG' ? Math.max(position.trailingWatermark, price) : Math.min(position.trailingWatermark, price);

  const activation = offset(entryPrice, risk.trailingActivationPercent, dir);
  const trailingArmed = position.trailingArmed || breachedFavourably(side, trailingWatermark, activation);

  let trailingStopPrice = position.trailingStopPrice;
  if (trailingArmed) {
    const candidate = offset(trailingWatermark, risk.trailingStopPercent, dir === 1 ? -1 : 1);
    trailingStopPrice = side === 'LONG' ? Math.max(trailingStopPrice, candidate) : Math.min(trailingStopPrice, candidate);
  }

  return { trailingWatermark, trailingStopPrice, trailingArmed };
}

/**
 * Exit rules in priority order: stop-loss, take-profit, trailing stop. The
 * first rule that fires is the only reason recorded.
 */
export function evaluateExit(position: Readonly<Position>, price: number, risk: ExitRisk): ExitDecision {
  const trailing = advanceTrailing(position, price, risk);

  if (breachedAgainst(position.side, price, position.stopLossPrice)) {
    return { reason: 'STOP_LOSS', trailing };
  }
  if (breachedFavourably(position.side, price, position.takeProfitPrice)) {
    return { reason: 'TAKE_PROFIT', trailing };
  }
  if (trailing.trailingArmed && breachedAgainst(position.side, price, trailing.trailingStopPrice)) {
    return { reason: 'TRAILING_STOP', trailing };
  }
  return { reason: null, trailing };
}

export function realizedPnl(
  side: PositionSide,
  entryPrice: number,
  exitPrice: number,
  size: number,
): { pnl: number; pnlPercent: number } {
  const dir = direction(side);
  const pnl = (exitPrice - entryPrice) * size * dir;
  const pnlPercent = entryPrice > 0 ? ((exitPrice - entryPrice) / entryPrice) * 100 * dir : 0;
  return { pnl, pnlPercent };
}
