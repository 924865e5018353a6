export type SignalAction = 'BUY' | 'SELL' | 'HOLD';

export const SIGNAL_ACTIONS: readonly SignalAction[] = ['BUY', 'SELL', 'HOLD'];

export type SignalMetadata = Record<string, string | number | boolean | null>;

export interface Signal {
  readonly coin: string;
  readonly action: SignalAction;
  /** 0 for HOLD, (0, 1] otherwise */
  readonly strength: number;
  readonly timestamp: number;
  /** Id of the strategy that produced it */
  readonly source: string;
  readonly metadata: Readonly<SignalMetadata>;
}

export type PositionSide = 'LONG' | 'SHORT';

export type PositionStatus = 'OPENING' | 'OPEN' | 'CLOSING' | 'CLOSED' | 'FAILED';

export type CloseReason = 'STOP_LOSS' | 'TAKE_PROFIT' | 'TRAILING_STOP' | 'MANUAL' | 'EMERGENCY';

export interface Position {
  id: string;
  coin: string;
  side: PositionSide;
  source: string;
  status: PositionStatus;
  orderId?: string;
  entryPrice: number;
  size: number;
  openedAt: number;
  stopLossPrice: number;
  takeProfitPrice: number;
  /** Most favourable price seen since entry */
  trailingWatermark: number;
  trailingStopPrice: number;
  trailingArmed: boolean;
  lastPrice?: number;
  closeReason?: CloseReason;
  closeAttempts: number;
  exitPrice?: number;
  closedAt?: number;
  realizedPnl?: number;
  error?: string;
}

export interface ClosedTrade {
  positionId: string;
  coin: string;
  side: PositionSide;
  source: string;
  entryPrice: number;
  exitPrice: number;
  size: number;
  reason: CloseReason;
  pnl: number;
  pnlPercent: number;
  openedAt: number;
  closedAt: number;
}

export type RejectionReason =
  | 'INVALID_SIGNAL'
  | 'HOLD'
  | 'WEAK_SIGNAL'
  | 'DUPLICATE_POSITION'
  | 'NEEDS_ATTENTION'
  | 'MAX_POSITIONS'
  | 'COOLDOWN'
  | 'INSUFFICIENT_BALANCE'
  | 'EXCHANGE_ERROR';

export type AdmissionResult =
  | { admitted: true; position: Position }
  | { admitted: false; reason: RejectionReason; detail?: string };

export interface RiskConfig {
  maxPositions: number;
  /** Quote-currency notional per position */
  positionSize: number;
  stopLossPercent: number;
  takeProfitPercent: number;
  trailingStopPercent: number;
  trailingActivationPercent: number;
  minSignalStrength: number;
  cooldownSeconds: number;
  maxCloseRetries: number;
}

export function sideForAction(action: Exclude<SignalAction, 'HOLD'>): PositionSide {
  return action === 'BUY' ? 'LONG' : 'SHORT';
}
