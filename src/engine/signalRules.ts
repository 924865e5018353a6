import { SIGNAL_ACTIONS } from '../types';
import type { Signal, SignalAction } from '../types';

function isAction(value: unknown): value is SignalAction {
  return typeof value === 'string' && SIGNAL_ACTIONS.some((a) => a === value);
}

/**
 * Checks the signal contract. Returns the first violation, or null for a
 * well-formed signal. Signals arrive from strategy code and are not trusted.
 */
export function findSignalViolation(signal: Signal): string | null {
  if (typeof signal.coin !== 'string' || signal.coin.trim() === '') return 'coin is empty';
  if (typeof signal.source !== 'string' || signal.source.trim() === '') return 'source is empty';
  if (typeof signal.timestamp !== 'number' || !Number.isFinite(signal.timestamp)) {
    return `timestamp ${String(signal.timestamp)} is not a finite number`;
  }
  if (!isAction(signal.action)) return `unknown action ${String(signal.action)}`;
  if (typeof signal.strength !== 'number' || !Number.isFinite(signal.strength)) {
    return `strength ${String(signal.strength)} is not a finite number`;
  }
  if (signal.strength < 0 || signal.strength > 1) return `strength ${signal.strength} outside [0, 1]`;
  if (signal.action === 'HOLD' && signal.strength !== 0) return `HOLD with strength ${signal.strength}`;
  if (signal.action !== 'HOLD' && signal.strength === 0) return `${signal.action} with zero strength`;
  return null;
}

export function describeSignal(signal: Signal): string {
  return `${signal.source}: ${signal.action} ${signal.coin} (strength: ${signal.strength.toFixed(2)})`;
}
