/**
 * Error taxonomy shared by the scheduler, the order gate and the lifecycle manager.
 */

export class TradingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Market data request failed (network, HTTP status, bad payload). Next scheduled tick retries. */
export class TransientFetchError extends TradingError {}

/** Order placement, close or mark-price call failed on the exchange side. */
export class TransientExchangeError extends TradingError {}

/** An external call exceeded its caller-imposed deadline. */
export class TimeoutError extends TradingError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/** Invalid configuration or risk snapshot. Fatal at session start. */
export class ConfigurationError extends TradingError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

/** A strategy produced a signal that breaks the signal contract. */
export class InvalidSignalError extends TradingError {}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
