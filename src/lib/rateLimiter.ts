import Bottleneck from 'bottleneck';
import { logger } from './logger';

export interface RateLimitOptions {
  /** ms between two requests of the same owner */
  minRequestIntervalMs: number;
}

/**
 * Per-owner request throttle. Each strategy instance gets its own limiter, so
 * one slow source never queues behind another.
 */
export class RateLimiter {
  private readonly limiter: Bottleneck;

  constructor(owner: string, options: RateLimitOptions) {
    this.limiter = new Bottleneck({
      minTime: options.minRequestIntervalMs,
      maxConcurrent: 1,
    });
    this.limiter.on('error', (error: unknown) => {
      logger.warn('RateLimiter', `${owner} limiter error`, { error: String(error) });
    });
  }

  schedule<T>(fn: () => Promise<T>): Promise<T> {
    return this.limiter.schedule(fn);
  }
}
