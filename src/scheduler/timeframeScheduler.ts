import { BoundedQueue } from '../lib/boundedQueue';
import { findSignalViolation } from '../engine/signalRules';
import { errorMessage, InvalidSignalError } from '../lib/errors';
import { logger } from '../lib/logger';
import { withTimeout } from '../lib/timeout';
import type { StateSink } from '../sinks/stateSink';
import type { Strategy } from '../strategies/strategy';
import type { AdmissionResult, Signal } from '../types';

export interface SignalConsumer {
  submit(signal: Signal): Promise<AdmissionResult>;
}

export interface SchedulerOptions {
  tickMs: number;
  /** Deadline for one strategy invocation */
  timeoutMs: number;
  /** Pending signals kept per strategy before the oldest is dropped */
  queueCapacity: number;
  now?: () => number;
}

export interface ScheduleEntry {
  strategyId: string;
  coin: string;
  intervalSeconds: number;
  /** ms timestamp of the last dispatch, null until the first one */
  lastRunAt: number | null;
  inFlight: boolean;
  enabled: boolean;
}

export interface SchedulerStats {
  running: boolean;
  entries: number;
  dispatched: number;
  failed: number;
  skippedOverlaps: number;
  signals: number;
  invalidSignals: number;
  droppedSignals: number;
}

interface EntryState {
  strategy: Strategy;
  entry: ScheduleEntry;
}

/** Delivery lane of one strategy: its queue and whether a pump drains it. */
interface Lane {
  queue: BoundedQueue<Signal>;
  draining: boolean;
}

function entryKey(strategyId: string, coin: string): string {
  return `${strategyId}:${coin}`;
}

/**
 * Runs each registered (strategy, coin) pair once per its interval.
 *
 * The loop ticks at `tickMs`; a due entry is dispatched without waiting for
 * the result, and `lastRunAt` moves to the dispatch time immediately. An entry
 * whose previous invocation is still running is skipped (overlap-skip) and
 * stays due. Signals go to the consumer through one bounded lane per strategy:
 * a strategy's signals are delivered in the order it produced them, lanes
 * drain in parallel, and a full lane drops its oldest signal.
 */
export class TimeframeScheduler {
  private entries: Map<string, EntryState> = new Map();
  private disabled: Set<string> = new Set();
  private lanes: Map<string, Lane> = new Map();
  private inFlight: Set<Promise<void>> = new Set();
  private consumer: SignalConsumer;
  private sink: StateSink;
  private options: SchedulerOptions;
  private now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private resolveRun: (() => void) | null = null;
  private runPromise: Promise<void> | null = null;
  private stats = { dispatched: 0, failed: 0, skippedOverlaps: 0, signals: 0, invalidSignals: 0 };

  constructor(consumer: SignalConsumer, sink: StateSink, options: SchedulerOptions) {
    this.consumer = consumer;
    this.sink = sink;
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  register(strategy: Strategy, coin: string, intervalSeconds: number): void {
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new RangeError(`Interval for ${strategy.id}/${coin} must be positive, got ${intervalSeconds}`);
    }
    const key = entryKey(strategy.id, coin);
    const previous = this.entries.get(key);
    if (previous) {
      // re-registering keeps lastRunAt and any in-flight invocation
      previous.strategy = strategy;
      previous.entry.intervalSeconds = intervalSeconds;
    } else {
      this.entries.set(key, {
        strategy,
        entry: {
          strategyId: strategy.id,
          coin,
          intervalSeconds,
          lastRunAt: null,
          inFlight: false,
          enabled: !this.disabled.has(strategy.id),
        },
      });
    }
    logger.debug('Scheduler', `Registered ${strategy.id} for ${coin}: every ${intervalSeconds}s`);
  }

  unregister(strategyId: string, coin: string): boolean {
    return this.entries.delete(entryKey(strategyId, coin));
  }

  /** Enable or disable every entry of a strategy. Returns false for an unknown id. */
  setEnabled(strategyId: string, enabled: boolean): boolean {
    let found = false;
    for (const { entry } of this.entries.values()) {
      if (entry.strategyId !== strategyId) continue;
      found = true;
      entry.enabled = enabled;
    }
    if (enabled) this.disabled.delete(strategyId);
    else this.disabled.add(strategyId);
    if (found) logger.info('Scheduler', `${enabled ? 'Enabled' : 'Disabled'} strategy ${strategyId}`);
    return found;
  }

  /**
   * Non-terminating control loop. The returned promise settles once stop()
   * has drained in-flight work.
   */
  runForever(): Promise<void> {
    if (this.runPromise) return this.runPromise;
    this.runPromise = new Promise<void>((resolve) => {
      this.resolveRun = resolve;
    });
    logger.info('Scheduler', `Signal loop started (tick=${this.options.tickMs}ms, entries=${this.entries.size})`);
    this.tick();
    this.timer = setInterval(() => this.tick(), this.options.tickMs);
    return this.runPromise;
  }

  /** Stop dispatching; invocations and deliveries in flight finish or time out. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.settle();
    if (this.resolveRun) {
      this.resolveRun();
      this.resolveRun = null;
      this.runPromise = null;
      logger.info('Scheduler', 'Signal loop stopped');
    }
  }

  /** Wait until no invocation or delivery is in flight. */
  async settle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  /** One scheduling pass. Returns the number of invocations dispatched. */
  tick(): number {
    const now = this.now();
    let dispatched = 0;
    for (const state of this.entries.values()) {
      const { entry } = state;
      if (!entry.enabled) continue;
      if (entry.lastRunAt !== null && now - entry.lastRunAt < entry.intervalSeconds * 1000) continue;
      if (entry.inFlight) {
        this.stats.skippedOverlaps++;
        logger.debug('Scheduler', `${entry.strategyId}/${entry.coin} still running, skipping this slot`);
        continue;
      }
      entry.lastRunAt = now;
      entry.inFlight = true;
      dispatched++;
      this.stats.dispatched++;
      this.trackWork(
        this.invoke(state).finally(() => {
          entry.inFlight = false;
        }),
      );
    }
    return dispatched;
  }

  getEntries(): ScheduleEntry[] {
    return Array.from(this.entries.values(), ({ entry }) => ({ ...entry }));
  }

  getStats(): SchedulerStats {
    let droppedSignals = 0;
    for (const lane of this.lanes.values()) droppedSignals += lane.queue.dropped;
    return {
      running: this.timer !== null,
      entries: this.entries.size,
      ...this.stats,
      droppedSignals,
    };
  }

  private async invoke({ strategy, entry }: EntryState): Promise<void> {
    let signal: Signal | null;
    try {
      signal = await withTimeout(
        strategy.generate(entry.coin),
        this.options.timeoutMs,
        `${strategy.id}.generate(${entry.coin})`,
      );
    } catch (error) {
      this.stats.failed++;
      logger.warn('Scheduler', `${strategy.id} failed for ${entry.coin}, treating as no signal`, {
        error: errorMessage(error),
      });
      this.sink.publishError(strategy.id, error);
      return;
    }
    if (!signal) return;

    const violation = findSignalViolation(signal);
    if (violation) {
      this.stats.invalidSignals++;
      logger.warn('Scheduler', `${strategy.id} broke the signal contract for ${entry.coin}: ${violation}`);
      this.sink.publishError(strategy.id, new InvalidSignalError(`${strategy.id} ${entry.coin}: ${violation}`));
      return;
    }

    this.stats.signals++;
    this.sink.publishSignal(signal);
    if (signal.action === 'HOLD') return;
    this.enqueue(strategy.id, signal);
  }

  private enqueue(strategyId: string, signal: Signal): void {
    let lane = this.lanes.get(strategyId);
    if (!lane) {
      lane = { queue: new BoundedQueue<Signal>(this.options.queueCapacity), draining: false };
      this.lanes.set(strategyId, lane);
    }
    const dropped = lane.queue.push(signal);
    if (dropped) {
      logger.warn('Scheduler', `Signal lane for ${strategyId} full, dropped oldest`, {
        coin: dropped.coin,
        dropped: lane.queue.dropped,
      });
    }
    if (!lane.draining) {
      lane.draining = true;
      this.trackWork(this.drain(lane));
    }
  }

  private async drain(lane: Lane): Promise<void> {
    try {
      let signal = lane.queue.shift();
      while (signal) {
        await this.deliver(signal);
        signal = lane.queue.shift();
      }
    } finally {
      lane.draining = false;
    }
  }

  private async deliver(signal: Signal): Promise<void> {
    try {
      const result = await this.consumer.submit(signal);
      if (result.admitted) {
        logger.info('Scheduler', `✓ ${signal.source} ${signal.action} ${signal.coin} admitted`, {
          positionId: result.position.id,
        });
      } else {
        logger.debug('Scheduler', `${signal.source} ${signal.action} ${signal.coin} not admitted: ${result.reason}`, {
          detail: result.detail,
        });
      }
    } catch (error) {
      logger.error('Scheduler', `Order gate failed on ${signal.source} ${signal.coin}`, { error: errorMessage(error) });
      this.sink.publishError('Scheduler', error);
    }
  }

  private trackWork(work: Promise<void>): void {
    this.inFlight.add(work);
    work
      .finally(() => this.inFlight.delete(work))
      .catch((error: unknown) => {
        logger.error('Scheduler', 'Unhandled scheduler task failure', { error: errorMessage(error) });
      });
  }
}
