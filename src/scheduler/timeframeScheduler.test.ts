import { beforeEach, describe, expect, it } from 'vitest';
import { InvalidSignalError } from '../lib/errors';
import { deferred, flush, makeSignal, RecordingSink, ScriptedStrategy } from '../testing/fakes';
import type { AdmissionResult, Signal } from '../types';
import { TimeframeScheduler } from './timeframeScheduler';
import type { SchedulerOptions, SignalConsumer } from './timeframeScheduler';

/** Records what reaches the order gate; can hold back one strategy's deliveries. */
class RecordingConsumer implements SignalConsumer {
  submitted: Signal[] = [];
  holdSource: string | null = null;
  private release = deferred<void>();

  async submit(signal: Signal): Promise<AdmissionResult> {
    this.submitted.push(signal);
    if (signal.source === this.holdSource) await this.release.promise;
    return { admitted: false, reason: 'WEAK_SIGNAL' };
  }

  releaseHeld(): void {
    this.release.resolve();
  }
}

describe('TimeframeScheduler', () => {
  let clock: number;
  let consumer: RecordingConsumer;
  let sink: RecordingSink;

  function createScheduler(overrides: Partial<SchedulerOptions> = {}): TimeframeScheduler {
    return new TimeframeScheduler(consumer, sink, {
      tickMs: 1_000,
      timeoutMs: 1_000,
      queueCapacity: 16,
      now: () => clock,
      ...overrides,
    });
  }

  /** Tick once per simulated second over [fromSec, toSec]. */
  async function runClock(scheduler: TimeframeScheduler, fromSec: number, toSec: number): Promise<void> {
    for (let t = fromSec; t <= toSec; t++) {
      clock = t * 1_000;
      scheduler.tick();
      await flush();
    }
  }

  beforeEach(() => {
    clock = 0;
    consumer = new RecordingConsumer();
    sink = new RecordingSink();
  });

  it('runs a 300s entry at t = 0, 300, 600 and 900', async () => {
    const scheduler = createScheduler();
    const runs: number[] = [];
    const strategy = new ScriptedStrategy('rsi_5m', async () => {
      runs.push(clock);
      return null;
    });
    scheduler.register(strategy, 'BTC', 300);

    await runClock(scheduler, 0, 900);

    expect(runs).toEqual([0, 300_000, 600_000, 900_000]);
    expect(scheduler.getStats()).toMatchObject({ dispatched: 4, failed: 0, skippedOverlaps: 0 });
  });

  it('keeps each entry on its own cadence', async () => {
    const scheduler = createScheduler();
    const fast = new ScriptedStrategy('rsi_1m');
    const slow = new ScriptedStrategy('rsi_5m');
    scheduler.register(fast, 'BTC', 60);
    scheduler.register(fast, 'ETH', 60);
    scheduler.register(slow, 'BTC', 300);

    await runClock(scheduler, 0, 600);

    expect(fast.calls.filter((c) => c === 'BTC')).toHaveLength(11);
    expect(fast.calls.filter((c) => c === 'ETH')).toHaveLength(11);
    expect(slow.calls).toHaveLength(3);
  });

  it('skips a due entry whose previous run is still in flight', async () => {
    const scheduler = createScheduler({ timeoutMs: 60_000 });
    const slowRun = deferred<Signal | null>();
    const strategy = new ScriptedStrategy('rsi_5m', () => slowRun.promise);
    scheduler.register(strategy, 'BTC', 300);

    await runClock(scheduler, 0, 0);
    await runClock(scheduler, 300, 302);

    expect(strategy.calls).toHaveLength(1);
    expect(scheduler.getStats().skippedOverlaps).toBe(3);
    expect(scheduler.getEntries()[0]).toMatchObject({ lastRunAt: 0, inFlight: true });

    slowRun.resolve(null);
    await flush();
    await runClock(scheduler, 303, 303);

    expect(strategy.calls).toHaveLength(2);
    expect(scheduler.getEntries()[0]).toMatchObject({ lastRunAt: 303_000 });
  });

  it('isolates failing and timed-out strategies from the rest', async () => {
    const scheduler = createScheduler({ timeoutMs: 20 });
    const broken = new ScriptedStrategy('broken', async () => {
      throw new Error('klines unavailable');
    });
    const hung = new ScriptedStrategy('hung', () => new Promise<Signal | null>(() => {}));
    const healthy = ScriptedStrategy.emitting('healthy', 'BUY', 0.8);
    scheduler.register(broken, 'BTC', 60);
    scheduler.register(hung, 'BTC', 60);
    scheduler.register(healthy, 'BTC', 60);

    scheduler.tick();
    await scheduler.settle();

    expect(consumer.submitted.map((s) => s.source)).toEqual(['healthy']);
    expect(scheduler.getStats()).toMatchObject({ dispatched: 3, failed: 2, signals: 1 });
    expect(sink.errors.map((e) => e.source).sort()).toEqual(['broken', 'hung']);
  });

  it('publishes HOLD signals without forwarding them', async () => {
    const scheduler = createScheduler();
    scheduler.register(ScriptedStrategy.emitting('rsi_1h', 'HOLD', 0), 'BTC', 60);

    scheduler.tick();
    await scheduler.settle();

    expect(sink.signals.map((s) => s.action)).toEqual(['HOLD']);
    expect(consumer.submitted).toEqual([]);
  });

  it('reports contract-breaking signals instead of publishing them', async () => {
    const scheduler = createScheduler();
    scheduler.register(
      new ScriptedStrategy('broken_clock', async (coin) => makeSignal({ coin, source: 'broken_clock', timestamp: Number.NaN })),
      'BTC',
      60,
    );
    scheduler.register(ScriptedStrategy.emitting('noisy_hold', 'HOLD', 0.4), 'BTC', 60);

    scheduler.tick();
    await scheduler.settle();

    expect(sink.signals).toEqual([]);
    expect(consumer.submitted).toEqual([]);
    expect(scheduler.getStats()).toMatchObject({ signals: 0, invalidSignals: 2 });
    expect(sink.errors.map((e) => e.source).sort()).toEqual(['broken_clock', 'noisy_hold']);
    expect(sink.errors.every((e) => e.error instanceof InvalidSignalError)).toBe(true);
    const messages = sink.errors.map((e) => (e.error instanceof Error ? e.error.message : '')).sort();
    expect(messages).toEqual([
      'broken_clock BTC: timestamp NaN is not a finite number',
      'noisy_hold BTC: HOLD with strength 0.4',
    ]);
  });

  it('delivers one strategy in order and drops the oldest when its lane is full', async () => {
    const scheduler = createScheduler({ queueCapacity: 2 });
    consumer.holdSource = 'rsi_5m';
    const strategy = new ScriptedStrategy('rsi_5m', async (coin) => makeSignal({ coin, source: 'rsi_5m' }));
    const other = ScriptedStrategy.emitting('sma_5m', 'SELL', 0.9);
    for (const coin of ['C1', 'C2', 'C3', 'C4']) scheduler.register(strategy, coin, 60);
    scheduler.register(other, 'C1', 60);

    scheduler.tick();
    await flush();

    // the held lane does not hold back another strategy
    expect(consumer.submitted.map((s) => `${s.source}:${s.coin}`)).toEqual(['rsi_5m:C1', 'sma_5m:C1']);

    consumer.releaseHeld();
    await scheduler.settle();

    expect(consumer.submitted.filter((s) => s.source === 'rsi_5m').map((s) => s.coin)).toEqual(['C1', 'C3', 'C4']);
    expect(scheduler.getStats().droppedSignals).toBe(1);
  });

  it('does not dispatch disabled strategies', async () => {
    const scheduler = createScheduler();
    const strategy = new ScriptedStrategy('macd_15m');
    scheduler.register(strategy, 'BTC', 60);

    expect(scheduler.setEnabled('macd_15m', false)).toBe(true);
    expect(scheduler.setEnabled('unknown', false)).toBe(false);
    await runClock(scheduler, 0, 0);
    expect(strategy.calls).toEqual([]);

    scheduler.setEnabled('macd_15m', true);
    await runClock(scheduler, 1, 1);
    expect(strategy.calls).toEqual(['BTC']);
  });

  it('forgets unregistered entries', () => {
    const scheduler = createScheduler();
    scheduler.register(new ScriptedStrategy('rsi_1m'), 'BTC', 60);
    expect(scheduler.unregister('rsi_1m', 'BTC')).toBe(true);
    expect(scheduler.unregister('rsi_1m', 'BTC')).toBe(false);
    expect(scheduler.tick()).toBe(0);
  });

  it('rejects a non-positive interval', () => {
    const scheduler = createScheduler();
    expect(() => scheduler.register(new ScriptedStrategy('rsi_1m'), 'BTC', 0)).toThrow(RangeError);
  });

  it('runForever dispatches immediately and settles after stop', async () => {
    const scheduler = createScheduler({ tickMs: 5 });
    const strategy = new ScriptedStrategy('rsi_1m');
    scheduler.register(strategy, 'BTC', 60);

    const run = scheduler.runForever();
    expect(strategy.calls).toEqual(['BTC']);
    expect(scheduler.getStats().running).toBe(true);

    await scheduler.stop();
    await run;
    expect(scheduler.getStats().running).toBe(false);
  });
});
