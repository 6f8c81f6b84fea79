/**
 * Unit Tests: scheduler tick loop, admission, phases, drain and timeouts.
 * Runs on fake timers; the scheduler reads the faked Date.now as its clock.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Scheduler, runWorkload, type SchedulerOptions } from '../../src/scheduler.js';
import { MetricsAggregator } from '../../src/metrics.js';
import { WorkloadRegistry } from '../../src/registry.js';
import { constant, createRateGenerator } from '../../src/patterns.js';
import { createRunContext } from '../../src/load-test.js';
import { StateError } from '../../src/errors.js';
import { createRandom } from '../../src/utils/random.js';
import type { SchedulerPhase, Workload } from '../../src/types.js';
import { defineWorkload } from '../../src/workloads/index.js';
import {
  executionContext,
  failingWorkload,
  instantWorkload,
  sleepingWorkload,
  trackingWorkload,
} from '../helpers/workloads.js';

function createHarness(workload: Workload, overrides: Partial<SchedulerOptions> = {}) {
  const registry = new WorkloadRegistry(createRandom(1));
  registry.add(workload);
  const aggregator = new MetricsAggregator(() => Date.now());
  const phases: SchedulerPhase[] = [];

  const scheduler = new Scheduler({
    generator: constant(10),
    registry,
    aggregator,
    context: createRunContext('scheduler-test', createRandom(1)),
    duration: 1,
    warmupDuration: 0,
    maxConcurrent: 100,
    now: () => Date.now(),
    onPhaseChange: (phase) => {
      phases.push(phase);
    },
    ...overrides,
  });

  return { scheduler, aggregator, phases };
}

async function runFor(scheduler: Scheduler, ms: number): Promise<void> {
  const running = scheduler.run();
  await vi.advanceTimersByTimeAsync(ms);
  await running;
}

describe('Scheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('dispatch rate', () => {
    it('dispatches 100 events for 10 rps over 10 seconds', async () => {
      const { scheduler, aggregator } = createHarness(instantWorkload(), { duration: 10 });

      await runFor(scheduler, 10_000);

      expect(scheduler.getStats().dispatched).toBe(100);
      const stats = aggregator.getStatistics();
      expect(stats.totalRequests).toBe(100);
      expect(stats.successRate).toBe(100);
    });

    it('carries fractional rates across ticks', async () => {
      const { scheduler } = createHarness(instantWorkload(), { generator: constant(2.5), duration: 4 });

      await runFor(scheduler, 4_000);

      expect(scheduler.getStats().dispatched).toBe(10);
    });

    it('dispatches nothing at rate zero', async () => {
      const { scheduler, aggregator } = createHarness(instantWorkload(), { generator: constant(0) });

      await runFor(scheduler, 1_000);

      expect(scheduler.getStats().dispatched).toBe(0);
      expect(aggregator.getStatistics().totalRequests).toBe(0);
    });
  });

  describe('admission', () => {
    it('never exceeds maxConcurrent and throttles the overflow', async () => {
      const { workload, tracker } = trackingWorkload('tracked', 175);
      const { scheduler, aggregator } = createHarness(workload, { generator: constant(20), maxConcurrent: 2 });

      await runFor(scheduler, 1_100);

      const dispatch = scheduler.getStats();
      expect(tracker.peak).toBe(2);
      expect(dispatch.peakInFlight).toBe(2);
      expect(dispatch.dispatched).toBe(20);
      expect(dispatch.admitted).toBe(10);
      expect(dispatch.throttled).toBe(10);
      expect(aggregator.getStatistics().throttled).toBe(10);
      expect(aggregator.getStatistics().successful).toBe(10);
    });

    it('throttles immediately when there is no queue', async () => {
      const { scheduler } = createHarness(sleepingWorkload('slow', 130), { maxConcurrent: 1 });

      await runFor(scheduler, 1_100);

      expect(scheduler.getStats()).toMatchObject({ dispatched: 10, admitted: 5, throttled: 5, queued: 0 });
    });

    it('holds events in a FIFO queue and drops what is left at the end', async () => {
      const { scheduler, aggregator } = createHarness(sleepingWorkload('slow', 130), {
        maxConcurrent: 1,
        queueCapacity: 5,
      });

      await runFor(scheduler, 1_100);

      expect(scheduler.getStats()).toMatchObject({ dispatched: 10, admitted: 7, throttled: 3, queued: 0 });
      const stats = aggregator.getStatistics();
      expect(stats.successful).toBe(7);
      expect(stats.throttled).toBe(3);
    });

    it('starts queued events in arrival order', async () => {
      const sequences: number[] = [];
      const workload = defineWorkload({
        name: 'ordered',
        execute: async (ctx) => {
          sequences.push(ctx.sequence);
          await ctx.sleep(130);
        },
      });
      const { scheduler } = createHarness(workload, { maxConcurrent: 1, queueCapacity: 5 });

      await runFor(scheduler, 1_100);

      expect(sequences).toEqual([1, 2, 3, 4, 5, 6, 7]);
    });
  });

  describe('phases', () => {
    it('moves through warmup, measuring, draining and stopped', async () => {
      const { scheduler, phases } = createHarness(instantWorkload(), { warmupDuration: 1 });

      expect(scheduler.getPhase()).toBe('idle');
      await runFor(scheduler, 2_000);

      expect(phases).toEqual(['warmup', 'measuring', 'draining', 'stopped']);
      expect(scheduler.getPhase()).toBe('stopped');
    });

    it('excludes completions during warmup', async () => {
      const { scheduler, aggregator } = createHarness(instantWorkload(), { warmupDuration: 1 });

      await runFor(scheduler, 2_000);

      const stats = aggregator.getStatistics();
      expect(scheduler.getStats().dispatched).toBe(20);
      expect(stats.warmupExcluded).toBe(9);
      expect(stats.totalRequests).toBe(11);
    });

    it('tells each execution its sequence and phase', async () => {
      const seen: Array<{ sequence: number; phase: string }> = [];
      const workload = defineWorkload({
        name: 'observer',
        execute: async (ctx) => {
          seen.push({ sequence: ctx.sequence, phase: ctx.phase });
        },
      });
      const { scheduler } = createHarness(workload, { warmupDuration: 1 });

      await runFor(scheduler, 2_000);

      expect(seen[0]).toEqual({ sequence: 1, phase: 'warmup' });
      expect(seen[9]).toEqual({ sequence: 10, phase: 'measuring' });
    });

    it('refuses to run twice', async () => {
      const { scheduler } = createHarness(instantWorkload());
      await runFor(scheduler, 1_000);

      await expect(scheduler.run()).rejects.toThrow(StateError);
    });
  });

  describe('stop and cancel', () => {
    it('stops dispatching on stop() and is idempotent', async () => {
      const { scheduler, aggregator } = createHarness(instantWorkload(), { duration: 10 });

      const running = scheduler.run();
      await vi.advanceTimersByTimeAsync(1_050);
      scheduler.stop();
      scheduler.stop();
      await running;

      expect(scheduler.stopped).toBe(true);
      expect(scheduler.cancelled).toBe(false);
      expect(scheduler.getPhase()).toBe('stopped');
      expect(scheduler.getStats().dispatched).toBe(10);
      expect(aggregator.getStatistics().totalRequests).toBe(10);
    });

    it('records in-flight executions as abandoned on cancel()', async () => {
      const { scheduler, aggregator } = createHarness(sleepingWorkload('slow', 5_000), { duration: 10 });

      const running = scheduler.run();
      await vi.advanceTimersByTimeAsync(1_050);
      scheduler.cancel();
      scheduler.cancel();
      await running;

      const stats = aggregator.getStatistics();
      expect(scheduler.getPhase()).toBe('cancelled');
      expect(stats.abandoned).toBe(10);
      expect(stats.failed).toBe(0);
      expect(stats.totalRequests).toBe(0);
      expect(scheduler.getStats().inFlight).toBe(0);
    });

    it('abandons executions still running after the grace period', async () => {
      const { scheduler, aggregator } = createHarness(sleepingWorkload('slow', 5_000), {
        generator: constant(1),
        gracePeriod: 1,
      });

      const running = scheduler.run();
      await vi.advanceTimersByTimeAsync(1_500);
      expect(scheduler.getPhase()).toBe('draining');

      await vi.advanceTimersByTimeAsync(600);
      await running;

      expect(aggregator.getStatistics().abandoned).toBe(1);
      expect(scheduler.getStats().abandoned).toBe(1);
      expect(scheduler.getPhase()).toBe('stopped');
    });
  });

  describe('timeouts', () => {
    it('records executions over the timeout as timed out', async () => {
      const { scheduler, aggregator } = createHarness(sleepingWorkload('slow', 5_000), {
        generator: constant(1),
        timeout: 0.5,
      });

      await runFor(scheduler, 1_600);

      const stats = aggregator.getStatistics();
      expect(stats.timedOut).toBe(1);
      expect(stats.failed).toBe(1);
      expect(stats.errors).toEqual({ TIMEOUT: 1 });
      expect(stats.responseTime.max).toBe(500);
      expect(scheduler.getStats().timedOut).toBe(1);
    });

    it('aborts the signal of a timed-out execution', async () => {
      let aborted = false;
      const workload = defineWorkload({
        name: 'watcher',
        execute: async (ctx) => {
          await ctx.sleep(5_000);
          aborted = ctx.signal.aborted;
        },
      });
      const { scheduler } = createHarness(workload, { generator: constant(1), timeout: 0.5 });

      await runFor(scheduler, 1_600);

      expect(aborted).toBe(true);
    });
  });

  describe('faults', () => {
    it('abandons admitted executions when the rate function throws', async () => {
      const generator = createRateGenerator({
        kind: 'custom',
        curve: (t) => {
          if (t > 0.5) throw new Error('curve exploded');
          return 10;
        },
      });
      const { scheduler, aggregator, phases } = createHarness(sleepingWorkload('slow', 60_000), {
        generator,
        duration: 10,
        timeout: 30,
      });

      const running = scheduler.run();
      const rejected = expect(running).rejects.toThrow('curve exploded');
      await vi.advanceTimersByTimeAsync(600);
      await rejected;

      expect(phases).toEqual(['warmup', 'measuring', 'cancelled']);
      expect(scheduler.getStats()).toMatchObject({ dispatched: 5, admitted: 5, abandoned: 5, inFlight: 0 });
      expect(aggregator.getStatistics().abandoned).toBe(5);
      expect(vi.getTimerCount()).toBe(0);
    });

    it('keeps running when the outcome listener throws', async () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const { scheduler, aggregator } = createHarness(instantWorkload(), {
        onOutcome: () => {
          throw new Error('listener broke');
        },
      });

      await runFor(scheduler, 1_000);

      expect(aggregator.getStatistics().successful).toBe(10);
      expect(errorSpy).toHaveBeenCalledTimes(10);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('Outcome listener failed: listener broke'));
      errorSpy.mockRestore();
    });
  });

  it('reports outcomes to onOutcome', async () => {
    const statuses: string[] = [];
    const { scheduler } = createHarness(failingWorkload('broken', new Error('nope')), {
      generator: constant(2),
      onOutcome: (outcome) => {
        statuses.push(outcome.status);
      },
    });

    await runFor(scheduler, 1_000);

    expect(statuses).toEqual(['failure', 'failure']);
  });
});

describe('runWorkload', () => {
  it('treats a void result as success', async () => {
    expect(await runWorkload(instantWorkload(), executionContext())).toEqual({ status: 'success' });
  });

  it('derives the error code of an unsuccessful result from its status code', async () => {
    const workload = defineWorkload({
      name: 'unavailable',
      execute: async () => ({ success: false, statusCode: 503, error: 'down' }),
    });

    const result = await runWorkload(workload, executionContext());

    expect(result).toMatchObject({ status: 'failure', statusCode: 503, error: 'down', errorCode: 'HTTP_503' });
  });

  it('falls back to UNKNOWN without a status code', async () => {
    const workload = defineWorkload({ name: 'vague', execute: async () => ({ success: false }) });

    expect((await runWorkload(workload, executionContext())).errorCode).toBe('UNKNOWN');
  });

  it('turns a thrown error into a failure', async () => {
    const error = Object.assign(new Error('connection reset'), { code: 'ECONNRESET' });

    const result = await runWorkload(failingWorkload('flaky', error), executionContext());

    expect(result).toEqual({ status: 'failure', error: 'connection reset', errorCode: 'ECONNRESET' });
  });

  it('passes custom metrics through', async () => {
    const workload = defineWorkload({ name: 'measured', execute: async () => ({ metrics: { items: 3 } }) });

    expect(await runWorkload(workload, executionContext())).toMatchObject({ status: 'success', metrics: { items: 3 } });
  });
});
