import chalk from 'chalk';
import { StateError, WorkloadTimeoutError, errorCodeOf } from './errors.js';
import type { MetricsAggregator } from './metrics.js';
import type { RateGenerator } from './patterns.js';
import type { WorkloadRegistry } from './registry.js';
import type {
  DispatchEvent,
  DispatchStats,
  ExecutionContext,
  Outcome,
  OutcomeStatus,
  RecordPhase,
  RunContext,
  SchedulerPhase,
  Workload,
  WorkloadResult,
} from './types.js';
import { sleep } from './utils/sleep.js';

// Absorbs float error when summing fractional rates (0.1 * 10 !== 1)
const EPSILON = 1e-9;

export interface SchedulerOptions {
  generator: RateGenerator;
  registry: WorkloadRegistry;
  aggregator: MetricsAggregator;
  context: RunContext;
  /** Measured seconds after warmup. */
  duration: number;
  warmupDuration: number;
  maxConcurrent: number;
  queueCapacity?: number;
  /** Seconds. */
  tickInterval?: number;
  /** Seconds. */
  gracePeriod?: number;
  /** Per-execution budget in seconds. */
  timeout?: number;
  /** Monotonic clock in ms. */
  now?: () => number;
  onPhaseChange?: (phase: SchedulerPhase) => void;
  onOutcome?: (outcome: Outcome, phase: RecordPhase) => void;
}

interface Execution {
  readonly event: DispatchEvent;
  readonly workload: Workload;
  readonly controller: AbortController;
  readonly startedAt: number;
  settled: boolean;
  timer?: ReturnType<typeof setTimeout>;
}

type SettleResult = Omit<Outcome, 'success' | 'duration' | 'workload'>;

/**
 * Turns a rate function into dispatch events and runs them under an
 * admission ceiling.
 *
 * Every tick adds `rate × elapsed-since-last-tick` to a fractional counter
 * and emits its integer part; the remainder carries over. Ticks are planned
 * on an absolute timeline from the start so late timers do not accumulate
 * drift. Executions are launched without being awaited: slot release and
 * recording happen in their completion callbacks.
 */
export class Scheduler {
  private readonly now: () => number;
  private readonly tickMs: number;
  private readonly graceMs: number;
  private readonly timeoutMs?: number;
  private readonly queueCapacity: number;

  private phase: SchedulerPhase = 'idle';
  private readonly active = new Set<Execution>();
  private readonly queue: DispatchEvent[] = [];
  private readonly wake = new AbortController();
  private idleWaiter: (() => void) | null = null;
  private startedAt = 0;
  private sequence = 0;
  private accepting = false;
  private stopRequested = false;
  private cancelRequested = false;

  private stats: Omit<DispatchStats, 'queued' | 'inFlight'> = {
    dispatched: 0,
    admitted: 0,
    throttled: 0,
    abandoned: 0,
    timedOut: 0,
    peakInFlight: 0,
  };

  constructor(private readonly options: SchedulerOptions) {
    this.now = options.now ?? (() => performance.now());
    this.tickMs = (options.tickInterval ?? 0.01) * 1000;
    this.graceMs = (options.gracePeriod ?? 30) * 1000;
    this.timeoutMs = options.timeout !== undefined ? options.timeout * 1000 : undefined;
    this.queueCapacity = options.queueCapacity ?? 0;
  }

  getPhase(): SchedulerPhase {
    return this.phase;
  }

  getStats(): DispatchStats {
    return { ...this.stats, queued: this.queue.length, inFlight: this.active.size };
  }

  async run(): Promise<void> {
    if (this.phase !== 'idle') {
      throw new StateError('Scheduler has already been started');
    }

    this.startedAt = this.now();
    this.accepting = !this.stopRequested;
    this.setPhase('warmup');

    try {
      await this.dispatchLoop();
    } catch (error) {
      // A throwing rate function ends the run; nothing admitted may outlive it.
      this.cancel();
      this.setPhase('cancelled');
      throw error;
    }

    this.accepting = false;
    this.dropQueued();
    this.setPhase('draining');
    await this.drain();
    this.setPhase(this.cancelRequested ? 'cancelled' : 'stopped');
  }

  /** Ends dispatching; in-flight executions get the grace period to finish. */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.accepting = false;
    this.dropQueued();
    this.wake.abort();
  }

  /** Ends dispatching and abandons everything still in flight. */
  cancel(): void {
    if (this.cancelRequested) return;
    this.cancelRequested = true;
    this.stop();
    for (const execution of [...this.active]) {
      this.abandon(execution);
    }
  }

  get stopped(): boolean {
    return this.stopRequested;
  }

  get cancelled(): boolean {
    return this.cancelRequested;
  }

  private async dispatchLoop(): Promise<void> {
    const warmupMs = this.options.warmupDuration * 1000;
    const endAt = this.startedAt + warmupMs + this.options.duration * 1000;
    let lastTick = this.startedAt;
    let owed = 0;
    let tick = 0;

    while (!this.stopRequested) {
      const now = Math.min(this.now(), endAt);
      const elapsed = (now - this.startedAt) / 1000;

      if (this.phase === 'warmup' && now - this.startedAt >= warmupMs) {
        this.setPhase('measuring');
      }

      owed += (this.options.generator.rateAt(elapsed) * (now - lastTick)) / 1000;
      lastTick = now;

      const due = Math.floor(owed + EPSILON);
      if (due > 0) {
        owed -= due;
        for (let i = 0; i < due && !this.stopRequested; i++) {
          this.dispatch(now, elapsed);
        }
      }

      if (now >= endAt) break;

      tick = Math.max(tick + 1, Math.ceil((this.now() - this.startedAt) / this.tickMs));
      await sleep(this.startedAt + tick * this.tickMs - this.now(), this.wake.signal);
    }
  }

  private dispatch(scheduledAt: number, elapsed: number): void {
    const event: DispatchEvent = { sequence: ++this.sequence, scheduledAt, elapsed };
    this.stats.dispatched++;

    if (this.active.size < this.options.maxConcurrent) {
      this.launch(event);
    } else if (this.queue.length < this.queueCapacity) {
      this.queue.push(event);
    } else {
      this.throttle(event);
    }
  }

  private throttle(event: DispatchEvent): void {
    this.stats.throttled++;
    this.emit(
      Object.freeze({ success: false, status: 'throttled', duration: 0 }),
      this.phaseAt(event.scheduledAt),
    );
  }

  private dropQueued(): void {
    for (const event of this.queue.splice(0)) {
      this.throttle(event);
    }
  }

  private launch(event: DispatchEvent): void {
    if (!this.accepting) {
      this.throttle(event);
      return;
    }

    const workload = this.options.registry.select();
    const controller = new AbortController();
    const execution: Execution = {
      event,
      workload,
      controller,
      startedAt: this.now(),
      settled: false,
    };

    this.active.add(execution);
    this.stats.admitted++;
    this.stats.peakInFlight = Math.max(this.stats.peakInFlight, this.active.size);

    if (this.timeoutMs !== undefined) {
      const timeoutMs = this.timeoutMs;
      execution.timer = setTimeout(() => {
        const error = new WorkloadTimeoutError(workload.name, timeoutMs);
        this.stats.timedOut++;
        this.settle(execution, { status: 'timeout', error: error.message, errorCode: error.code });
        controller.abort(error);
      }, timeoutMs);
    }

    const context = this.createContext(event, controller.signal);
    void runWorkload(workload, context).then((result) => this.settle(execution, result));
  }

  private createContext(event: DispatchEvent, signal: AbortSignal): ExecutionContext {
    const { context } = this.options;
    return {
      runName: context.runName,
      random: context.random,
      uniqueId: (prefix?: string) => context.uniqueId(prefix),
      sequence: event.sequence,
      elapsed: event.elapsed,
      phase: event.elapsed * 1000 < this.options.warmupDuration * 1000 ? 'warmup' : 'measuring',
      signal,
      sleep: (ms: number) => sleep(ms, signal),
    };
  }

  private abandon(execution: Execution): void {
    if (execution.settled) return;
    this.stats.abandoned++;
    this.settle(execution, { status: 'abandoned', error: 'Execution abandoned before completion' });
    execution.controller.abort(new Error('Execution abandoned'));
  }

  private settle(execution: Execution, result: SettleResult): void {
    if (execution.settled) return;
    execution.settled = true;
    if (execution.timer !== undefined) clearTimeout(execution.timer);
    this.active.delete(execution);

    const completedAt = this.now();
    const outcome: Outcome = Object.freeze({
      ...result,
      success: result.status === 'success',
      duration: Math.max(0, completedAt - execution.startedAt),
      workload: execution.workload.name,
    });
    this.emit(outcome, this.phaseAt(completedAt));

    this.pump();
    if (this.active.size === 0 && this.idleWaiter) {
      const resolve = this.idleWaiter;
      this.idleWaiter = null;
      resolve();
    }
  }

  private emit(outcome: Outcome, phase: RecordPhase): void {
    this.options.aggregator.record(outcome, phase);
    if (!this.options.onOutcome) return;
    try {
      this.options.onOutcome(outcome, phase);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(chalk.yellow(`Outcome listener failed: ${reason}`));
    }
  }

  /** Starts queued events while slots are free. */
  private pump(): void {
    while (this.accepting && this.queue.length > 0 && this.active.size < this.options.maxConcurrent) {
      const next = this.queue.shift();
      if (next) this.launch(next);
    }
  }

  private async drain(): Promise<void> {
    if (this.active.size > 0) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          this.idleWaiter = null;
          resolve();
        }, this.graceMs);
        this.idleWaiter = () => {
          clearTimeout(timer);
          resolve();
        };
      });
    }

    for (const execution of [...this.active]) {
      this.abandon(execution);
    }
  }

  private phaseAt(timestamp: number): RecordPhase {
    return timestamp - this.startedAt < this.options.warmupDuration * 1000 ? 'warmup' : 'measuring';
  }

  private setPhase(phase: SchedulerPhase): void {
    if (this.phase === phase) return;
    this.phase = phase;
    this.options.onPhaseChange?.(phase);
  }
}

function toStatus(success: boolean | undefined): OutcomeStatus {
  return success === false ? 'failure' : 'success';
}

/** Runs one workload execution; never rejects. */
export async function runWorkload(workload: Workload, context: ExecutionContext): Promise<SettleResult> {
  try {
    const result: WorkloadResult | void = await workload.execute(context);
    if (!result) return { status: 'success' };

    const status = toStatus(result.success);
    return {
      status,
      statusCode: result.statusCode,
      error: result.error,
      errorCode: status === 'failure' ? (result.errorCode ?? fallbackCode(result.statusCode)) : result.errorCode,
      metrics: result.metrics,
    };
  } catch (error) {
    return {
      status: 'failure',
      error: error instanceof Error ? error.message : String(error),
      errorCode: errorCodeOf(error),
    };
  }
}

function fallbackCode(statusCode: number | undefined): string {
  return statusCode !== undefined ? `HTTP_${statusCode}` : 'UNKNOWN';
}
