import type { RandomSource } from './utils/random.js';

export type OutcomeStatus = 'success' | 'failure' | 'timeout' | 'throttled' | 'abandoned';

/** Phase an outcome is attributed to when it reaches the aggregator. */
export type RecordPhase = 'warmup' | 'measuring';

export type SchedulerPhase = 'idle' | 'warmup' | 'measuring' | 'draining' | 'stopped' | 'cancelled';

export type RunStatus = 'completed' | 'stopped' | 'cancelled';

export interface Outcome {
  readonly success: boolean;
  readonly status: OutcomeStatus;
  /** Milliseconds from launch to completion. */
  readonly duration: number;
  readonly workload?: string;
  readonly statusCode?: number;
  readonly error?: string;
  readonly errorCode?: string;
  readonly metrics?: Readonly<Record<string, number>>;
}

/**
 * What a workload's execute() may resolve with. Resolving with nothing counts
 * as a success; throwing counts as a failure.
 */
export interface WorkloadResult {
  success?: boolean;
  statusCode?: number;
  error?: string;
  errorCode?: string;
  metrics?: Record<string, number>;
}

export interface DispatchEvent {
  readonly sequence: number;
  /** Clock reading (ms) at which the event was emitted. */
  readonly scheduledAt: number;
  /** Seconds since the run started. */
  readonly elapsed: number;
}

/** Created once per run and shared by every workload. */
export interface RunContext {
  readonly runName: string;
  readonly random: RandomSource;
  uniqueId(prefix?: string): string;
}

export interface ExecutionContext extends RunContext {
  readonly sequence: number;
  readonly elapsed: number;
  readonly phase: RecordPhase;
  /** Aborted when the execution times out or the run is cancelled. */
  readonly signal: AbortSignal;
  sleep(ms: number): Promise<void>;
}

export type WorkloadKind = 'http' | 'socket' | 'session' | 'custom';

export interface Workload {
  readonly name: string;
  readonly kind: WorkloadKind;
  readonly weight?: number;
  execute(ctx: ExecutionContext): Promise<WorkloadResult | void>;
  setup?(ctx: RunContext): Promise<void>;
  teardown?(ctx: RunContext): Promise<void>;
}

export interface RunConfig {
  name: string;
  /** Measured seconds, after warmup. */
  duration: number;
  warmupDuration: number;
  maxConcurrent: number;
  consoleOutput: boolean;
  /** Events that may wait for a slot; 0 drops them as throttled right away. */
  queueCapacity: number;
  /** Seconds in-flight executions get to finish once dispatching ends. */
  gracePeriod: number;
  /** Per-execution budget in seconds. */
  timeout?: number;
  tickInterval: number;
  seed?: number;
}

export interface LatencyStats {
  min: number;
  max: number;
  avg: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
  p999: number;
}

export interface MetricSeriesStats {
  count: number;
  sum: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
}

export interface WorkloadStats {
  total: number;
  successful: number;
  failed: number;
}

export interface MetricsSnapshot {
  /** Epoch ms at which measuring started. */
  startedAt: number;
  endedAt: number;
  /** Measured window in ms. */
  duration: number;
  totalRequests: number;
  successful: number;
  failed: number;
  timedOut: number;
  throttled: number;
  abandoned: number;
  warmupExcluded: number;
  successRate: number;
  errorRate: number;
  /** Completed requests per second over the measured window. */
  throughput: number;
  responseTime: LatencyStats;
  statusCodes: Record<string, number>;
  errors: Record<string, number>;
  workloads: Record<string, WorkloadStats>;
  customMetrics: Record<string, MetricSeriesStats>;
  finalized: boolean;
}

export interface DispatchStats {
  dispatched: number;
  admitted: number;
  queued: number;
  throttled: number;
  abandoned: number;
  timedOut: number;
  inFlight: number;
  peakInFlight: number;
}

export interface TestResult extends MetricsSnapshot {
  name: string;
  status: RunStatus;
  config: RunConfig;
  dispatch: DispatchStats;
}

export type ReportFormat = 'pretty' | 'json' | 'csv';

/** Report formats plus the Prometheus text exposition. */
export type ExportFormat = ReportFormat | 'prometheus';
