import type {
  LatencyStats,
  MetricSeriesStats,
  MetricsSnapshot,
  Outcome,
  RecordPhase,
  WorkloadStats,
} from './types.js';

/**
 * Percentile of an ascending array, interpolating linearly between the two
 * nearest ranks. Returns 0 for an empty array.
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;

  const rank = (sorted.length - 1) * (p / 100);
  const lower = Math.floor(rank);
  const upper = Math.min(lower + 1, sorted.length - 1);
  const weight = rank - lower;

  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

export function calculateLatencyStats(latencies: number[]): LatencyStats {
  if (latencies.length === 0) {
    return { min: 0, max: 0, avg: 0, p50: 0, p90: 0, p95: 0, p99: 0, p999: 0 };
  }

  const sorted = [...latencies].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: sum / sorted.length,
    p50: percentile(sorted, 50),
    p90: percentile(sorted, 90),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    p999: percentile(sorted, 99.9),
  };
}

function seriesStats(values: number[]): MetricSeriesStats {
  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);

  return {
    count: sorted.length,
    sum,
    min: sorted[0],
    max: sorted[sorted.length - 1],
    avg: sum / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Running aggregate of execution outcomes.
 *
 * record() is synchronous, so every update lands in one turn of the event
 * loop and no two completions can interleave inside it. Every duration is
 * retained, which keeps percentiles exact.
 */
export class MetricsAggregator {
  private durations: number[] = [];
  private successful = 0;
  private failed = 0;
  private timedOut = 0;
  private throttled = 0;
  private abandoned = 0;
  private warmupExcluded = 0;
  private statusCodes = new Map<string, number>();
  private errors = new Map<string, number>();
  private workloads = new Map<string, WorkloadStats>();
  private customMetrics = new Map<string, number[]>();
  private startedAt: number;
  private endedAt: number | null = null;

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  get isFinalized(): boolean {
    return this.endedAt !== null;
  }

  /** Marks the beginning of the measured window. */
  start(at: number = this.now()): void {
    if (this.isFinalized) return;
    this.startedAt = at;
  }

  /**
   * Folds one outcome into the aggregate. Warmup outcomes are only counted as
   * excluded. Returns false when the outcome was not folded in.
   */
  record(outcome: Outcome, phase: RecordPhase = 'measuring'): boolean {
    if (this.isFinalized) return false;

    if (phase === 'warmup') {
      this.warmupExcluded++;
      return false;
    }

    switch (outcome.status) {
      case 'throttled':
        this.throttled++;
        return true;
      case 'abandoned':
        this.abandoned++;
        return true;
      case 'success':
        this.successful++;
        break;
      case 'timeout':
        this.timedOut++;
        this.failed++;
        increment(this.errors, outcome.errorCode ?? 'TIMEOUT');
        break;
      case 'failure':
        this.failed++;
        increment(this.errors, outcome.errorCode ?? 'UNKNOWN');
        break;
    }

    this.durations.push(outcome.duration);

    if (outcome.statusCode !== undefined) {
      increment(this.statusCodes, String(outcome.statusCode));
    }

    if (outcome.workload !== undefined) {
      const stats = this.workloads.get(outcome.workload) ?? { total: 0, successful: 0, failed: 0 };
      stats.total++;
      if (outcome.success) {
        stats.successful++;
      } else {
        stats.failed++;
      }
      this.workloads.set(outcome.workload, stats);
    }

    if (outcome.metrics) {
      for (const [name, value] of Object.entries(outcome.metrics)) {
        if (!Number.isFinite(value)) continue;
        const series = this.customMetrics.get(name);
        if (series) {
          series.push(value);
        } else {
          this.customMetrics.set(name, [value]);
        }
      }
    }

    return true;
  }

  getStatistics(): MetricsSnapshot {
    const endedAt = this.endedAt ?? this.now();
    const duration = Math.max(0, endedAt - this.startedAt);
    const totalRequests = this.successful + this.failed;

    const customMetrics: Record<string, MetricSeriesStats> = Object.fromEntries(
      [...this.customMetrics].map(([name, values]) => [name, seriesStats(values)]),
    );
    const workloads: Record<string, WorkloadStats> = Object.fromEntries(
      [...this.workloads].map(([name, stats]) => [name, { ...stats }]),
    );

    return {
      startedAt: this.startedAt,
      endedAt,
      duration,
      totalRequests,
      successful: this.successful,
      failed: this.failed,
      timedOut: this.timedOut,
      throttled: this.throttled,
      abandoned: this.abandoned,
      warmupExcluded: this.warmupExcluded,
      successRate: totalRequests > 0 ? (this.successful / totalRequests) * 100 : 0,
      errorRate: totalRequests > 0 ? (this.failed / totalRequests) * 100 : 0,
      throughput: duration > 0 ? totalRequests / (duration / 1000) : 0,
      responseTime: calculateLatencyStats(this.durations),
      statusCodes: Object.fromEntries(this.statusCodes),
      errors: Object.fromEntries(this.errors),
      workloads,
      customMetrics,
      finalized: this.isFinalized,
    };
  }

  /** Closes the measured window. Later record() calls are ignored. */
  finalize(at: number = this.now()): MetricsSnapshot {
    if (this.endedAt === null) {
      this.endedAt = at;
    }
    return this.getStatistics();
  }
}
