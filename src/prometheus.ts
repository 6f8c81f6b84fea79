import { Counter, Gauge, Registry, Summary } from 'prom-client';
import type { DispatchStats, MetricsSnapshot, Outcome, RecordPhase } from './types.js';

export interface PrometheusSource {
  statistics(): MetricsSnapshot;
  dispatch(): DispatchStats;
}

export interface PrometheusExporterOptions {
  /** Metric name prefix; characters Prometheus rejects become underscores. */
  prefix?: string;
  /** Summary quantiles for response times. */
  percentiles?: number[];
}

const DEFAULT_PERCENTILES = [0.5, 0.9, 0.95, 0.99, 0.999];

function metricPrefix(prefix: string): string {
  const cleaned = prefix.replace(/[^a-zA-Z0-9_:]/g, '_');
  return /^[0-9]/.test(cleaned) ? `_${cleaned}` : cleaned;
}

/**
 * Prometheus metrics for one run, kept in a registry of its own.
 *
 * Counters and the response-time summary are fed outcome by outcome; the
 * gauges are read from the source each time the metrics are rendered.
 */
export class PrometheusExporter {
  readonly registry = new Registry();

  private readonly outcomes: Counter<'workload' | 'status'>;
  private readonly errors: Counter<'code'>;
  private readonly responseTime: Summary<'workload'>;
  private readonly successRate: Gauge;
  private readonly throughput: Gauge;
  private readonly inFlight: Gauge;
  private readonly peakInFlight: Gauge;
  private readonly warmupExcluded: Gauge;

  constructor(
    private readonly source: PrometheusSource,
    options: PrometheusExporterOptions = {},
  ) {
    const prefix = metricPrefix(options.prefix ?? 'loadpulse');
    const registers = [this.registry];

    this.outcomes = new Counter({
      name: `${prefix}_outcomes_total`,
      help: 'Measured executions by workload and outcome status',
      labelNames: ['workload', 'status'],
      registers,
    });

    this.errors = new Counter({
      name: `${prefix}_errors_total`,
      help: 'Failed and timed-out executions by error code',
      labelNames: ['code'],
      registers,
    });

    this.responseTime = new Summary({
      name: `${prefix}_response_time_ms`,
      help: 'Execution duration in milliseconds',
      labelNames: ['workload'],
      percentiles: options.percentiles ?? DEFAULT_PERCENTILES,
      registers,
    });

    this.successRate = new Gauge({
      name: `${prefix}_success_rate_percent`,
      help: 'Successful share of completed executions',
      registers,
    });

    this.throughput = new Gauge({
      name: `${prefix}_throughput_rps`,
      help: 'Completed executions per second over the measured window',
      registers,
    });

    this.inFlight = new Gauge({
      name: `${prefix}_in_flight`,
      help: 'Executions currently running',
      registers,
    });

    this.peakInFlight = new Gauge({
      name: `${prefix}_peak_in_flight`,
      help: 'Highest number of executions running at once',
      registers,
    });

    this.warmupExcluded = new Gauge({
      name: `${prefix}_warmup_excluded`,
      help: 'Executions completed during warmup and left out of the statistics',
      registers,
    });
  }

  /** Warmup outcomes are skipped, as in the snapshot. */
  record(outcome: Outcome, phase: RecordPhase): void {
    if (phase !== 'measuring') return;

    const workload = outcome.workload ?? 'unknown';
    this.outcomes.inc({ workload, status: outcome.status });

    if (outcome.status === 'success' || outcome.status === 'failure' || outcome.status === 'timeout') {
      this.responseTime.observe({ workload }, outcome.duration);
    }
    if ((outcome.status === 'failure' || outcome.status === 'timeout') && outcome.errorCode !== undefined) {
      this.errors.inc({ code: outcome.errorCode });
    }
  }

  /** Text exposition format. */
  async render(): Promise<string> {
    const stats = this.source.statistics();
    const dispatch = this.source.dispatch();

    this.successRate.set(stats.successRate);
    this.throughput.set(stats.throughput);
    this.inFlight.set(dispatch.inFlight);
    this.peakInFlight.set(dispatch.peakInFlight);
    this.warmupExcluded.set(stats.warmupExcluded);

    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
