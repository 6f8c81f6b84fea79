import { writeFile } from 'node:fs/promises';
import chalk from 'chalk';
import { resolveRunConfig, validateRunConfig } from './config.js';
import { ConfigurationError, StateError } from './errors.js';
import { MetricsAggregator } from './metrics.js';
import { createRateGenerator, isRateGenerator, type RateGenerator, type RatePattern } from './patterns.js';
import { ProgressReporter } from './progress.js';
import { PrometheusExporter } from './prometheus.js';
import { WorkloadRegistry } from './registry.js';
import { renderResults } from './reporter.js';
import { Scheduler } from './scheduler.js';
import type { ExportFormat, MetricsSnapshot, RunConfig, RunContext, RunStatus, TestResult, Workload } from './types.js';
import { createRandom, type RandomSource } from './utils/random.js';

export interface LoadTestOptions {
  /** Monotonic clock in ms used for scheduling. */
  now?: () => number;
  /** Wall clock in ms used for snapshot timestamps. */
  wallClock?: () => number;
  /** Random source for workload selection; derived from config.seed when omitted. */
  random?: RandomSource;
}

type LifecycleState = 'configuring' | 'running' | 'finished';

/**
 * Configures and runs one load test.
 *
 * @example
 * const result = await new LoadTest({ name: 'checkout', duration: 30 })
 *   .addScenario(httpWorkload({ name: 'home', url: 'http://localhost:3000/' }), 4)
 *   .addScenario(httpWorkload({ name: 'cart', url: 'http://localhost:3000/cart' }), 1)
 *   .setPattern(ramp(5, 50, 20))
 *   .run();
 */
export class LoadTest {
  private config: RunConfig;
  private readonly workloads: Array<{ workload: Workload; weight?: number }> = [];
  private generator: RateGenerator | null = null;
  private state: LifecycleState = 'configuring';
  private scheduler: Scheduler | null = null;
  private aggregator: MetricsAggregator | null = null;
  private exporter: PrometheusExporter | null = null;
  private result: TestResult | null = null;
  private pendingStop: 'stop' | 'cancel' | null = null;

  constructor(
    config: Partial<RunConfig> = {},
    private readonly options: LoadTestOptions = {},
  ) {
    this.config = resolveRunConfig(config);
  }

  getConfig(): Readonly<RunConfig> {
    return this.config;
  }

  configure(config: Partial<RunConfig>): this {
    this.assertConfigurable('configure');
    this.config = resolveRunConfig(this.config, config);
    return this;
  }

  addScenario(workload: Workload, weight?: number): this {
    this.assertConfigurable('addScenario');
    const effective = weight ?? workload.weight ?? 1;
    if (!Number.isFinite(effective) || effective <= 0) {
      throw new ConfigurationError(`Weight for workload "${workload.name}" must be greater than 0, got ${effective}`);
    }
    this.workloads.push({ workload, weight });
    return this;
  }

  setPattern(pattern: RateGenerator | RatePattern): this {
    this.assertConfigurable('setPattern');
    this.generator = isRateGenerator(pattern) ? pattern : createRateGenerator(pattern);
    return this;
  }

  async run(): Promise<TestResult> {
    if (this.state !== 'configuring') {
      throw new StateError(
        this.state === 'running' ? 'This load test is already running' : 'This load test has already finished',
      );
    }

    validateRunConfig(this.config);
    if (this.workloads.length === 0) {
      throw new ConfigurationError('No scenarios added to the test', 'Add at least one with addScenario()');
    }
    const generator = this.generator;
    if (!generator) {
      throw new ConfigurationError('No traffic pattern set', 'Call setPattern() before run()');
    }

    const config = this.config;
    const random = this.options.random ?? createRandom(config.seed);
    const registry = new WorkloadRegistry(random);
    for (const { workload, weight } of this.workloads) {
      registry.add(workload, weight);
    }
    registry.freeze();

    this.state = 'running';
    const now = this.options.now ?? (() => performance.now());
    const wallClock = this.options.wallClock ?? Date.now;
    const aggregator = new MetricsAggregator(wallClock);
    const context = createRunContext(config.name, random);
    this.aggregator = aggregator;

    const scheduler = new Scheduler({
      generator,
      registry,
      aggregator,
      context,
      duration: config.duration,
      warmupDuration: config.warmupDuration,
      maxConcurrent: config.maxConcurrent,
      queueCapacity: config.queueCapacity,
      tickInterval: config.tickInterval,
      gracePeriod: config.gracePeriod,
      timeout: config.timeout,
      now,
      onOutcome: (outcome, phase) => exporter.record(outcome, phase),
      onPhaseChange: (phase) => {
        if (phase === 'measuring') aggregator.start();
        if (phase === 'warmup' && config.consoleOutput && config.warmupDuration > 0) {
          console.log(chalk.gray(`Warming up for ${config.warmupDuration}s...`));
        }
      },
    });

    const exporter = new PrometheusExporter({
      statistics: () => aggregator.getStatistics(),
      dispatch: () => scheduler.getStats(),
    });
    this.exporter = exporter;

    const startedAt = now();
    const progress = config.consoleOutput
      ? new ProgressReporter(
          {
            phase: () => scheduler.getPhase(),
            elapsed: () => (now() - startedAt) / 1000,
            statistics: () => aggregator.getStatistics(),
            dispatch: () => scheduler.getStats(),
          },
          config.warmupDuration + config.duration,
        )
      : null;

    // The same workload object may be registered under several weights.
    const workloads = [...new Set(registry.list())];
    try {
      await Promise.all(workloads.map((workload) => workload.setup?.(context)));

      this.scheduler = scheduler;
      if (this.pendingStop === 'cancel') scheduler.cancel();
      if (this.pendingStop === 'stop') scheduler.stop();

      if (config.consoleOutput) {
        console.log(
          `Running test '${config.name}' for ${config.duration}s: ${generator.describe()}, ` +
            `max ${config.maxConcurrent} concurrent`,
        );
      }
      progress?.start();
      await scheduler.run();
    } finally {
      progress?.stop();
      await this.teardown(workloads, context);
      aggregator.finalize();
      this.state = 'finished';
    }

    const snapshot = aggregator.getStatistics();
    const status: RunStatus = scheduler.cancelled ? 'cancelled' : scheduler.stopped ? 'stopped' : 'completed';
    this.result = {
      ...snapshot,
      name: config.name,
      status,
      config: { ...config },
      dispatch: scheduler.getStats(),
    };
    return this.result;
  }

  /** Requests a graceful stop. Safe to call at any time, including from a signal handler. */
  stop(): void {
    if (this.state === 'finished') return;
    if (this.scheduler) {
      this.scheduler.stop();
    } else if (this.state === 'running' && this.pendingStop === null) {
      this.pendingStop = 'stop';
    }
  }

  /** Stops dispatching and records everything still in flight as abandoned. */
  cancel(): void {
    if (this.state === 'finished') return;
    if (this.scheduler) {
      this.scheduler.cancel();
    } else if (this.state === 'running') {
      this.pendingStop = 'cancel';
    }
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  /** Live statistics while running, final ones afterwards. */
  getStatistics(): MetricsSnapshot | null {
    return this.aggregator?.getStatistics() ?? null;
  }

  getResult(): TestResult | null {
    return this.result;
  }

  /** Prometheus text exposition of the current run; live while running. */
  async metrics(): Promise<string> {
    if (!this.exporter) {
      throw new StateError('No metrics to export; run() has not started');
    }
    return this.exporter.render();
  }

  /** Renders the final result and optionally writes it to `output`. */
  async report(format: ExportFormat = 'pretty', output?: string): Promise<string> {
    if (!this.result) {
      throw new StateError('No result to report; run() has not completed');
    }
    const rendered = format === 'prometheus' ? await this.metrics() : renderResults(this.result, format);
    if (output) {
      await writeFile(output, rendered, 'utf8');
    }
    return rendered;
  }

  private assertConfigurable(method: string): void {
    if (this.state !== 'configuring') {
      throw new StateError(`${method}() is only allowed before run() starts`);
    }
  }

  private async teardown(workloads: Workload[], context: RunContext): Promise<void> {
    const results = await Promise.allSettled(workloads.map((workload) => workload.teardown?.(context)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        console.error(chalk.yellow(`Teardown of "${workloads[index].name}" failed: ${reason}`));
      }
    });
  }
}

export function createRunContext(runName: string, random: RandomSource): RunContext {
  let counter = 0;
  return {
    runName,
    random,
    uniqueId: (prefix = 'load-test') => `${prefix}-${Date.now()}-${++counter}-${random().toString(36).slice(2, 8)}`,
  };
}
