export { LoadTest, createRunContext, type LoadTestOptions } from './load-test.js';
export {
  PATTERN_DESCRIPTIONS,
  burst,
  chaos,
  constant,
  createRateGenerator,
  isRateGenerator,
  ramp,
  spike,
  steady,
  stepLadder,
  type PatternKind,
  type RateGenerator,
  type RatePattern,
} from './patterns.js';
export { WorkloadRegistry } from './registry.js';
export { Scheduler, runWorkload, type SchedulerOptions } from './scheduler.js';
export { MetricsAggregator, calculateLatencyStats, percentile } from './metrics.js';
export { DEFAULT_RUN_CONFIG, loadConfig, resolveRunConfig, validateRunConfig, type EnvConfig } from './config.js';
export {
  ConfigurationError,
  LoadTestError,
  StateError,
  WorkloadTimeoutError,
  describeError,
  errorCodeOf,
} from './errors.js';
export {
  EXPORT_FORMATS,
  REPORT_FORMATS,
  isExportFormat,
  isReportFormat,
  printResults,
  renderResults,
  type ReporterOptions,
} from './reporter.js';
export { PrometheusExporter, type PrometheusExporterOptions, type PrometheusSource } from './prometheus.js';
export { sampleThinkTime, validateThinkTime, type ThinkTime } from './think-time.js';
export { ProgressReporter, formatProgressLine, type ProgressSource } from './progress.js';
export * from './workloads/index.js';
export { createRandom, type RandomSource } from './utils/random.js';
export type * from './types.js';
