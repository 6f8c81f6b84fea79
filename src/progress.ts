import chalk from 'chalk';
import type { DispatchStats, MetricsSnapshot, SchedulerPhase } from './types.js';

export interface ProgressSource {
  phase(): SchedulerPhase;
  elapsed(): number;
  statistics(): MetricsSnapshot;
  dispatch(): DispatchStats;
}

const PHASE_COLORS: Record<SchedulerPhase, (text: string) => string> = {
  idle: chalk.gray,
  warmup: chalk.yellow,
  measuring: chalk.cyan,
  draining: chalk.magenta,
  stopped: chalk.green,
  cancelled: chalk.red,
};

export function formatProgressLine(
  phase: SchedulerPhase,
  elapsedSeconds: number,
  totalSeconds: number,
  stats: MetricsSnapshot,
  dispatch: DispatchStats,
): string {
  const label = PHASE_COLORS[phase](phase.padEnd(9));
  const clock = `${elapsedSeconds.toFixed(1)}s/${totalSeconds}s`;
  const failed = stats.failed > 0 ? chalk.red(stats.failed) : String(stats.failed);

  return [
    label,
    clock,
    `requests: ${stats.totalRequests}`,
    `ok: ${chalk.green(stats.successful)}`,
    `failed: ${failed}`,
    `throttled: ${stats.throttled}`,
    `in-flight: ${dispatch.inFlight}`,
    `${stats.throughput.toFixed(1)} req/s`,
  ].join('  ');
}

/** Rewrites a single progress line on stdout while a run is active. */
export class ProgressReporter {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly source: ProgressSource,
    private readonly totalSeconds: number,
    private readonly intervalMs = 500,
  ) {}

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.render(), this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.render();
    process.stdout.write('\n');
  }

  private render(): void {
    const line = formatProgressLine(
      this.source.phase(),
      this.source.elapsed(),
      this.totalSeconds,
      this.source.statistics(),
      this.source.dispatch(),
    );
    process.stdout.write(`\r${line}`);
  }
}
