import chalk from 'chalk';
import type { ExportFormat, ReportFormat, TestResult } from './types.js';

export interface ReporterOptions {
  format: ReportFormat;
}

export const REPORT_FORMATS: readonly ReportFormat[] = ['pretty', 'json', 'csv'];

export const EXPORT_FORMATS: readonly ExportFormat[] = [...REPORT_FORMATS, 'prometheus'];

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value);
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

function formatLatency(ms: number): string {
  return ms < 10 ? ms.toFixed(2) : Math.round(ms).toString();
}

function percent(part: number, whole: number): string {
  return whole > 0 ? ((part / whole) * 100).toFixed(1) : '0.0';
}

export function renderResults(result: TestResult, format: ReportFormat = 'pretty'): string {
  switch (format) {
    case 'json':
      return renderJson(result);
    case 'csv':
      return renderCsv(result);
    case 'pretty':
      return renderPretty(result);
  }
}

export function printResults(result: TestResult, options: ReporterOptions = { format: 'pretty' }): void {
  console.log(renderResults(result, options.format));
}

function renderPretty(result: TestResult): string {
  const stats = result.responseTime;
  const offered = result.totalRequests + result.throttled + result.abandoned;
  const lines: string[] = [];

  lines.push('');
  lines.push(chalk.bold('Load Test Results'));
  lines.push(chalk.gray('══════════════════════════════════════'));
  lines.push(`${chalk.cyan('Test:')}          ${result.name}`);
  lines.push(`${chalk.cyan('Status:')}        ${result.status}`);
  lines.push(`${chalk.cyan('Duration:')}      ${formatDuration(result.duration)}`);
  lines.push('');

  lines.push(chalk.bold('Requests:'));
  lines.push(`  Total:        ${result.totalRequests}`);
  lines.push(`  Succeeded:    ${chalk.green(result.successful)} (${result.successRate.toFixed(1)}%)`);
  lines.push(`  Failed:       ${chalk.red(result.failed)} (${result.errorRate.toFixed(1)}%)`);
  lines.push(`  Timed out:    ${result.timedOut}`);
  lines.push('');

  lines.push(chalk.bold('Client-side limits:'));
  lines.push(`  Throttled:    ${chalk.yellow(result.throttled)} (${percent(result.throttled, offered)}% of offered)`);
  lines.push(`  Abandoned:    ${chalk.yellow(result.abandoned)} (${percent(result.abandoned, offered)}% of offered)`);
  lines.push(`  Warmup:       ${result.warmupExcluded} excluded`);
  lines.push(`  Peak load:    ${result.dispatch.peakInFlight}/${result.config.maxConcurrent} in flight`);
  lines.push('');

  if (result.totalRequests > 0) {
    lines.push(chalk.bold('Latency (ms):'));
    lines.push(`  Min:          ${formatLatency(stats.min)}`);
    lines.push(`  Max:          ${formatLatency(stats.max)}`);
    lines.push(`  Avg:          ${formatLatency(stats.avg)}`);
    lines.push(`  p50:          ${formatLatency(stats.p50)}`);
    lines.push(`  p90:          ${formatLatency(stats.p90)}`);
    lines.push(`  p95:          ${formatLatency(stats.p95)}`);
    lines.push(`  p99:          ${formatLatency(stats.p99)}`);
    lines.push('');
  }

  const workloads = Object.entries(result.workloads);
  if (workloads.length > 1) {
    lines.push(chalk.bold('Workloads:'));
    for (const [name, counts] of workloads) {
      lines.push(`  ${name.padEnd(14)}${counts.total} (${chalk.red(counts.failed)} failed)`);
    }
    lines.push('');
  }

  const statusCodes = Object.entries(result.statusCodes);
  if (statusCodes.length > 0) {
    lines.push(chalk.bold('Status codes:'));
    for (const [code, count] of statusCodes) {
      lines.push(`  ${code.padEnd(14)}${count}`);
    }
    lines.push('');
  }

  const errors = Object.entries(result.errors);
  if (errors.length > 0) {
    lines.push(chalk.bold('Errors:'));
    for (const [code, count] of errors) {
      lines.push(`  ${chalk.red(code)}:  ${count}`);
    }
    lines.push('');
  }

  const custom = Object.entries(result.customMetrics);
  if (custom.length > 0) {
    lines.push(chalk.bold('Custom metrics:'));
    for (const [name, series] of custom) {
      lines.push(`  ${name}: count=${series.count} avg=${series.avg.toFixed(2)} p95=${series.p95.toFixed(2)} max=${series.max}`);
    }
    lines.push('');
  }

  lines.push(`${chalk.cyan('Throughput:')}   ${chalk.bold(result.throughput.toFixed(1))} req/s`);
  lines.push(chalk.gray('══════════════════════════════════════'));
  lines.push('');

  return lines.join('\n');
}

function renderJson(result: TestResult): string {
  const stats = result.responseTime;
  const output = {
    name: result.name,
    status: result.status,
    started_at: new Date(result.startedAt).toISOString(),
    ended_at: new Date(result.endedAt).toISOString(),
    duration_ms: Math.round(result.duration),
    requests: {
      total: result.totalRequests,
      succeeded: result.successful,
      failed: result.failed,
      timed_out: result.timedOut,
      throttled: result.throttled,
      abandoned: result.abandoned,
      warmup_excluded: result.warmupExcluded,
      success_rate: result.successRate,
    },
    latency_ms: {
      min: stats.min,
      max: stats.max,
      avg: stats.avg,
      p50: stats.p50,
      p90: stats.p90,
      p95: stats.p95,
      p99: stats.p99,
      p999: stats.p999,
    },
    status_codes: result.statusCodes,
    errors: result.errors,
    workloads: result.workloads,
    custom_metrics: result.customMetrics,
    dispatch: result.dispatch,
    throughput_rps: result.throughput,
  };

  return JSON.stringify(output, null, 2);
}

function renderCsv(result: TestResult): string {
  const stats = result.responseTime;
  const header =
    'name,status,duration_ms,total,succeeded,failed,timed_out,throttled,abandoned,success_rate,min_ms,max_ms,avg_ms,p50_ms,p90_ms,p95_ms,p99_ms,throughput_rps';

  const row = [
    `"${result.name.replace(/"/g, '""')}"`,
    result.status,
    Math.round(result.duration),
    result.totalRequests,
    result.successful,
    result.failed,
    result.timedOut,
    result.throttled,
    result.abandoned,
    result.successRate.toFixed(2),
    stats.min.toFixed(2),
    stats.max.toFixed(2),
    stats.avg.toFixed(2),
    stats.p50.toFixed(2),
    stats.p90.toFixed(2),
    stats.p95.toFixed(2),
    stats.p99.toFixed(2),
    result.throughput.toFixed(2),
  ].join(',');

  return `${header}\n${row}`;
}
