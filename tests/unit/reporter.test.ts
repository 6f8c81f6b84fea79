/**
 * Unit Tests: pretty, JSON and CSV rendering.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import chalk from 'chalk';
import { isReportFormat, printResults, renderResults } from '../../src/reporter.js';
import { sampleResult } from '../helpers/results.js';

describe('Reporter', () => {
  const originalLevel = chalk.level;

  beforeEach(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = originalLevel;
    vi.restoreAllMocks();
  });

  describe('pretty', () => {
    it('renders request counts and client-side limits', () => {
      const lines = renderResults(sampleResult(), 'pretty').split('\n');

      expect(lines).toContain('Test:          checkout "smoke"');
      expect(lines).toContain('Status:        completed');
      expect(lines).toContain('Duration:      10.0s');
      expect(lines).toContain('  Total:        100');
      expect(lines).toContain('  Succeeded:    95 (95.0%)');
      expect(lines).toContain('  Failed:       5 (5.0%)');
      expect(lines).toContain('  Throttled:    3 (2.9% of offered)');
      expect(lines).toContain('  Abandoned:    1 (1.0% of offered)');
      expect(lines).toContain('  Warmup:       12 excluded');
      expect(lines).toContain('  Peak load:    12/1000 in flight');
    });

    it('renders latency, breakdowns and throughput', () => {
      const lines = renderResults(sampleResult(), 'pretty').split('\n');

      expect(lines).toContain('  Min:          5.00');
      expect(lines).toContain('  p99:          200');
      expect(lines).toContain('  read          80 (2 failed)');
      expect(lines).toContain('  200           95');
      expect(lines).toContain('  HTTP_500:  3');
      expect(lines).toContain('  response_bytes: count=95 avg=100.00 p95=140.00 max=150');
      expect(lines).toContain('Throughput:   10.0 req/s');
    });

    it('omits empty sections', () => {
      const output = renderResults(
        sampleResult({
          totalRequests: 0,
          workloads: { only: { total: 0, successful: 0, failed: 0 } },
          statusCodes: {},
          errors: {},
          customMetrics: {},
        }),
        'pretty',
      );

      expect(output).not.toContain('Latency (ms):');
      expect(output).not.toContain('Workloads:');
      expect(output).not.toContain('Status codes:');
      expect(output).not.toContain('Errors:');
      expect(output).not.toContain('Custom metrics:');
    });
  });

  describe('json', () => {
    it('uses snake_case keys and ISO timestamps', () => {
      const parsed: unknown = JSON.parse(renderResults(sampleResult(), 'json'));

      expect(parsed).toMatchObject({
        name: 'checkout "smoke"',
        status: 'completed',
        started_at: '2026-01-01T00:00:00.000Z',
        ended_at: '2026-01-01T00:00:10.000Z',
        duration_ms: 10_000,
        requests: {
          total: 100,
          succeeded: 95,
          failed: 5,
          timed_out: 2,
          throttled: 3,
          abandoned: 1,
          warmup_excluded: 12,
          success_rate: 95,
        },
        latency_ms: { min: 5, p99: 200, p999: 240 },
        status_codes: { '200': 95, '500': 3 },
        errors: { HTTP_500: 3, TIMEOUT: 2 },
        dispatch: { dispatched: 104, peakInFlight: 12 },
        throughput_rps: 10,
      });
    });
  });

  describe('csv', () => {
    it('renders a header and one escaped row', () => {
      const [header, row] = renderResults(sampleResult(), 'csv').split('\n');

      expect(header).toBe(
        'name,status,duration_ms,total,succeeded,failed,timed_out,throttled,abandoned,success_rate,min_ms,max_ms,avg_ms,p50_ms,p90_ms,p95_ms,p99_ms,throughput_rps',
      );
      expect(row).toBe(
        '"checkout ""smoke""",completed,10000,100,95,5,2,3,1,95.00,5.00,250.00,42.50,40.00,80.00,120.00,200.00,10.00',
      );
    });
  });

  it('recognises report formats', () => {
    expect(isReportFormat('csv')).toBe(true);
    expect(isReportFormat('html')).toBe(false);
  });

  it('prints the rendered report', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const result = sampleResult();

    printResults(result, { format: 'json' });

    expect(logSpy).toHaveBeenCalledWith(renderResults(result, 'json'));
  });
});
