/**
 * Unit Tests: command-line option parsing.
 */
import { describe, it, expect } from 'vitest';
import {
  buildPattern,
  collect,
  parseHeaders,
  parseRunOverrides,
  reportFormatFor,
  type RunCommandOptions,
} from '../../src/cli-options.js';
import { ConfigurationError } from '../../src/errors.js';

function options(overrides: Partial<RunCommandOptions> = {}): RunCommandOptions {
  return { pattern: 'constant', method: 'GET', header: [], output: 'pretty', ...overrides };
}

describe('buildPattern', () => {
  it('defaults to a constant 10 rps', () => {
    expect(buildPattern(options(), 60)).toEqual({ kind: 'constant', rate: 10 });
  });

  it('builds a ramp over the run duration by default', () => {
    expect(buildPattern(options({ pattern: 'ramp', rate: '40' }), 60)).toEqual({
      kind: 'ramp',
      startRate: 1,
      endRate: 40,
      rampDuration: 60,
    });
  });

  it('takes explicit ramp flags', () => {
    expect(
      buildPattern(options({ pattern: 'ramp', startRate: '5', endRate: '50', rampDuration: '30' }), 60),
    ).toEqual({ kind: 'ramp', startRate: 5, endRate: 50, rampDuration: 30 });
  });

  it('spreads steps over the run duration', () => {
    expect(buildPattern(options({ pattern: 'step', steps: '4' }), 60)).toEqual({
      kind: 'step',
      startRate: 1,
      endRate: 10,
      steps: 4,
      stepDuration: 15,
    });
  });

  it('passes the seed to random patterns', () => {
    expect(buildPattern(options({ pattern: 'steady', rate: '20', jitter: '0.2', seed: '7' }), 60)).toEqual({
      kind: 'steady',
      targetRate: 20,
      jitter: 0.2,
      seed: 7,
    });
  });

  it('builds a wave with a chosen waveform', () => {
    expect(buildPattern(options({ pattern: 'wave', minRate: '2', maxRate: '8', waveform: 'square' }), 60)).toEqual({
      kind: 'wave',
      minRate: 2,
      maxRate: 8,
      period: 60,
      waveform: 'square',
    });
  });

  it('rejects an unknown waveform', () => {
    expect(() => buildPattern(options({ pattern: 'wave', waveform: 'triangle' }), 60)).toThrow(
      '--waveform must be sine, square or sawtooth, got "triangle"',
    );
  });

  it('rejects unknown patterns with a list of the known ones', () => {
    try {
      buildPattern(options({ pattern: 'zigzag' }), 60);
      expect.unreachable('buildPattern should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        message: 'Unknown pattern "zigzag"',
        suggestion: 'Use one of: constant, ramp, spike, burst, steady, step, chaos, wave, custom, composite',
      });
    }
  });

  it('rejects patterns that need code', () => {
    expect(() => buildPattern(options({ pattern: 'composite' }), 60)).toThrow(ConfigurationError);
  });

  it('rejects flags that are not numbers', () => {
    expect(() => buildPattern(options({ rate: 'fast' }), 60)).toThrow('--rate must be a number, got "fast"');
  });
});

describe('parseRunOverrides', () => {
  it('maps flags onto run settings', () => {
    const overrides = parseRunOverrides(options({ duration: '30', concurrency: '50', queue: '10', timeout: '2.5' }));

    expect(overrides).toMatchObject({ duration: 30, maxConcurrent: 50, queueCapacity: 10, timeout: 2.5 });
    expect(overrides.warmupDuration).toBeUndefined();
    expect(overrides.seed).toBeUndefined();
  });
});

describe('parseHeaders', () => {
  it('splits on the first colon and trims', () => {
    expect(parseHeaders(['Authorization: Bearer test-token', 'X-Trace:  a:b '])).toEqual({
      Authorization: 'Bearer test-token',
      'X-Trace': 'a:b',
    });
  });

  it('rejects headers without a name', () => {
    expect(() => parseHeaders(['no-colon'])).toThrow(ConfigurationError);
    expect(() => parseHeaders([': value'])).toThrow(ConfigurationError);
  });
});

describe('report helpers', () => {
  it('picks the file format from the extension', () => {
    expect(reportFormatFor('out/REPORT.CSV')).toBe('csv');
    expect(reportFormatFor('report.json')).toBe('json');
    expect(reportFormatFor('report')).toBe('json');
    expect(reportFormatFor('metrics.prom')).toBe('prometheus');
  });

  it('collects repeated values', () => {
    expect(collect('b', ['a'])).toEqual(['a', 'b']);
  });
});
