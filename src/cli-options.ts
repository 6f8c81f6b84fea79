import { ConfigurationError } from './errors.js';
import { PATTERN_DESCRIPTIONS, type PatternKind, type RatePattern } from './patterns.js';
import type { ExportFormat, RunConfig } from './types.js';

/** Raw option values as commander hands them over. */
export interface RunCommandOptions {
  name?: string;
  pattern: string;
  rate?: string;
  startRate?: string;
  endRate?: string;
  rampDuration?: string;
  steps?: string;
  stepDuration?: string;
  baselineRate?: string;
  spikeRate?: string;
  spikeDuration?: string;
  interval?: string;
  burstRate?: string;
  burstDuration?: string;
  delay?: string;
  jitter?: string;
  minRate?: string;
  maxRate?: string;
  period?: string;
  waveform?: string;
  duration?: string;
  warmup?: string;
  concurrency?: string;
  queue?: string;
  timeout?: string;
  grace?: string;
  method: string;
  header: string[];
  body?: string;
  seed?: string;
  output: string;
  report?: string;
}

const DEFAULT_RATE = 10;

function isPatternKind(value: string): value is PatternKind {
  return Object.keys(PATTERN_DESCRIPTIONS).includes(value);
}

function parseNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new ConfigurationError(`${flag} must be a number, got "${raw}"`);
  }
  return value;
}

function numberOr(flag: string, raw: string | undefined, fallback: number): number {
  return parseNumber(flag, raw) ?? fallback;
}

/** Run settings given on the command line; unset flags stay undefined. */
export function parseRunOverrides(options: RunCommandOptions): Partial<RunConfig> {
  return {
    name: options.name,
    duration: parseNumber('--duration', options.duration),
    warmupDuration: parseNumber('--warmup', options.warmup),
    maxConcurrent: parseNumber('--concurrency', options.concurrency),
    queueCapacity: parseNumber('--queue', options.queue),
    timeout: parseNumber('--timeout', options.timeout),
    gracePeriod: parseNumber('--grace', options.grace),
    seed: parseNumber('--seed', options.seed),
  };
}

/**
 * Builds a rate pattern from `--pattern` and the rate flags. `duration` is the
 * measured run length, used where a pattern needs a time span and none was given.
 */
export function buildPattern(options: RunCommandOptions, duration: number): RatePattern {
  const kind = options.pattern;
  if (!isPatternKind(kind)) {
    throw new ConfigurationError(
      `Unknown pattern "${kind}"`,
      `Use one of: ${Object.keys(PATTERN_DESCRIPTIONS).join(', ')}`,
    );
  }

  const rate = numberOr('--rate', options.rate, DEFAULT_RATE);
  const seed = parseNumber('--seed', options.seed);

  switch (kind) {
    case 'constant':
      return { kind, rate };
    case 'ramp':
      return {
        kind,
        startRate: numberOr('--start-rate', options.startRate, 1),
        endRate: numberOr('--end-rate', options.endRate, rate),
        rampDuration: numberOr('--ramp-duration', options.rampDuration, duration),
      };
    case 'step': {
      const steps = numberOr('--steps', options.steps, 5);
      return {
        kind,
        startRate: numberOr('--start-rate', options.startRate, 1),
        endRate: numberOr('--end-rate', options.endRate, rate),
        steps,
        stepDuration: numberOr('--step-duration', options.stepDuration, duration / steps),
      };
    }
    case 'spike':
      return {
        kind,
        baselineRate: numberOr('--baseline-rate', options.baselineRate, rate),
        spikeRate: numberOr('--spike-rate', options.spikeRate, rate * 5),
        spikeDuration: numberOr('--spike-duration', options.spikeDuration, 5),
        interval: numberOr('--interval', options.interval, 30),
      };
    case 'burst':
      return {
        kind,
        initialRate: rate,
        burstRate: numberOr('--burst-rate', options.burstRate, rate * 10),
        burstDuration: numberOr('--burst-duration', options.burstDuration, 5),
        delay: numberOr('--delay', options.delay, 10),
      };
    case 'steady':
      return { kind, targetRate: rate, jitter: numberOr('--jitter', options.jitter, 0.1), seed };
    case 'chaos':
      return {
        kind,
        minRate: numberOr('--min-rate', options.minRate, 1),
        maxRate: numberOr('--max-rate', options.maxRate, rate),
        changeInterval: parseNumber('--interval', options.interval),
        seed,
      };
    case 'wave': {
      const waveform = options.waveform ?? 'sine';
      if (waveform !== 'sine' && waveform !== 'square' && waveform !== 'sawtooth') {
        throw new ConfigurationError(`--waveform must be sine, square or sawtooth, got "${waveform}"`);
      }
      return {
        kind,
        minRate: numberOr('--min-rate', options.minRate, 1),
        maxRate: numberOr('--max-rate', options.maxRate, rate),
        period: numberOr('--period', options.period, 60),
        waveform,
      };
    }
    case 'custom':
    case 'composite':
      throw new ConfigurationError(
        `Pattern "${kind}" cannot be built from command-line flags`,
        'Use the library API: new LoadTest().setPattern(...)',
      );
  }
}

/** Parses repeated `--header "Name: value"` flags. */
export function parseHeaders(values: string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const value of values) {
    const separator = value.indexOf(':');
    const name = separator > 0 ? value.slice(0, separator).trim() : '';
    if (!name) {
      throw new ConfigurationError(`Invalid header "${value}"`, 'Headers take the form "Name: value"');
    }
    headers[name] = value.slice(separator + 1).trim();
  }
  return headers;
}

/** `.csv` files get CSV, anything else JSON. */
export function reportFormatFor(file: string): ExportFormat {
  const lower = file.toLowerCase();
  if (lower.endsWith('.csv')) return 'csv';
  if (lower.endsWith('.prom')) return 'prometheus';
  return 'json';
}

export function collect(value: string, previous: string[]): string[] {
  return previous.concat(value);
}
