import { ConfigurationError } from './errors.js';
import { createRandom, exponential, gaussian, uniform, type RandomSource } from './utils/random.js';

export type RatePattern =
  | { kind: 'constant'; rate: number }
  | { kind: 'ramp'; startRate: number; endRate: number; rampDuration: number }
  | { kind: 'spike'; baselineRate: number; spikeRate: number; spikeDuration: number; interval: number }
  | {
      kind: 'burst';
      initialRate: number;
      burstRate: number;
      burstDuration: number;
      delay: number;
      finalRate?: number;
    }
  | {
      kind: 'steady';
      targetRate: number;
      jitter: number;
      distribution?: 'uniform' | 'gaussian';
      seed?: number;
    }
  | { kind: 'step'; startRate: number; endRate: number; steps: number; stepDuration: number }
  | {
      kind: 'chaos';
      minRate: number;
      maxRate: number;
      distribution?: 'uniform' | 'gaussian' | 'exponential';
      changeInterval?: number;
      seed?: number;
    }
  | { kind: 'wave'; minRate: number; maxRate: number; period: number; waveform?: 'sine' | 'square' | 'sawtooth' }
  | { kind: 'custom'; curve: (elapsed: number) => number; duration?: number }
  | { kind: 'composite'; segments: Array<{ pattern: RatePattern; duration: number }> };

export type PatternKind = RatePattern['kind'];

export interface RateGenerator {
  readonly kind: PatternKind;
  readonly pattern: RatePattern;
  /** Target rate in requests/second at `elapsed` seconds; always >= 0. */
  rateAt(elapsed: number): number;
  describe(): string;
}

export const PATTERN_DESCRIPTIONS: Record<PatternKind, string> = {
  constant: 'Fixed rate for the whole run',
  ramp: 'Linear ramp from a start rate to an end rate, then hold',
  spike: 'Baseline rate with a periodic spike',
  burst: 'One burst after an initial delay',
  steady: 'Target rate with random jitter',
  step: 'Discrete steps between a start and an end rate',
  chaos: 'Random rate drawn from a distribution',
  wave: 'Periodic sine, square or sawtooth wave',
  custom: 'User supplied curve',
  composite: 'Patterns played one after another',
};

function requireRate(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative number, got ${value}`);
  }
}

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be greater than 0, got ${value}`);
  }
}

function requireRange(minName: string, min: number, maxName: string, max: number): void {
  if (min > max) {
    throw new ConfigurationError(`${minName} (${min}) must not exceed ${maxName} (${max})`);
  }
}

function clampRate(rate: number): number {
  return Number.isFinite(rate) && rate > 0 ? rate : 0;
}

function validate(pattern: RatePattern): void {
  switch (pattern.kind) {
    case 'constant':
      requireRate('rate', pattern.rate);
      break;
    case 'ramp':
      requireRate('startRate', pattern.startRate);
      requireRate('endRate', pattern.endRate);
      requirePositive('rampDuration', pattern.rampDuration);
      break;
    case 'spike':
      requireRate('baselineRate', pattern.baselineRate);
      requireRate('spikeRate', pattern.spikeRate);
      requirePositive('spikeDuration', pattern.spikeDuration);
      requirePositive('interval', pattern.interval);
      break;
    case 'burst':
      requireRate('initialRate', pattern.initialRate);
      requireRate('burstRate', pattern.burstRate);
      if (pattern.finalRate !== undefined) requireRate('finalRate', pattern.finalRate);
      requirePositive('burstDuration', pattern.burstDuration);
      if (!Number.isFinite(pattern.delay) || pattern.delay < 0) {
        throw new ConfigurationError(`delay must be a non-negative number, got ${pattern.delay}`);
      }
      break;
    case 'steady':
      requireRate('targetRate', pattern.targetRate);
      if (!(pattern.jitter >= 0 && pattern.jitter < 1)) {
        throw new ConfigurationError(`jitter must be in [0, 1), got ${pattern.jitter}`);
      }
      break;
    case 'step':
      requireRate('startRate', pattern.startRate);
      requireRate('endRate', pattern.endRate);
      requirePositive('stepDuration', pattern.stepDuration);
      if (!Number.isInteger(pattern.steps) || pattern.steps < 2) {
        throw new ConfigurationError(`steps must be an integer of at least 2, got ${pattern.steps}`);
      }
      break;
    case 'chaos':
      requireRate('minRate', pattern.minRate);
      requireRate('maxRate', pattern.maxRate);
      requireRange('minRate', pattern.minRate, 'maxRate', pattern.maxRate);
      if (pattern.changeInterval !== undefined) requirePositive('changeInterval', pattern.changeInterval);
      break;
    case 'wave':
      requireRate('minRate', pattern.minRate);
      requireRate('maxRate', pattern.maxRate);
      requireRange('minRate', pattern.minRate, 'maxRate', pattern.maxRate);
      requirePositive('period', pattern.period);
      break;
    case 'custom':
      if (pattern.duration !== undefined) requirePositive('duration', pattern.duration);
      break;
    case 'composite':
      if (pattern.segments.length === 0) {
        throw new ConfigurationError('composite pattern needs at least one segment');
      }
      for (const segment of pattern.segments) {
        requirePositive('segment duration', segment.duration);
        validate(segment.pattern);
      }
      break;
  }
}

function buildRateFunction(pattern: RatePattern): (elapsed: number) => number {
  switch (pattern.kind) {
    case 'constant':
      return () => pattern.rate;

    case 'ramp': {
      const { startRate, endRate, rampDuration } = pattern;
      return (t) => {
        const progress = Math.min(Math.max(t, 0), rampDuration) / rampDuration;
        return startRate + (endRate - startRate) * progress;
      };
    }

    case 'spike':
      return (t) => (t % pattern.interval < pattern.spikeDuration ? pattern.spikeRate : pattern.baselineRate);

    case 'burst': {
      const finalRate = pattern.finalRate ?? pattern.initialRate;
      const burstEnd = pattern.delay + pattern.burstDuration;
      return (t) => {
        if (t < pattern.delay) return pattern.initialRate;
        if (t < burstEnd) return pattern.burstRate;
        return finalRate;
      };
    }

    case 'steady': {
      const random = createRandom(pattern.seed);
      const { targetRate, jitter } = pattern;
      return () => {
        const variation =
          pattern.distribution === 'gaussian'
            ? Math.max(-jitter, Math.min(jitter, gaussian(random, 0, jitter / 3)))
            : uniform(random, -jitter, jitter);
        return targetRate * (1 + variation);
      };
    }

    case 'step': {
      const { startRate, endRate, steps, stepDuration } = pattern;
      return (t) => {
        const index = Math.min(Math.floor(Math.max(t, 0) / stepDuration), steps - 1);
        return startRate + ((endRate - startRate) * index) / (steps - 1);
      };
    }

    case 'chaos':
      return chaosRate(pattern, createRandom(pattern.seed));

    case 'wave': {
      const { minRate, maxRate, period } = pattern;
      const span = maxRate - minRate;
      return (t) => {
        const phase = (Math.max(t, 0) % period) / period;
        switch (pattern.waveform ?? 'sine') {
          case 'square':
            return phase < 0.5 ? maxRate : minRate;
          case 'sawtooth':
            return minRate + phase * span;
          case 'sine':
            return minRate + ((Math.sin(phase * 2 * Math.PI) + 1) / 2) * span;
        }
      };
    }

    case 'custom': {
      const { curve, duration } = pattern;
      return (t) => curve(duration === undefined ? t : Math.min(t, duration));
    }

    case 'composite': {
      const segments = pattern.segments.map((segment) => ({
        rate: buildRateFunction(segment.pattern),
        duration: segment.duration,
      }));
      return (t) => {
        let offset = 0;
        for (const segment of segments) {
          if (t < offset + segment.duration) return segment.rate(t - offset);
          offset += segment.duration;
        }
        const last = segments[segments.length - 1];
        return last.rate(last.duration);
      };
    }
  }
}

function chaosRate(
  pattern: Extract<RatePattern, { kind: 'chaos' }>,
  random: RandomSource,
): (elapsed: number) => number {
  const { minRate, maxRate, changeInterval } = pattern;

  const draw = (): number => {
    switch (pattern.distribution ?? 'uniform') {
      case 'gaussian': {
        const value = gaussian(random, (minRate + maxRate) / 2, (maxRate - minRate) / 6);
        return Math.max(minRate, Math.min(maxRate, value));
      }
      case 'exponential':
        return Math.min(maxRate, minRate + exponential(random, (maxRate - minRate) / 5));
      case 'uniform':
        return uniform(random, minRate, maxRate);
    }
  };

  if (changeInterval === undefined) return draw;

  let bucket = -1;
  let current = minRate;
  return (t) => {
    const next = Math.floor(Math.max(t, 0) / changeInterval);
    if (next !== bucket) {
      bucket = next;
      current = draw();
    }
    return current;
  };
}

function describePattern(pattern: RatePattern): string {
  switch (pattern.kind) {
    case 'constant':
      return `constant(${pattern.rate} rps)`;
    case 'ramp':
      return `ramp(${pattern.startRate} -> ${pattern.endRate} rps over ${pattern.rampDuration}s)`;
    case 'spike':
      return `spike(${pattern.baselineRate} rps, ${pattern.spikeRate} rps for ${pattern.spikeDuration}s every ${pattern.interval}s)`;
    case 'burst':
      return `burst(${pattern.initialRate} rps, ${pattern.burstRate} rps for ${pattern.burstDuration}s after ${pattern.delay}s)`;
    case 'steady':
      return `steady(${pattern.targetRate} rps ±${Math.round(pattern.jitter * 100)}%)`;
    case 'step':
      return `step(${pattern.startRate} -> ${pattern.endRate} rps in ${pattern.steps} steps of ${pattern.stepDuration}s)`;
    case 'chaos':
      return `chaos(${pattern.minRate}-${pattern.maxRate} rps, ${pattern.distribution ?? 'uniform'})`;
    case 'wave':
      return `wave(${pattern.minRate}-${pattern.maxRate} rps, ${pattern.waveform ?? 'sine'}, period ${pattern.period}s)`;
    case 'custom':
      return 'custom curve';
    case 'composite':
      return pattern.segments.map((s) => `${describePattern(s.pattern)} for ${s.duration}s`).join(', then ');
  }
}

/**
 * Validates a pattern and returns its rate function. Throws
 * ConfigurationError on invalid parameters.
 */
export function createRateGenerator(pattern: RatePattern): RateGenerator {
  validate(pattern);
  const rate = buildRateFunction(pattern);

  return Object.freeze({
    kind: pattern.kind,
    pattern,
    rateAt: (elapsed: number) => clampRate(rate(elapsed)),
    describe: () => describePattern(pattern),
  });
}

export function isRateGenerator(value: RateGenerator | RatePattern): value is RateGenerator {
  return 'rateAt' in value;
}

// Shorthands

export const constant = (rate: number): RateGenerator => createRateGenerator({ kind: 'constant', rate });

export const ramp = (startRate: number, endRate: number, rampDuration: number): RateGenerator =>
  createRateGenerator({ kind: 'ramp', startRate, endRate, rampDuration });

export const spike = (
  baselineRate: number,
  spikeRate: number,
  spikeDuration: number,
  interval: number,
): RateGenerator => createRateGenerator({ kind: 'spike', baselineRate, spikeRate, spikeDuration, interval });

export const burst = (
  initialRate: number,
  burstRate: number,
  burstDuration: number,
  delay: number,
  finalRate?: number,
): RateGenerator => createRateGenerator({ kind: 'burst', initialRate, burstRate, burstDuration, delay, finalRate });

export const steady = (targetRate: number, jitter: number, seed?: number): RateGenerator =>
  createRateGenerator({ kind: 'steady', targetRate, jitter, seed });

export const stepLadder = (startRate: number, endRate: number, steps: number, stepDuration: number): RateGenerator =>
  createRateGenerator({ kind: 'step', startRate, endRate, steps, stepDuration });

export const chaos = (minRate: number, maxRate: number, seed?: number): RateGenerator =>
  createRateGenerator({ kind: 'chaos', minRate, maxRate, seed });
