import { ConfigurationError } from './errors.js';
import { exponential, gaussian, uniform, type RandomSource } from './utils/random.js';

/** Pause between the steps of a session, in seconds. */
export type ThinkTime =
  | { kind: 'fixed'; seconds: number }
  | { kind: 'uniform'; min: number; max: number }
  | { kind: 'normal'; mean: number; stdDev: number }
  | { kind: 'lognormal'; mu: number; sigma: number }
  | { kind: 'exponential'; mean: number }
  | {
      kind: 'bimodal';
      fast: { mean: number; stdDev: number };
      slow: { mean: number; stdDev: number };
      /** Share of fast pauses, default 0.7. */
      fastProbability?: number;
    }
  | { kind: 'custom'; sample: (random: RandomSource) => number };

function requireNonNegative(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`think time ${name} must be 0 or more, got ${value}`);
  }
}

export function validateThinkTime(model: ThinkTime): void {
  switch (model.kind) {
    case 'fixed':
      requireNonNegative('seconds', model.seconds);
      break;
    case 'uniform':
      requireNonNegative('min', model.min);
      requireNonNegative('max', model.max);
      if (model.min > model.max) {
        throw new ConfigurationError(`think time min (${model.min}) must not exceed max (${model.max})`);
      }
      break;
    case 'normal':
      requireNonNegative('mean', model.mean);
      requireNonNegative('stdDev', model.stdDev);
      break;
    case 'lognormal':
      if (!Number.isFinite(model.mu)) {
        throw new ConfigurationError(`think time mu must be a finite number, got ${model.mu}`);
      }
      requireNonNegative('sigma', model.sigma);
      break;
    case 'exponential':
      if (!Number.isFinite(model.mean) || model.mean <= 0) {
        throw new ConfigurationError(`think time mean must be greater than 0, got ${model.mean}`);
      }
      break;
    case 'bimodal': {
      requireNonNegative('fast mean', model.fast.mean);
      requireNonNegative('fast stdDev', model.fast.stdDev);
      requireNonNegative('slow mean', model.slow.mean);
      requireNonNegative('slow stdDev', model.slow.stdDev);
      const p = model.fastProbability ?? 0.7;
      if (!(p >= 0 && p <= 1)) {
        throw new ConfigurationError(`think time fastProbability must be in [0, 1], got ${p}`);
      }
      break;
    }
    case 'custom':
      break;
  }
}

/** Draws one pause in seconds; never negative. */
export function sampleThinkTime(model: ThinkTime, random: RandomSource): number {
  let seconds: number;
  switch (model.kind) {
    case 'fixed':
      seconds = model.seconds;
      break;
    case 'uniform':
      seconds = uniform(random, model.min, model.max);
      break;
    case 'normal':
      seconds = gaussian(random, model.mean, model.stdDev);
      break;
    case 'lognormal':
      seconds = Math.exp(gaussian(random, model.mu, model.sigma));
      break;
    case 'exponential':
      seconds = exponential(random, model.mean);
      break;
    case 'bimodal': {
      const mode = random() < (model.fastProbability ?? 0.7) ? model.fast : model.slow;
      seconds = gaussian(random, mode.mean, mode.stdDev);
      break;
    }
    case 'custom':
      seconds = model.sample(random);
      break;
  }
  return Number.isFinite(seconds) ? Math.max(0, seconds) : 0;
}
