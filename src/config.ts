import { ConfigurationError } from './errors.js';
import type { RunConfig } from './types.js';

export const DEFAULT_RUN_CONFIG: RunConfig = {
  name: 'Load Test',
  duration: 60,
  warmupDuration: 5,
  maxConcurrent: 1000,
  consoleOutput: true,
  queueCapacity: 0,
  gracePeriod: 30,
  tickInterval: 0.01,
};

/** Applies each layer over the defaults in order; undefined values never override. */
export function resolveRunConfig(...layers: Array<Partial<RunConfig>>): RunConfig {
  const resolved: RunConfig = { ...DEFAULT_RUN_CONFIG };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        Object.assign(resolved, { [key]: value });
      }
    }
  }
  return resolved;
}

/** Throws ConfigurationError describing the first invalid field. */
export function validateRunConfig(cfg: RunConfig): void {
  if (!Number.isFinite(cfg.duration) || cfg.duration <= 0) {
    throw new ConfigurationError(`duration must be greater than 0 seconds, got ${cfg.duration}`);
  }
  if (!Number.isFinite(cfg.warmupDuration) || cfg.warmupDuration < 0) {
    throw new ConfigurationError(`warmupDuration must be 0 or more seconds, got ${cfg.warmupDuration}`);
  }
  if (!Number.isInteger(cfg.maxConcurrent) || cfg.maxConcurrent < 1) {
    throw new ConfigurationError(`maxConcurrent must be an integer of at least 1, got ${cfg.maxConcurrent}`);
  }
  if (!Number.isInteger(cfg.queueCapacity) || cfg.queueCapacity < 0) {
    throw new ConfigurationError(`queueCapacity must be a non-negative integer, got ${cfg.queueCapacity}`);
  }
  if (!Number.isFinite(cfg.gracePeriod) || cfg.gracePeriod < 0) {
    throw new ConfigurationError(`gracePeriod must be 0 or more seconds, got ${cfg.gracePeriod}`);
  }
  if (!Number.isFinite(cfg.tickInterval) || cfg.tickInterval <= 0) {
    throw new ConfigurationError(`tickInterval must be greater than 0 seconds, got ${cfg.tickInterval}`);
  }
  if (cfg.timeout !== undefined && (!Number.isFinite(cfg.timeout) || cfg.timeout <= 0)) {
    throw new ConfigurationError(`timeout must be greater than 0 seconds, got ${cfg.timeout}`);
  }
}

export interface EnvConfig {
  targetUrl?: string;
  authToken?: string;
  run: Partial<RunConfig>;
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    targetUrl: env.LOADPULSE_TARGET_URL || undefined,
    authToken: env.LOADPULSE_AUTH_TOKEN || undefined,
    run: {
      duration: readNumber(env, 'LOADPULSE_DURATION'),
      warmupDuration: readNumber(env, 'LOADPULSE_WARMUP'),
      maxConcurrent: readNumber(env, 'LOADPULSE_MAX_CONCURRENT'),
      queueCapacity: readNumber(env, 'LOADPULSE_QUEUE_CAPACITY'),
      timeout: readNumber(env, 'LOADPULSE_TIMEOUT'),
      gracePeriod: readNumber(env, 'LOADPULSE_GRACE_PERIOD'),
    },
  };
}
