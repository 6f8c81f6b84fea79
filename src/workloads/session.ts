import { ConfigurationError, errorCodeOf } from '../errors.js';
import { sampleThinkTime, validateThinkTime, type ThinkTime } from '../think-time.js';
import type { ExecutionContext, RunContext, Workload, WorkloadResult } from '../types.js';

export interface SessionStep<S> {
  name: string;
  execute(state: S, ctx: ExecutionContext): Promise<WorkloadResult | void>;
  /** Skips the step when it returns false. */
  when?(state: S): boolean;
  /** Pause after this step; overrides the session's think time. */
  thinkTime?: ThinkTime;
  /** Extra attempts after a failure. */
  retries?: number;
  /** Seconds before the first retry, doubled for each further one. */
  retryDelay?: number;
}

export interface SessionWorkloadOptions<S> {
  name: string;
  weight?: number;
  /** Fresh state for every session. */
  state: () => S;
  steps: Array<SessionStep<S>>;
  thinkTime?: ThinkTime;
  /** Clock for step timings, in ms. */
  now?: () => number;
  setup?(ctx: RunContext): Promise<void>;
  teardown?(ctx: RunContext): Promise<void>;
}

type StepOutcome = { ok: true } | { ok: false; error: string; errorCode: string; statusCode?: number };

function metricName(step: string): string {
  return `step_${step.toLowerCase().replace(/[^a-z0-9]+/g, '_')}_ms`;
}

function validateSession<S>(options: SessionWorkloadOptions<S>): void {
  if (options.steps.length === 0) {
    throw new ConfigurationError(`Session "${options.name}" needs at least one step`);
  }
  if (options.thinkTime) validateThinkTime(options.thinkTime);
  for (const step of options.steps) {
    if (step.thinkTime) validateThinkTime(step.thinkTime);
    const retries = step.retries ?? 0;
    if (!Number.isInteger(retries) || retries < 0) {
      throw new ConfigurationError(`Retries for step "${step.name}" must be a non-negative integer, got ${retries}`);
    }
    const delay = step.retryDelay ?? 1;
    if (!Number.isFinite(delay) || delay < 0) {
      throw new ConfigurationError(`Retry delay for step "${step.name}" must be 0 or more seconds, got ${delay}`);
    }
  }
}

async function attempt<S>(step: SessionStep<S>, state: S, ctx: ExecutionContext): Promise<StepOutcome> {
  try {
    const result = await step.execute(state, ctx);
    if (result && result.success === false) {
      return {
        ok: false,
        error: result.error ?? `status ${result.statusCode ?? 'unknown'}`,
        errorCode: result.errorCode ?? (result.statusCode !== undefined ? `HTTP_${result.statusCode}` : 'UNKNOWN'),
        statusCode: result.statusCode,
      };
    }
    return { ok: true };
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : String(error),
      errorCode: errorCodeOf(error),
    };
  }
}

/**
 * A user session: steps run in order against one state object, with a
 * sampled think time between them. The first failing step (after its
 * retries) ends the session as a failure.
 *
 * Reports `session_steps`, `think_time_ms` and one `step_<name>_ms` metric
 * per completed step.
 */
export function sessionWorkload<S>(options: SessionWorkloadOptions<S>): Workload {
  validateSession(options);
  const now = options.now ?? (() => performance.now());

  return {
    name: options.name,
    kind: 'session',
    weight: options.weight,
    setup: options.setup,
    teardown: options.teardown,
    async execute(ctx) {
      const state = options.state();
      const metrics: Record<string, number> = { session_steps: 0, think_time_ms: 0 };
      const steps = options.steps;

      for (let index = 0; index < steps.length; index++) {
        const step = steps[index];
        if (step.when && !step.when(state)) continue;

        const startedAt = now();
        let outcome = await attempt(step, state, ctx);
        const retries = step.retries ?? 0;
        for (let retry = 0; !outcome.ok && retry < retries && !ctx.signal.aborted; retry++) {
          await ctx.sleep((step.retryDelay ?? 1) * 1000 * 2 ** retry);
          outcome = await attempt(step, state, ctx);
        }

        if (!outcome.ok) {
          return {
            success: false,
            statusCode: outcome.statusCode,
            error: `Step "${step.name}" failed: ${outcome.error}`,
            errorCode: outcome.errorCode,
            metrics,
          };
        }

        metrics[metricName(step.name)] = now() - startedAt;
        metrics.session_steps++;

        const thinkTime = step.thinkTime ?? options.thinkTime;
        if (thinkTime && index < steps.length - 1) {
          const pause = sampleThinkTime(thinkTime, ctx.random) * 1000;
          await ctx.sleep(pause);
          metrics.think_time_ms += pause;
        }
      }

      return { success: true, metrics };
    },
  };
}
