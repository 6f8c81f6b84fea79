import type { ExecutionContext, RunContext, Workload, WorkloadResult } from '../types.js';

export interface CustomWorkloadOptions {
  name: string;
  weight?: number;
  execute(ctx: ExecutionContext): Promise<WorkloadResult | void>;
  setup?(ctx: RunContext): Promise<void>;
  teardown?(ctx: RunContext): Promise<void>;
}

/** Wraps user code as a workload; resolving without a result counts as success. */
export function defineWorkload(options: CustomWorkloadOptions): Workload {
  return {
    name: options.name,
    kind: 'custom',
    weight: options.weight,
    execute: (ctx) => options.execute(ctx),
    setup: options.setup,
    teardown: options.teardown,
  };
}
