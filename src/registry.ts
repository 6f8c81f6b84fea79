import { ConfigurationError, StateError } from './errors.js';
import type { Workload } from './types.js';
import type { RandomSource } from './utils/random.js';

interface Entry {
  workload: Workload;
  weight: number;
}

/**
 * Weighted set of workloads. Built during configuration, frozen before the
 * run starts, then only read.
 */
export class WorkloadRegistry {
  private readonly entries: Entry[] = [];
  private cumulative: number[] = [];
  private totalWeight = 0;
  private frozen = false;

  constructor(private readonly random: RandomSource = Math.random) {}

  get size(): number {
    return this.entries.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  add(workload: Workload, weight: number = workload.weight ?? 1): this {
    if (this.frozen) {
      throw new StateError(`Cannot add workload "${workload.name}" after the run has started`);
    }
    if (!Number.isFinite(weight) || weight <= 0) {
      throw new ConfigurationError(`Weight for workload "${workload.name}" must be greater than 0, got ${weight}`);
    }
    this.entries.push({ workload, weight });
    return this;
  }

  freeze(): void {
    if (this.frozen) return;
    if (this.entries.length === 0) {
      throw new ConfigurationError('No workloads configured', 'Add at least one scenario with addScenario()');
    }

    let running = 0;
    this.cumulative = this.entries.map((entry) => (running += entry.weight));
    this.totalWeight = running;
    this.frozen = true;
  }

  /** Weighted draw with replacement. Freezes the registry on first use. */
  select(): Workload {
    this.freeze();

    const target = this.random() * this.totalWeight;
    let low = 0;
    let high = this.cumulative.length - 1;

    // First index whose cumulative weight exceeds the target
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.cumulative[mid] > target) {
        high = mid;
      } else {
        low = mid + 1;
      }
    }

    return this.entries[low].workload;
  }

  list(): Workload[] {
    return this.entries.map((entry) => entry.workload);
  }

  probabilities(): Array<{ name: string; weight: number; probability: number }> {
    const total = this.entries.reduce((sum, entry) => sum + entry.weight, 0);
    return this.entries.map((entry) => ({
      name: entry.workload.name,
      weight: entry.weight,
      probability: total > 0 ? entry.weight / total : 0,
    }));
  }
}
