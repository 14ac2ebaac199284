import type { Dependant, ExecutionPlan } from '../types/types.js';

type CachedPlan = {
  /** Binding table version the plan was solved against. */
  version: number;
  plan: ExecutionPlan;
};

/**
 * Solved plan cache, keyed by root dependant object.
 *
 * Plans are stamped with the binding table version they were solved
 * against; a lookup with a different version is a miss. Roots are held
 * weakly, so dropping a dependant drops its plan.
 */
export class PlanCache {
  private index = new WeakMap<Dependant, CachedPlan>();

  private hits = 0;
  private misses = 0;

  /**
   * Plan solved for `root` under binding table `version`, if still valid.
   */
  get<T>(root: Dependant<T>, version: number): ExecutionPlan<T> | undefined;
  get(root: Dependant, version: number): ExecutionPlan | undefined {
    const cached = this.index.get(root);
    if (cached && cached.version === version) {
      this.hits++;
      return cached.plan;
    }
    this.misses++;
    return undefined;
  }

  set<T>(root: Dependant<T>, version: number, plan: ExecutionPlan<T>): void {
    this.index.set(root, { version, plan });
  }

  get stats(): { hits: number; misses: number } {
    return { hits: this.hits, misses: this.misses };
  }

  /**
   * Drop every cached plan. Counters are kept.
   */
  clear(): void {
    this.index = new WeakMap();
  }
}
