import { describe, expect, it } from 'vitest';

import { BindingTable } from '../src/core/binding-table.js';
import { dependant, depends, param } from '../src/core/dependant.js';
import { NODE_LEAF, NODE_SHARED } from '../src/core/flags.js';
import { key } from '../src/core/key.js';
import { describePlan, solve, Solver } from '../src/core/solver.js';
import {
  CycleError,
  MissingBindingError,
  ScopeMismatchError,
  UnknownScopeError,
} from '../src/errors/errors.js';
import type { Dependant } from '../src/types/types.js';

const SCOPES = ['app', 'request'];

function diamond() {
  const c = dependant({ label: 'C', scope: 'app', factory: () => 1 });
  const b = dependant({ label: 'B', scope: 'app', params: [depends(c)], factory: (n) => n + 1 });
  const a = dependant({
    label: 'A',
    scope: 'app',
    params: [depends(b), depends(c)],
    factory: (x, y) => x + y,
  });
  return { a, b, c };
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected the call to throw');
}

/** Deterministic pseudo-random generator so failures reproduce. */
function lcg(seed: number) {
  let state = seed;
  return () => {
    state = (state * 1103515245 + 12345) % 2147483648;
    return state / 2147483648;
  };
}

function randomDag(seed: number, size: number): Dependant<number> {
  const rand = lcg(seed);
  const nodes: Dependant<number>[] = [];
  for (let i = 0; i < size; i++) {
    const params = nodes.filter(() => rand() < 0.3).map((n) => depends(n));
    nodes.push(
      dependant({
        label: `N${i}`,
        scope: 'app',
        params,
        factory: (...values) => values.reduce((sum, v) => sum + v, 1),
      })
    );
  }
  return dependant({
    label: 'Root',
    scope: 'app',
    params: nodes.map((n) => depends(n)),
    factory: () => 0,
  });
}

describe('solve', () => {
  it('stages a diamond as {C} → {B} → {A}', () => {
    const { a } = diamond();

    const plan = solve(a, new BindingTable());

    expect(plan.stages.map((s) => s.keys)).toEqual([['C'], ['B'], ['A']]);
    expect(describePlan(plan)).toBe('{C} → {B} → {A}');
    expect(plan.root).toBe(a.key);
    expect(plan.nodes[plan.rootHandle].key.label).toBe('A');
  });

  it('builds a shared node once and links every consumer', () => {
    const { a } = diamond();

    const plan = solve(a, new BindingTable());
    const c = plan.nodes.find((n) => n.key.label === 'C');

    expect(plan.nodes).toHaveLength(3);
    expect(c?.dependants).toEqual([0, 1]);
    expect(c?.stage).toBe(0);
  });

  it('sets node flags', () => {
    const OptKey = key<string>('Opt');
    const leaf = dependant({ label: 'Leaf', scope: 'app', shared: false, factory: () => 'x' });
    const root = dependant({
      label: 'Root',
      scope: 'app',
      params: [depends(leaf), param(OptKey, { required: false })],
      factory: (l, o) => l + (o ?? ''),
    });

    const plan = solve(root, new BindingTable());

    expect(plan.nodes[0].flags).toBe(NODE_SHARED);
    expect(plan.nodes[1].flags).toBe(NODE_LEAF);
    expect(plan.nodes[0].params).toEqual([1, null]);
  });

  it('reports a cycle with its key labels', () => {
    const AKey = key<number>('A');
    const b = dependant({ label: 'B', scope: 'app', params: [param(AKey)], factory: (n) => n });
    const a = dependant({ key: AKey, scope: 'app', params: [depends(b)], factory: (n) => n });
    const bindings = new BindingTable();
    bindings.bind(AKey, a);

    const error = thrown(() => solve(a, bindings));
    expect(error).toBeInstanceOf(CycleError);
    expect(error).toMatchObject({ cycle: ['A', 'B', 'A'] });
  });

  it('reports a self-dependency', () => {
    const SelfKey = key<number>('Self');
    const self = dependant({ key: SelfKey, scope: 'app', params: [param(SelfKey)], factory: (n) => n });
    const bindings = new BindingTable();
    bindings.bind(SelfKey, self);

    expect(thrown(() => solve(self, bindings))).toMatchObject({ cycle: ['Self', 'Self'] });
  });

  it('reports the cycle only, not its entry path', () => {
    const BKey = key<number>('B');
    const c = dependant({ label: 'C', scope: 'app', params: [param(BKey)], factory: (n) => n });
    const b = dependant({ key: BKey, scope: 'app', params: [depends(c)], factory: (n) => n });
    const a = dependant({ label: 'A', scope: 'app', params: [depends(b)], factory: (n) => n });
    const bindings = new BindingTable();
    bindings.bind(BKey, b);

    expect(thrown(() => solve(a, bindings))).toMatchObject({ cycle: ['B', 'C', 'B'] });
  });

  it('allows a dependant to take a parameter from an ancestor scope', () => {
    const b = dependant({ label: 'B', scope: 'app', factory: () => 'pool' });
    const a = dependant({ label: 'A', scope: 'request', params: [depends(b)], factory: (p) => p });

    const plan = solve(a, new BindingTable(), { scopes: SCOPES });

    expect(plan.stages.map((s) => s.scopes)).toEqual([['app'], ['request']]);
    expect(plan.scopes).toEqual(SCOPES);
  });

  it('rejects a parameter from an inner scope', () => {
    const b = dependant({ label: 'B', scope: 'request', factory: () => 'req' });
    const a = dependant({ label: 'A', scope: 'app', params: [depends(b)], factory: (r) => r });

    expect(() => solve(a, new BindingTable(), { scopes: SCOPES })).toThrow(ScopeMismatchError);
    expect(thrown(() => solve(a, new BindingTable(), { scopes: SCOPES }))).toMatchObject({
      consumerKey: 'A',
      consumerScope: 'app',
      dependencyKey: 'B',
      dependencyScope: 'request',
    });
  });

  it('rejects undeclared scopes', () => {
    const a = dependant({ label: 'A', scope: 'session', factory: () => 1 });

    expect(() => solve(a, new BindingTable(), { scopes: SCOPES })).toThrow(UnknownScopeError);
  });

  it('skips scope checks when no ordering is declared', () => {
    const b = dependant({ label: 'B', scope: 'request', factory: () => 'req' });
    const a = dependant({ label: 'A', scope: 'app', params: [depends(b)], factory: (r) => r });

    expect(() => solve(a, new BindingTable())).not.toThrow();
  });

  it('fails before staging when a binding is missing', () => {
    const DbKey = key<string>('Db');
    const a = dependant({ label: 'A', scope: 'app', params: [param(DbKey)], factory: (d) => d });

    expect(() => solve(a, new BindingTable())).toThrow(MissingBindingError);
  });

  it('places every node strictly after its parameters', () => {
    for (const seed of [1, 7, 42, 1234]) {
      const plan = solve(randomDag(seed, 25), new BindingTable());

      for (const node of plan.nodes) {
        for (const p of node.params) {
          if (p !== null) expect(plan.nodes[p].stage).toBeLessThan(node.stage);
        }
      }
      expect(plan.stages.flatMap((s) => s.nodes)).toHaveLength(plan.nodes.length);
      expect(plan.stages[plan.stages.length - 1].nodes).toEqual([plan.rootHandle]);
    }
  });

  it('handles long dependency chains', () => {
    let tail = dependant({ label: 'N0', scope: 'app', factory: () => 0 });
    for (let i = 1; i < 20000; i++) {
      tail = dependant({ label: `N${i}`, scope: 'app', params: [depends(tail)], factory: (n) => n + 1 });
    }

    const plan = solve(tail, new BindingTable());

    expect(plan.stages).toHaveLength(20000);
    expect(plan.stages[0].keys).toEqual(['N0']);
  });

  it('is deterministic', () => {
    const root = randomDag(99, 30);

    const first = solve(root, new BindingTable());
    const second = solve(root, new BindingTable());

    expect(second).not.toBe(first);
    expect(JSON.stringify(second.stages)).toBe(JSON.stringify(first.stages));
  });

  it('produces frozen plans', () => {
    const plan = solve(diamond().a, new BindingTable());

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.stages[0])).toBe(true);
    expect(Object.isFrozen(plan.nodes[0])).toBe(true);
  });
});

describe('Solver', () => {
  it('reuses the plan while bindings are unchanged', () => {
    const { a } = diamond();
    const solver = new Solver(new BindingTable());

    const first = solver.solve(a);
    const second = solver.solve(a);

    expect(second).toBe(first);
    expect(solver.stats).toEqual({ hits: 1, misses: 1 });
  });

  it('re-solves after a binding change', () => {
    const { a, c } = diamond();
    const bindings = new BindingTable();
    const solver = new Solver(bindings, { scopes: ['app'] });

    const first = solver.solve(a);
    const binding = bindings.bind(c.key, dependant({ label: 'C2', scope: 'app', factory: () => 2 }));
    const second = solver.solve(a);
    binding.unbind();
    const third = solver.solve(a);

    expect(describePlan(second)).toBe('{C2} → {B} → {A}');
    expect(third).not.toBe(first);
    expect(describePlan(third)).toBe('{C} → {B} → {A}');
    expect(solver.stats).toEqual({ hits: 0, misses: 3 });
  });

  it('drops cached plans on clear', () => {
    const { a } = diamond();
    const solver = new Solver(new BindingTable());

    const first = solver.solve(a);
    solver.clear();

    expect(solver.solve(a)).not.toBe(first);
    expect(solver.stats.misses).toBe(2);
  });
});
