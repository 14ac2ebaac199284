/* Solver
 *
 * Consumes the closed dependant graph and produces an execution plan:
 *
 *  1. Cycle detection: depth-first walk from the root tracking the active
 *     path. Reaching a node that is still on the path throws CycleError with
 *     the keys in cycle order.
 *  2. Scope legality: with a declared scope ordering (outer first), every
 *     scope must be declared and no dependant may take a parameter that
 *     lives in a scope entered inside its own.
 *  3. Stage assignment: a node with no parameters goes to stage 0, any other
 *     node to one past the latest stage among its parameters. Within a stage
 *     nodes keep their discovery order, so identical graphs yield identical
 *     plans.
 *
 * Every check completes before the first stage is built; a plan is never
 * partially valid.
 */
import createDebug from 'debug';

import { CycleError, ScopeMismatchError, UnknownScopeError } from '../errors/errors.js';
import type {
  Dependant,
  ExecutionPlan,
  PlanNode,
  PlanStage,
  ScopeName,
  SolveOptions,
} from '../types/types.js';
import type { BindingTable } from './binding-table.js';
import { NODE_LEAF, NODE_SHARED } from './flags.js';
import { buildGraph, type DependantGraph } from './graph.js';
import type { Key } from './key.js';
import { PlanCache } from './plan-cache.js';

const debug = createDebug('lattice:solver');

const EMPTY_SCOPES: readonly ScopeName[] = Object.freeze([]);

const ON_PATH = 1;
const DONE = 2;

/**
 * Walk the graph depth-first from the root and return each node's stage.
 * Throws on the first cycle found.
 */
function assignStages(graph: DependantGraph): number[] {
  const { nodes } = graph;
  const state = new Uint8Array(nodes.length);
  const stage = new Array<number>(nodes.length).fill(0);
  // Explicit stack: `path[i]` is on the active path, `next[i]` its next parameter index.
  const path: number[] = [graph.root];
  const next: number[] = [0];
  state[graph.root] = ON_PATH;

  while (path.length > 0) {
    const top = path.length - 1;
    const handle = path[top];
    const params = nodes[handle].params;

    if (next[top] < params.length) {
      const p = params[next[top]++];
      if (p === null || state[p] === DONE) continue;
      if (state[p] === ON_PATH) {
        const cycle = path.slice(path.indexOf(p)).concat(p);
        throw new CycleError(cycle.map((h) => nodes[h].key.label));
      }
      state[p] = ON_PATH;
      path.push(p);
      next.push(0);
      continue;
    }

    let latest = -1;
    for (const p of params) {
      if (p !== null && stage[p] > latest) latest = stage[p];
    }
    stage[handle] = latest + 1;
    state[handle] = DONE;
    path.pop();
    next.pop();
  }

  return stage;
}

function checkScopes(graph: DependantGraph, scopes: readonly ScopeName[]): void {
  if (scopes.length === 0) return;

  const rank = new Map<ScopeName, number>();
  scopes.forEach((name, i) => rank.set(name, i));

  const rankOf = (dep: Dependant): number => {
    const r = rank.get(dep.scope);
    if (r === undefined) throw new UnknownScopeError(dep.key.label, dep.scope, [...scopes]);
    return r;
  };

  for (const node of graph.nodes) {
    const consumerRank = rankOf(node.dependant);
    for (const p of node.params) {
      if (p === null) continue;
      const dep = graph.nodes[p].dependant;
      if (rankOf(dep) > consumerRank) {
        throw new ScopeMismatchError(node.key.label, node.dependant.scope, dep.key.label, dep.scope);
      }
    }
  }
}

function buildPlan<T>(
  rootKey: Key<T>,
  graph: DependantGraph,
  stageOf: number[],
  scopes: readonly ScopeName[]
): ExecutionPlan<T> {
  const consumers: number[][] = graph.nodes.map(() => []);
  for (const node of graph.nodes) {
    for (const p of node.params) {
      if (p !== null && !consumers[p].includes(node.handle)) consumers[p].push(node.handle);
    }
  }

  const nodes: PlanNode[] = graph.nodes.map((node) => {
    let flags = 0;
    if (node.dependant.shared) flags |= NODE_SHARED;
    if (node.params.length === 0) flags |= NODE_LEAF;
    return Object.freeze({
      handle: node.handle,
      key: node.key,
      dependant: node.dependant,
      scope: node.dependant.scope,
      aliases: Object.freeze([...node.aliases]),
      params: Object.freeze([...node.params]),
      dependants: Object.freeze(consumers[node.handle]),
      stage: stageOf[node.handle],
      flags,
    });
  });

  const buckets: number[][] = [];
  for (const node of nodes) {
    (buckets[node.stage] ??= []).push(node.handle);
  }

  const stages: PlanStage[] = buckets.map((handles, index) => {
    const stageScopes: ScopeName[] = [];
    for (const h of handles) {
      if (!stageScopes.includes(nodes[h].scope)) stageScopes.push(nodes[h].scope);
    }
    return Object.freeze({
      index,
      nodes: Object.freeze(handles),
      keys: Object.freeze(handles.map((h) => nodes[h].key.label)),
      scopes: Object.freeze(stageScopes),
    });
  });

  const plan: ExecutionPlan<T> = {
    root: rootKey,
    rootHandle: graph.root,
    nodes: Object.freeze(nodes),
    stages: Object.freeze(stages),
    scopes: Object.freeze([...scopes]),
  };
  return Object.freeze(plan);
}

/**
 * Solve `root` into an execution plan. Pure: no factory is called.
 *
 * @throws {MissingBindingError} A required key cannot be satisfied
 * @throws {ScopeConflictError} Two dependants for one key declare different scopes
 * @throws {CycleError} The graph contains a cycle
 * @throws {UnknownScopeError} A dependant uses a scope missing from `options.scopes`
 * @throws {ScopeMismatchError} A dependant takes a parameter from an inner scope
 */
export function solve<T>(
  root: Dependant<T>,
  bindings: BindingTable,
  options: SolveOptions = {}
): ExecutionPlan<T> {
  const scopes = options.scopes ?? EMPTY_SCOPES;
  const graph = buildGraph(root, bindings);
  const stageOf = assignStages(graph);
  checkScopes(graph, scopes);
  const plan = buildPlan(root.key, graph, stageOf, scopes);
  debug('solved %s: %d node(s) in %d stage(s)', root.key.label, plan.nodes.length, plan.stages.length);
  return plan;
}

/**
 * Render the stages of a plan, e.g. `{C} → {B} → {A}`.
 */
export function describePlan(plan: ExecutionPlan): string {
  return plan.stages.map((s) => `{${s.keys.join(', ')}}`).join(' → ');
}

/**
 * Solver bound to one binding table and scope ordering, caching plans.
 *
 * A plan is reused for the same root dependant object as long as the
 * binding table has not changed since it was solved.
 */
export class Solver {
  private readonly cache = new PlanCache();

  constructor(
    private readonly bindings: BindingTable,
    private readonly options: SolveOptions = {}
  ) {}

  solve<T>(root: Dependant<T>): ExecutionPlan<T> {
    const version = this.bindings.version;
    const cached = this.cache.get(root, version);
    if (cached) {
      debug('plan cache hit for %s', root.key.label);
      return cached;
    }
    const plan = solve(root, this.bindings, this.options);
    this.cache.set(root, version, plan);
    return plan;
  }

  get stats(): { hits: number; misses: number } {
    return this.cache.stats;
  }

  clear(): void {
    this.cache.clear();
  }
}
