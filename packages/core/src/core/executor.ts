/* Executor
 *
 * Runs a solved plan against an explicitly passed scope stack.
 *
 * Order of work:
 *  1. Map supplied `values` onto plan nodes (own key or alias)
 *  2. Walk back from the root and keep only the nodes that still need to run:
 *     the walk stops at supplied nodes and at shared nodes whose value is
 *     already cached or under construction in their scope; a construction
 *     already running is joined. Every kept node's scope must be active;
 *     otherwise ScopeNotActiveError is thrown before any factory runs.
 *  3. Run stages in order. Stage N fully settles before stage N+1 starts.
 *     Inside a stage nodes start together (concurrent) or one at a time
 *     (sequential).
 *
 * Every node goes through its scope's cache, so a shared key constructed by
 * another execution sharing the scope instance is joined instead of rebuilt.
 *
 * Failure: a throwing factory becomes ConstructionError. The failing stage's
 * siblings are allowed to settle, values that completed stay cached, later
 * stages never start, and the first failure in stage order is thrown.
 */
import createDebug from 'debug';

import { ConstructionError, ScopeNotActiveError } from '../errors/errors.js';
import type { ExecuteOptions, ExecutionPlan, InstantiateHook, PlanNode } from '../types/types.js';
import { NODE_LEAF, NODE_SHARED } from './flags.js';
import type { CreateOptions } from './scope-cache.js';
import type { ScopeHandle } from './scope.js';
import type { ScopeStack } from './scope-stack.js';
import type { KeyId } from './key.js';

const debug = createDebug('lattice:executor');

const toNanos = (ms: number) => Math.round(ms * 1_000_000);

async function instrument<T>(
  label: string,
  hook: InstantiateHook | undefined,
  run: () => T | Promise<T>
): Promise<T> {
  if (!hook) return await run();

  const start = performance.now();
  try {
    return await run();
  } finally {
    hook(label, toNanos(performance.now() - start));
  }
}

/**
 * Per-execution view of the plan: which nodes run, where, and with which
 * supplied values.
 */
type Schedule = {
  /** Node handle → supplied value, for nodes satisfied by `values`. */
  readonly supplied: Map<number, unknown>;
  /** Node handle → scope handle, for nodes that go through a scope cache. */
  readonly targets: Map<number, ScopeHandle>;
  /** Node handle → construction already running in its scope, joined as is. */
  readonly joined: Map<number, Promise<unknown>>;
};

function schedule(plan: ExecutionPlan, stack: ScopeStack, options: ExecuteOptions): Schedule {
  const byKey = new Map<KeyId, unknown>();
  for (const [k, v] of options.values ?? []) byKey.set(k.id, v);

  const suppliedValue = (node: PlanNode): { hit: boolean; value?: unknown } => {
    if (byKey.has(node.key.id)) return { hit: true, value: byKey.get(node.key.id) };
    for (const alias of node.aliases) {
      if (byKey.has(alias)) return { hit: true, value: byKey.get(alias) };
    }
    return { hit: false };
  };

  const supplied = new Map<number, unknown>();
  const targets = new Map<number, ScopeHandle>();
  const joined = new Map<number, Promise<unknown>>();
  const seen = new Set<number>();
  const pending = [plan.rootHandle];

  while (pending.length > 0) {
    const handle = pending.pop();
    if (handle === undefined || seen.has(handle)) continue;
    seen.add(handle);
    const node = plan.nodes[handle];

    const given = suppliedValue(node);
    if (given.hit) {
      supplied.set(handle, given.value);
      continue;
    }

    const scope = stack.get(node.scope);
    if (!scope) throw new ScopeNotActiveError(node.scope, node.key.label, stack.names);
    targets.set(handle, scope);

    // Shared values cached or under construction need none of their parameters.
    if (node.flags & NODE_SHARED) {
      if (scope.cache.has(node.key)) continue;
      const running = scope.cache.pendingFor(node.key);
      if (running) {
        joined.set(handle, running);
        continue;
      }
    }

    for (const p of node.params) {
      if (p !== null) pending.push(p);
    }
  }

  return { supplied, targets, joined };
}

/**
 * Execute `plan` against the scopes active on `stack` and return the root's
 * value.
 *
 * @throws {ScopeNotActiveError} A needed scope is not active; nothing was constructed
 * @throws {ConstructionError} A factory threw; its error is the `cause`
 * @throws {ScopeDisposedError} A needed scope exited during execution
 *
 * @example
 * ```typescript
 * const plan = solve(handler, bindings, { scopes: ['app', 'request'] });
 * const request = stack.enter('request');
 * try {
 *   const result = await execute(plan, stack, { values: new Map([[RequestKey, req]]) });
 * } finally {
 *   await request.exit();
 * }
 * ```
 */
export async function execute<T>(
  plan: ExecutionPlan<T>,
  stack: ScopeStack,
  options?: ExecuteOptions
): Promise<T>;
export async function execute(
  plan: ExecutionPlan,
  stack: ScopeStack,
  options: ExecuteOptions = {}
): Promise<unknown> {
  const { supplied, targets, joined } = schedule(plan, stack, options);
  const results = new Map<number, unknown>(supplied);
  const hook = options.onInstantiate;
  const sequential = options.concurrency === 'sequential';

  debug(
    'execute %s: %d node(s) to run, %d supplied',
    plan.root.label,
    targets.size,
    supplied.size
  );

  const run = (handle: number): Promise<unknown> => {
    const node = plan.nodes[handle];
    const scope = targets.get(handle);
    if (!scope) return Promise.resolve(results.get(handle));
    const running = joined.get(handle);
    if (running) return running;

    const { dependant } = node;
    const label = node.key.label;
    const call =
      node.flags & NODE_LEAF
        ? () => dependant.factory()
        : () => dependant.factory(...node.params.map((p) => (p === null ? undefined : results.get(p))));

    const construct = async (): Promise<unknown> => {
      try {
        return await instrument(label, hook, call);
      } catch (e) {
        debug('construction of %s failed', label);
        throw new ConstructionError(label, e);
      }
    };

    const createOptions: CreateOptions<unknown> = { shared: (node.flags & NODE_SHARED) !== 0 };
    if (dependant.dispose) {
      createOptions.dispose = (value) => dependant.dispose?.(value);
    }
    return scope.cache.getOrCreate(node.key, construct, createOptions);
  };

  for (const stage of plan.stages) {
    const handles = stage.nodes.filter((h) => targets.has(h));
    if (handles.length === 0) continue;

    if (sequential) {
      for (const h of handles) results.set(h, await run(h));
      continue;
    }

    const settled = await Promise.allSettled(handles.map(run));
    const failures: unknown[] = [];
    for (let i = 0; i < settled.length; i++) {
      const outcome = settled[i];
      if (outcome.status === 'fulfilled') results.set(handles[i], outcome.value);
      else failures.push(outcome.reason);
    }
    if (failures.length > 0) {
      debug('stage %d failed; %d later stage(s) skipped', stage.index, plan.stages.length - stage.index - 1);
      throw failures[0];
    }
  }

  return results.get(plan.rootHandle);
}
