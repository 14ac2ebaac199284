/* Dependant Graph
 *
 * Turns a root dependant plus a binding table into a closed graph: every
 * parameter reference resolved to a concrete dependant, nodes deduplicated
 * by key.
 *
 * Resolution of a parameter reference:
 *  1. Binding override for the reference's key
 *  2. The reference's own default provider
 *  3. Optional reference → absent (`null`), the factory receives `undefined`
 *  4. Required reference → MissingBindingError
 *
 * Nodes live in an arena addressed by integer handles, assigned in
 * breadth-first discovery order from the root. A node is identified by the
 * key of the dependant that satisfies it; when a binding or provider maps
 * key K to a dependant with a different key, K is recorded as an alias of
 * that node. Repeated references to one key collapse to the first node
 * found for it, whichever provider they name.
 *
 * The walk tolerates cycles (a revisited key is simply linked); detecting
 * them is the solver's job.
 */
import createDebug from 'debug';

import { MissingBindingError, ScopeConflictError } from '../errors/errors.js';
import type { Dependant } from '../types/types.js';
import type { BindingTable } from './binding-table.js';
import type { Key, KeyId } from './key.js';

const debug = createDebug('lattice:graph');

export interface GraphNode {
  readonly handle: number;
  readonly key: Key;
  readonly dependant: Dependant;
  /** Handle per parameter, `null` for an absent optional parameter. */
  readonly params: readonly (number | null)[];
  /** Other keys that resolved to this node through a binding. */
  readonly aliases: readonly KeyId[];
}

export interface DependantGraph {
  readonly root: number;
  /** Arena in discovery order; `nodes[i].handle === i`. */
  readonly nodes: readonly GraphNode[];
  /** Key id (own key or alias) → handle. */
  readonly index: ReadonlyMap<KeyId, number>;
}

type MutableNode = {
  handle: number;
  key: Key;
  dependant: Dependant;
  params: (number | null)[];
  aliases: KeyId[];
};

/**
 * Build the closed graph for `root`. Pure: nothing is constructed.
 *
 * @throws {MissingBindingError} A required parameter has neither a binding nor a default provider
 * @throws {ScopeConflictError} Two dependants for one key declare different scopes
 */
export function buildGraph(root: Dependant, bindings: BindingTable): DependantGraph {
  const nodes: MutableNode[] = [];
  const index = new Map<KeyId, number>();
  const queue: number[] = [];

  // A key already in the graph, as own key or alias, resolves to its node;
  // otherwise the dependant's own key does.
  const intern = (requested: Key, dep: Dependant): number => {
    const own = dep.key.id;
    let handle = index.get(requested.id) ?? index.get(own);

    if (handle === undefined) {
      handle = nodes.length;
      nodes.push({ handle, key: dep.key, dependant: dep, params: [], aliases: [] });
      index.set(own, handle);
      queue.push(handle);
    } else {
      const existing = nodes[handle].dependant;
      if (existing !== dep && existing.scope !== dep.scope) {
        throw new ScopeConflictError(requested.label, [existing.scope, dep.scope]);
      }
    }

    if (requested.id !== nodes[handle].key.id && !index.has(requested.id)) {
      nodes[handle].aliases.push(requested.id);
      index.set(requested.id, handle);
    }
    return handle;
  };

  const rootDep = bindings.lookup(root.key) ?? root;
  const rootHandle = intern(root.key, rootDep);

  // Breadth-first; handles are handed out in the order keys are first seen.
  for (let head = 0; head < queue.length; head++) {
    const node = nodes[queue[head]];
    for (const ref of node.dependant.params) {
      const concrete = bindings.lookup(ref.key) ?? ref.provider;
      if (concrete) {
        node.params.push(intern(ref.key, concrete));
      } else if (ref.required) {
        throw new MissingBindingError(ref.key.label, node.key.label);
      } else {
        node.params.push(null);
      }
    }
  }

  debug('graph for %s: %d node(s)', rootDep.key.label, nodes.length);
  return { root: rootHandle, nodes, index };
}
