/*
 * BindingTable
 * ------------
 * Override rules consulted before graph walking: key → dependant.
 *
 * Responsibilities
 *  - keep the active override per key (the most recent bind that is still live)
 *  - let each bind be undone independently through its Binding handle,
 *    restoring whatever it shadowed
 *  - expose a version stamp so solved plans can be cached per table state
 *
 * Design notes
 *  - Bindings for one key form a stack; `lookup()` reads its top. Unbinding
 *    an entry in the middle removes only that entry.
 *  - A bound dependant may carry a different key than the one it is bound to;
 *    the graph files it under the bound key.
 */
import createDebug from 'debug';

import { InvalidKeyError } from '../errors/errors.js';
import type { Dependant } from '../types/types.js';
import { isKey, type Key, type KeyId } from './key.js';

const debug = createDebug('lattice:bindings');

/**
 * Handle returned by {@link BindingTable.bind}.
 */
export interface Binding<T = unknown> {
  readonly key: Key<T>;
  readonly dependant: Dependant<T>;
  /** Remove this binding. Calling it more than once is a no-op. */
  unbind(): void;
}

type BindingEntry = { readonly dependant: Dependant };

export class BindingTable {
  /** Live bindings per key, most recent last. */
  private readonly entries = new Map<KeyId, BindingEntry[]>();

  private _version = 0;

  /**
   * Incremented on every bind and unbind.
   */
  get version(): number {
    return this._version;
  }

  /** Number of keys with at least one live binding. */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Make `dependant` satisfy `key` until the returned binding is removed.
   *
   * @example
   * ```typescript
   * const binding = bindings.bind(DatabaseKey, inMemoryDatabase);
   * try {
   *   await container.resolve(handler);
   * } finally {
   *   binding.unbind();
   * }
   * ```
   */
  bind<T>(key: Key<T>, dependant: Dependant<T>): Binding<T> {
    if (!isKey(key)) throw new InvalidKeyError(key);

    const entry: BindingEntry = { dependant };
    let stack = this.entries.get(key.id);
    if (!stack) {
      stack = [];
      this.entries.set(key.id, stack);
    }
    stack.push(entry);
    this._version++;
    debug('bind %s → %s (depth %d)', key.label, dependant.key.label, stack.length);

    let bound = true;
    return {
      key,
      dependant,
      unbind: () => {
        if (!bound) return;
        bound = false;
        this.remove(key, entry);
      },
    };
  }

  /**
   * Active override for `key`, if any.
   */
  lookup<T>(key: Key<T>): Dependant<T> | undefined;
  lookup(key: Key): Dependant | undefined {
    const stack = this.entries.get(key.id);
    return stack?.[stack.length - 1]?.dependant;
  }

  has(key: Key): boolean {
    return this.entries.has(key.id);
  }

  /**
   * Iterator of the keys that currently have an override.
   */
  *boundKeys(): IterableIterator<KeyId> {
    yield* this.entries.keys();
  }

  private remove(key: Key, entry: BindingEntry): void {
    const stack = this.entries.get(key.id);
    if (!stack) return;
    const idx = stack.indexOf(entry);
    if (idx === -1) return;
    stack.splice(idx, 1);
    if (stack.length === 0) this.entries.delete(key.id);
    this._version++;
    debug('unbind %s (depth %d)', key.label, stack.length);
  }
}
