/* ScopeHandle
 *
 * One active instance of a named scope on a ScopeStack.
 *
 * Purpose:
 *  - Own the ScopeCache that holds every value constructed in this scope
 *  - Run cleanups for those values when the scope exits
 *  - Enforce strict nesting: only the innermost scope of its stack may exit
 *
 * Lifecycle:
 *  - Created by ScopeStack.enter(); the cache starts empty
 *  - exit() refuses new constructions, drains in-flight ones, runs cleanups
 *    in reverse construction order and reports failures as CleanupErrors
 *  - After exit the handle is dead: cache access throws ScopeDisposedError,
 *    a second exit() is a no-op
 *
 * Usage example:
 * ```typescript
 * const request = stack.enter('request');
 * try {
 *   return await execute(plan, stack);
 * } finally {
 *   await request.exit();
 * }
 * ```
 */
import createDebug from 'debug';

import { CleanupErrors, ScopeDisposedError } from '../errors/errors.js';
import type { ScopeName } from '../types/types.js';
import { ScopeCache } from './scope-cache.js';
import type { ScopeStack } from './scope-stack.js';

const debug = createDebug('lattice:scope');

export class ScopeHandle {
  private disposed = false;

  private readonly _cache: ScopeCache;

  /** Forked stacks that inherited this scope and have scopes of their own entered. */
  private readonly innerStacks = new Set<ScopeStack>();

  constructor(
    readonly name: ScopeName,
    private readonly owner: ScopeStack
  ) {
    this._cache = new ScopeCache(name);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * The scope's value cache.
   *
   * @throws {ScopeDisposedError} if the scope has exited
   */
  get cache(): ScopeCache {
    if (this.disposed) throw new ScopeDisposedError(this.name);
    return this._cache;
  }

  /**
   * Register an extra cleanup to run when this scope exits. It runs before
   * the cleanups of values constructed earlier.
   *
   * @throws {ScopeDisposedError} if the scope has exited
   */
  registerDisposer(fn: () => void | Promise<void>, label?: string): void {
    this.cache.registerDisposer(fn, label);
  }

  /**
   * Record that `stack` inherited this scope and entered its own inside it.
   * @internal
   */
  attachInner(stack: ScopeStack): void {
    this.innerStacks.add(stack);
  }

  /** @internal */
  detachInner(stack: ScopeStack): void {
    this.innerStacks.delete(stack);
  }

  /**
   * Innermost scope of a fork still active inside this one, if any.
   * @internal
   */
  activeInner(): ScopeHandle | undefined {
    for (const stack of this.innerStacks) {
      const inner = stack.innermost;
      if (inner) return inner;
    }
    return undefined;
  }

  /**
   * Exit the scope.
   *
   * @throws {ScopeOrderError} if a scope entered after this one is still active, on the same stack or on a fork of it
   * @throws {CleanupErrors} if one or more cleanups failed; all of them still ran
   */
  async exit(): Promise<void> {
    if (this.disposed) return;
    this.owner.release(this);
    this.disposed = true;

    const failures = await this._cache.close();
    debug('exit %s (%d cleanup failure(s))', this.name, failures.length);
    if (failures.length > 0) {
      throw new CleanupErrors(
        this.name,
        failures.map((f) => f.error),
        failures.map((f) => f.key)
      );
    }
  }
}
