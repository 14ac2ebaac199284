/* ScopeStack
 *
 * Explicitly passed stack of active scopes, outer first. There is no
 * process-wide registry: whoever executes a plan hands the stack in.
 *
 * Rules:
 *  - enter() pushes a fresh scope; a name may appear once per stack
 *  - only the innermost scope entered on a stack may exit
 *  - fork() gives a child stack that sees the parent's scopes as they were
 *    at fork time and enters its own independently. Concurrent requests
 *    each fork the application stack and enter their own request scope.
 *  - an inherited scope cannot exit while a fork still has scopes of its
 *    own entered inside it
 */
import createDebug from 'debug';

import { CleanupErrors, DuplicateScopeError, ScopeOrderError } from '../errors/errors.js';
import type { ScopeName } from '../types/types.js';
import { ScopeHandle } from './scope.js';

const debug = createDebug('lattice:scope');

export class ScopeStack {
  /** Scopes seen through the parent at fork time, outer first. */
  private readonly inherited: readonly ScopeHandle[];

  /** Scopes entered on this stack, outer first. */
  private readonly own: ScopeHandle[] = [];

  constructor(parent?: ScopeStack) {
    this.inherited = parent ? parent.active : [];
  }

  /**
   * Active scopes, outer first.
   */
  get active(): readonly ScopeHandle[] {
    return [...this.inherited, ...this.own].filter((h) => !h.isDisposed);
  }

  get names(): ScopeName[] {
    return this.active.map((h) => h.name);
  }

  /** Innermost active scope entered on this stack. */
  get innermost(): ScopeHandle | undefined {
    return this.own[this.own.length - 1];
  }

  /**
   * Enter a new instance of scope `name`.
   *
   * @throws {DuplicateScopeError} if `name` is already active on this stack
   */
  enter(name: ScopeName): ScopeHandle {
    if (this.has(name)) throw new DuplicateScopeError(name);
    const handle = new ScopeHandle(name, this);
    if (this.own.length === 0) {
      for (const outer of this.inherited) outer.attachInner(this);
    }
    this.own.push(handle);
    debug('enter %s (depth %d)', name, this.inherited.length + this.own.length);
    return handle;
  }

  get(name: ScopeName): ScopeHandle | undefined {
    for (let i = this.own.length - 1; i >= 0; i--) {
      if (this.own[i].name === name) return this.own[i];
    }
    return this.inherited.find((h) => h.name === name && !h.isDisposed);
  }

  has(name: ScopeName): boolean {
    return this.get(name) !== undefined;
  }

  fork(): ScopeStack {
    return new ScopeStack(this);
  }

  /**
   * Remove `handle` from the stack. Called by ScopeHandle.exit().
   *
   * @throws {ScopeOrderError} if `handle` is not the innermost scope of this
   * stack, or a fork still has a scope active inside it
   * @internal
   */
  release(handle: ScopeHandle): void {
    const top = this.innermost;
    if (top !== handle) {
      throw new ScopeOrderError(handle.name, top?.name);
    }
    const inner = handle.activeInner();
    if (inner) throw new ScopeOrderError(handle.name, inner.name);

    this.own.pop();
    if (this.own.length === 0) {
      for (const outer of this.inherited) outer.detachInner(this);
    }
  }

  /**
   * Exit every scope entered on this stack, innermost first. All of them exit
   * even when cleanups fail; failures are reported together.
   *
   * @throws {CleanupErrors} if any cleanup failed
   */
  async exitAll(): Promise<void> {
    const names: string[] = [];
    const errors: Error[] = [];
    const keys: string[] = [];

    while (this.own.length > 0) {
      const handle = this.own[this.own.length - 1];
      try {
        await handle.exit();
      } catch (e) {
        if (!(e instanceof CleanupErrors)) throw e;
        names.push(e.scope);
        errors.push(...e.errors);
        keys.push(...e.keys);
      }
    }

    if (errors.length > 0) throw new CleanupErrors(names.join(', '), errors, keys);
  }
}
