/* ScopeCache
 *
 * Per-scope-instance store of constructed values. Responsibilities:
 *  - Collapse concurrent construction of a shared key so only one
 *    constructor runs; every caller receives the same value (single-flight).
 *  - Clear the in-flight marker when construction fails so a later caller
 *    can retry; the failure reaches every caller that was waiting.
 *  - Bypass caching for non-shared values while still owning them for
 *    cleanup.
 *  - Record cleanups in construction-completion order and run them in
 *    reverse when the scope closes.
 *
 * Lifecycle of a shared key:
 *   absent → pending (promise stored before the constructor is invoked)
 *          → ready (value stored) | absent (constructor failed)
 *
 * Closing refuses new constructions, waits for in-flight ones to settle,
 * then runs every cleanup exactly once even when some of them fail.
 */
import createDebug from 'debug';

import { ScopeDisposedError } from '../errors/errors.js';
import type { Disposable, ScopeName } from '../types/types.js';
import type { Key, KeyId } from './key.js';

const debug = createDebug('lattice:scope');

type Slot =
  | { readonly state: 'pending'; readonly promise: Promise<unknown> }
  | { readonly state: 'ready'; readonly value: unknown };

type CleanupEntry = {
  readonly label: string;
  readonly run: () => void | Promise<void>;
};

export interface CleanupFailure {
  readonly key: string;
  readonly error: Error;
}

export interface CreateOptions<T> {
  /** Cache and reuse the value (default true). */
  shared?: boolean;
  /** Cleanup for the value; defaults to its own dispose() or close(). */
  dispose?(value: T): void | Promise<void>;
}

const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));

/**
 * Cleanup for a value that exposes dispose() or close(), if any.
 */
function detectCleanup(value: unknown): (() => void | Promise<void>) | undefined {
  if (!value || (typeof value !== 'object' && typeof value !== 'function')) return undefined;
  const { dispose, close } = value as Disposable;
  const fn = typeof dispose === 'function' ? dispose : typeof close === 'function' ? close : undefined;
  return fn ? () => fn.call(value) : undefined;
}

export class ScopeCache {
  private readonly slots = new Map<KeyId, Slot>();

  /** Constructions that have not settled yet, shared or not. */
  private readonly inflight = new Set<Promise<unknown>>();

  /** Cleanups in the order their values finished constructing. */
  private cleanups: CleanupEntry[] = [];

  private closing = false;

  constructor(readonly scope: ScopeName) {}

  /** Number of completed shared values. */
  get size(): number {
    let n = 0;
    for (const slot of this.slots.values()) if (slot.state === 'ready') n++;
    return n;
  }

  get pending(): number {
    return this.inflight.size;
  }

  get isClosed(): boolean {
    return this.closing;
  }

  /**
   * Return the cached value for `key`, join its in-flight construction, or
   * construct it.
   *
   * With `shared: false` the cache is bypassed: `construct` runs on every
   * call and the value is only kept for cleanup.
   *
   * @throws {ScopeDisposedError} if the scope is closing or closed
   */
  getOrCreate<T>(
    key: Key<T>,
    construct: () => T | Promise<T>,
    options?: CreateOptions<T>
  ): Promise<T>;
  getOrCreate(
    key: Key,
    construct: () => unknown,
    options: CreateOptions<unknown> = {}
  ): Promise<unknown> {
    if (this.closing) return Promise.reject(new ScopeDisposedError(this.scope));

    if (options.shared === false) {
      return this.track(key.label, construct, options);
    }

    const slot = this.slots.get(key.id);
    if (slot?.state === 'ready') return Promise.resolve(slot.value);
    if (slot?.state === 'pending') {
      debug('%s: join in-flight %s', this.scope, key.label);
      return slot.promise;
    }

    // The slot is filled before the constructor runs so concurrent callers
    // in the same tick find it.
    const promise = this.track(key.label, construct, options).then(
      (value) => {
        this.slots.set(key.id, { state: 'ready', value });
        return value;
      },
      (err: unknown) => {
        this.slots.delete(key.id);
        throw err;
      }
    );
    this.slots.set(key.id, { state: 'pending', promise });
    return promise;
  }

  /**
   * Completed value for `key`, if any. Never waits.
   */
  peek<T>(key: Key<T>): T | undefined;
  peek(key: Key): unknown {
    const slot = this.slots.get(key.id);
    return slot?.state === 'ready' ? slot.value : undefined;
  }

  /**
   * Whether a completed value exists for `key`.
   */
  has(key: Key): boolean {
    return this.slots.get(key.id)?.state === 'ready';
  }

  /**
   * In-flight construction of `key`, if one is running.
   */
  pendingFor<T>(key: Key<T>): Promise<T> | undefined;
  pendingFor(key: Key): Promise<unknown> | undefined {
    const slot = this.slots.get(key.id);
    return slot?.state === 'pending' ? slot.promise : undefined;
  }

  /**
   * Register a cleanup to run when the scope closes, after (in reverse
   * order) everything registered before it.
   *
   * @throws {ScopeDisposedError} if the scope is closing or closed
   */
  registerDisposer(fn: () => void | Promise<void>, label = 'disposer'): void {
    if (this.closing) throw new ScopeDisposedError(this.scope);
    this.cleanups.push({ label, run: fn });
  }

  /**
   * Close the cache: wait for in-flight constructions, then run cleanups in
   * reverse construction order. Returns the cleanups that failed.
   * Subsequent calls return an empty list.
   */
  async close(): Promise<CleanupFailure[]> {
    if (this.closing) return [];
    this.closing = true;

    if (this.inflight.size > 0) {
      debug('%s: draining %d in-flight construction(s)', this.scope, this.inflight.size);
      await Promise.allSettled([...this.inflight]);
    }

    const entries = this.cleanups.reverse();
    this.cleanups = [];
    debug('%s: running %d cleanup(s)', this.scope, entries.length);

    const failures: CleanupFailure[] = [];
    for (const entry of entries) {
      try {
        await entry.run();
      } catch (e) {
        debug('%s: cleanup of %s failed', this.scope, entry.label);
        failures.push({ key: entry.label, error: toError(e) });
      }
    }

    this.slots.clear();
    return failures;
  }

  private track(
    label: string,
    construct: () => unknown,
    options: CreateOptions<unknown>
  ): Promise<unknown> {
    const promise = Promise.resolve()
      .then(construct)
      .then((value) => {
        const cleanup = options.dispose
          ? () => options.dispose?.(value)
          : detectCleanup(value);
        if (cleanup) this.cleanups.push({ label, run: cleanup });
        return value;
      });

    this.inflight.add(promise);
    const settle = () => {
      this.inflight.delete(promise);
    };
    void promise.then(settle, settle);
    return promise;
  }
}
