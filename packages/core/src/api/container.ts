/* Container
 *
 * Facade over the engine: owns a binding table, a plan-caching solver bound
 * to the declared scope ordering, and the root scope stack.
 *
 * Typical application wiring:
 * ```typescript
 * const container = new Container({ scopes: ['app', 'request'] });
 * container.enterScope('app');
 *
 * // per request, concurrently
 * await container.withScope('request', (stack) =>
 *   container.resolve(handler, { stack, values: new Map([[RequestKey, req]]) })
 * );
 *
 * await container.close();
 * ```
 */
import createDebug from 'debug';

import { BindingTable, type Binding } from '../core/binding-table.js';
import { execute } from '../core/executor.js';
import type { Key } from '../core/key.js';
import type { ScopeHandle } from '../core/scope.js';
import { ScopeStack } from '../core/scope-stack.js';
import { Solver } from '../core/solver.js';
import { InvalidContainerConfigError } from '../errors/errors.js';
import {
  Concurrency,
  type ConcurrencyType,
  type ContainerConfig,
  type Dependant,
  type ExecuteOptions,
  type ExecutionPlan,
  type InstantiateHook,
  type ScopeName,
} from '../types/types.js';

const debug = createDebug('lattice:container');

const CONCURRENCY_VALUES: readonly string[] = Object.values(Concurrency);

/**
 * Options for {@link Container.execute} and {@link Container.resolve}.
 */
export interface ContainerExecuteOptions extends ExecuteOptions {
  /** Stack to execute against; defaults to the container's root stack. */
  stack?: ScopeStack;
}

type ValidatedConfig = {
  readonly scopes: readonly ScopeName[];
  readonly concurrency: ConcurrencyType;
  readonly executionScope?: ScopeName;
  readonly onInstantiate?: InstantiateHook;
};

function isConcurrency(value: unknown): value is ConcurrencyType {
  return typeof value === 'string' && CONCURRENCY_VALUES.includes(value);
}

/**
 * Validate the configuration and return a frozen copy with defaults applied.
 *
 * @throws {InvalidContainerConfigError}
 */
function validateConfig(config: ContainerConfig): ValidatedConfig {
  if (typeof config !== 'object' || config === null) {
    throw new InvalidContainerConfigError('configuration must be an object.');
  }

  const { scopes, concurrency, executionScope, onInstantiate } = config;
  if (!Array.isArray(scopes) || scopes.length === 0) {
    throw new InvalidContainerConfigError(`'scopes' must be a non-empty array.`);
  }
  const seen = new Set<string>();
  for (const s of scopes) {
    if (typeof s !== 'string' || s.length === 0) {
      throw new InvalidContainerConfigError(`'scopes' must contain non-empty strings.`);
    }
    if (seen.has(s)) {
      throw new InvalidContainerConfigError(`scope '${s}' is declared more than once.`);
    }
    seen.add(s);
  }

  if (concurrency !== undefined && !isConcurrency(concurrency)) {
    throw new InvalidContainerConfigError(
      `'concurrency' must be one of ${CONCURRENCY_VALUES.map((c) => `'${c}'`).join(', ')}.`
    );
  }
  if (executionScope !== undefined && !seen.has(executionScope)) {
    throw new InvalidContainerConfigError(
      `'executionScope' must be one of the declared scopes, got '${String(executionScope)}'.`
    );
  }
  if (onInstantiate !== undefined && typeof onInstantiate !== 'function') {
    throw new InvalidContainerConfigError(`'onInstantiate' must be a function.`);
  }

  return Object.freeze({
    scopes: Object.freeze([...scopes]),
    concurrency: concurrency ?? Concurrency.Concurrent,
    executionScope,
    onInstantiate,
  });
}

export class Container {
  readonly bindings = new BindingTable();

  /** Root scope stack; long-lived scopes are entered here. */
  readonly stack = new ScopeStack();

  private readonly config: ValidatedConfig;
  private readonly solver: Solver;

  constructor(config: ContainerConfig) {
    this.config = validateConfig(config);
    this.solver = new Solver(this.bindings, { scopes: this.config.scopes });
    debug('container with scopes %o', this.config.scopes);
  }

  /** Declared scope ordering, outer first. */
  get scopes(): readonly ScopeName[] {
    return this.config.scopes;
  }

  /** Plan cache counters of the container's solver. */
  get planCacheStats(): { hits: number; misses: number } {
    return this.solver.stats;
  }

  /**
   * Make `dependant` satisfy `key`. Cached plans are invalidated.
   */
  bind<T>(key: Key<T>, dependant: Dependant<T>): Binding<T> {
    return this.bindings.bind(key, dependant);
  }

  /**
   * Solve `root` against the current bindings and declared scopes. Plans are
   * cached until the bindings change.
   */
  solve<T>(root: Dependant<T>): ExecutionPlan<T> {
    return this.solver.solve(root);
  }

  /**
   * Execute a solved plan.
   *
   * When the container has an `executionScope` that is not active on the
   * stack, it is entered on a fork of the stack for the duration of the call
   * and exited afterwards.
   */
  async execute<T>(plan: ExecutionPlan<T>, options: ContainerExecuteOptions = {}): Promise<T> {
    const { stack = this.stack, ...rest } = options;
    const executeOptions: ExecuteOptions = {
      values: rest.values,
      concurrency: rest.concurrency ?? this.config.concurrency,
      onInstantiate: rest.onInstantiate ?? this.config.onInstantiate,
    };

    const scope = this.config.executionScope;
    if (scope === undefined || stack.has(scope)) {
      return execute(plan, stack, executeOptions);
    }

    debug('entering execution scope %s', scope);
    return this.withScope(scope, (local) => execute(plan, local, executeOptions), stack);
  }

  /**
   * Solve and execute `root`.
   */
  async resolve<T>(root: Dependant<T>, options?: ContainerExecuteOptions): Promise<T> {
    return this.execute(this.solve(root), options);
  }

  /**
   * Enter scope `name` on `stack` (the root stack by default).
   *
   * @throws {DuplicateScopeError} if `name` is already active on the stack
   */
  enterScope(name: ScopeName, stack: ScopeStack = this.stack): ScopeHandle {
    return stack.enter(name);
  }

  /**
   * Run `fn` inside a fresh instance of scope `name`.
   *
   * The scope is entered on a fork of `stack`, so concurrent calls each get
   * their own instance. It exits when `fn` settles. When both `fn` and the
   * scope's cleanups fail, the two errors are thrown together as an
   * AggregateError.
   */
  async withScope<R>(
    name: ScopeName,
    fn: (stack: ScopeStack) => R | Promise<R>,
    stack: ScopeStack = this.stack
  ): Promise<R> {
    const local = stack.fork();
    const handle = local.enter(name);

    let result: R;
    try {
      result = await fn(local);
    } catch (bodyError) {
      try {
        await handle.exit();
      } catch (cleanupError) {
        throw new AggregateError(
          [bodyError, cleanupError],
          `Scope '${name}' failed and its cleanup failed too.`
        );
      }
      throw bodyError;
    }

    await handle.exit();
    return result;
  }

  /**
   * Exit every scope entered on the root stack, innermost first.
   *
   * @throws {CleanupErrors} if any cleanup failed
   */
  async close(): Promise<void> {
    debug('closing container');
    await this.stack.exitAll();
    this.solver.clear();
  }
}
