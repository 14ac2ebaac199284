import type { Key, KeyId } from '../core/key.js';

/**
 * Name of a lifetime bucket, e.g. `'app'` or `'request'`.
 */
export type ScopeName = string;

/**
 * Reference from a dependant to one of its parameters.
 *
 * `provider` is the reference's own default dependant. It is used when the
 * binding table has no override for `key`.
 *
 * @template T - Type of the parameter value
 * @template R - Whether the parameter is required
 */
export interface ParameterRef<T = unknown, R extends boolean = boolean> {
  readonly key: Key<T>;
  readonly required: R;
  readonly provider?: Dependant<T>;
}

/**
 * Parameter values handed to a factory, in declaration order.
 * Optional parameters that nothing can satisfy arrive as `undefined`.
 */
export type ParamValues<P extends readonly ParameterRef[]> = {
  [I in keyof P]: P[I] extends ParameterRef<infer V, infer R>
    ? R extends true
      ? V
      : V | undefined
    : never;
};

/**
 * Node describing how to produce a value and what it needs.
 *
 * Dependants are frozen once built. The solver identifies them by `key.id`,
 * so two independently built dependants for one key collapse into one node.
 */
export interface Dependant<T = unknown> {
  readonly kind: 'dependant';
  readonly key: Key<T>;
  readonly params: readonly ParameterRef[];
  readonly scope: ScopeName;
  /** Cache and reuse the value within its scope (default true). */
  readonly shared: boolean;
  factory(...args: unknown[]): T | Promise<T>;
  /** Cleanup run when the owning scope exits. */
  dispose?(value: T): void | Promise<void>;
}

/**
 * Values that expose their own cleanup method.
 */
export interface Disposable {
  dispose?: () => void | Promise<void>;
  close?: () => void | Promise<void>;
}

/**
 * Execution strategy for nodes inside one stage.
 *
 *   - **concurrent**: every node of a stage is started before any is awaited
 *   - **sequential**: nodes of a stage run one after another, in stage order
 */
export const Concurrency = {
  Concurrent: 'concurrent',
  Sequential: 'sequential',
} as const;

export type ConcurrencyType = (typeof Concurrency)[keyof typeof Concurrency];

/**
 * Hook invoked after each factory run with the key label and the duration of
 * the run in nanoseconds.
 */
export type InstantiateHook = (key: string, durationNs: number) => void;

/**
 * One solved node of an execution plan.
 */
export interface PlanNode {
  /** Arena handle; index into `ExecutionPlan.nodes`. */
  readonly handle: number;
  readonly key: Key;
  readonly dependant: Dependant;
  readonly scope: ScopeName;
  /** Other key ids that resolved to this node through a binding. */
  readonly aliases: readonly KeyId[];
  /** Handle per parameter, `null` for an optional parameter nothing satisfies. */
  readonly params: readonly (number | null)[];
  /** Handles of the nodes that take this node as a parameter. */
  readonly dependants: readonly number[];
  readonly stage: number;
  /** NODE_* bit flags, see `core/flags.ts`. */
  readonly flags: number;
}

/**
 * Set of nodes whose parameters were all produced by earlier stages.
 */
export interface PlanStage {
  readonly index: number;
  /** Node handles in discovery order. */
  readonly nodes: readonly number[];
  /** Key labels of `nodes`, same order. */
  readonly keys: readonly string[];
  /** Distinct scopes the stage executes in, in first-seen order. */
  readonly scopes: readonly ScopeName[];
}

export interface ExecutionPlan<T = unknown> {
  readonly root: Key<T>;
  /** Handle of the root node; always in the last stage. */
  readonly rootHandle: number;
  /** Arena of nodes in discovery order; `nodes[i].handle === i`. */
  readonly nodes: readonly PlanNode[];
  readonly stages: readonly PlanStage[];
  /** Declared scope ordering the plan was checked against, outer first. */
  readonly scopes: readonly ScopeName[];
}

export interface SolveOptions {
  /**
   * Scope ordering, outer first. When given, every dependant's scope must be
   * listed and no dependant may depend on one in an inner scope.
   */
  scopes?: readonly ScopeName[];
}

export interface ExecuteOptions {
  /** Values supplied for keys instead of running their factories. */
  values?: ReadonlyMap<Key, unknown>;
  concurrency?: ConcurrencyType;
  onInstantiate?: InstantiateHook;
}

/**
 * Container configuration passed to the constructor.
 */
export interface ContainerConfig {
  /**
   * Scope ordering, outer first. Every dependant solved by the container
   * must use one of these scopes.
   */
  scopes: readonly ScopeName[];

  /**
   * Execution strategy for nodes inside one stage.
   *
   * @default 'concurrent'
   */
  concurrency?: ConcurrencyType;

  /**
   * Scope entered for the duration of `execute()` when it is not already
   * active. Must be one of `scopes`.
   */
  executionScope?: ScopeName;

  /**
   * Optional hook invoked after a factory runs.
   *
   * Receives the key label and the duration in nanoseconds. Useful for
   * profiling or custom telemetry.
   */
  onInstantiate?: InstantiateHook;
}
