export { Container, type ContainerExecuteOptions } from './api/container.js';
export { createKeyGroup, type KeyGroup } from './api/key-utils.js';

export { BindingTable, type Binding } from './core/binding-table.js';
export { dependant, depends, isDependant, param, type DependantOptions } from './core/dependant.js';
export { execute } from './core/executor.js';
export { buildGraph, type DependantGraph, type GraphNode } from './core/graph.js';
export * from './core/key.js';
export { PlanCache } from './core/plan-cache.js';
export { ScopeCache, type CleanupFailure, type CreateOptions } from './core/scope-cache.js';
export { ScopeHandle } from './core/scope.js';
export { ScopeStack } from './core/scope-stack.js';
export { describePlan, solve, Solver } from './core/solver.js';
export { NODE_LEAF, NODE_SHARED } from './core/flags.js';

export { Concurrency } from './types/types.js';
export type {
  ConcurrencyType,
  ContainerConfig,
  Dependant,
  Disposable,
  ExecuteOptions,
  ExecutionPlan,
  InstantiateHook,
  ParameterRef,
  ParamValues,
  PlanNode,
  PlanStage,
  ScopeName,
  SolveOptions,
} from './types/types.js';

// Errors
export {
  CleanupErrors,
  ConstructionError,
  CycleError,
  DuplicateScopeError,
  InvalidContainerConfigError,
  InvalidKeyError,
  MissingBindingError,
  ScopeConflictError,
  ScopeDisposedError,
  ScopeMismatchError,
  ScopeNotActiveError,
  ScopeOrderError,
  UnknownScopeError,
} from './errors/errors.js';
