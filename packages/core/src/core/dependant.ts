import { InvalidKeyError } from '../errors/errors.js';
import type { Dependant, ParamValues, ParameterRef, ScopeName } from '../types/types.js';
import { isKey, key as createKey, type Key } from './key.js';

/**
 * Options accepted by {@link dependant}.
 *
 * @template T - Type of the value the factory produces
 * @template P - Parameter references, in the order the factory takes them
 */
export interface DependantOptions<T, P extends ParameterRef[]> {
  /** Key this dependant satisfies. A fresh key labelled `label` is created when omitted. */
  key?: Key<T>;
  label?: string;
  params?: [...P];
  factory: (...args: ParamValues<P>) => T | Promise<T>;
  scope: ScopeName;
  /** @default true */
  shared?: boolean;
  dispose?: (value: T) => void | Promise<void>;
}

const EMPTY_PARAMS: readonly ParameterRef[] = Object.freeze([]);

/**
 * Build an immutable dependant.
 *
 * The factory's parameter types follow the `params` list: required
 * parameters arrive as their key's type, optional ones may be `undefined`.
 *
 * @example
 * ```typescript
 * const ConfigKey = key<Config>('Config');
 * const config = dependant({ key: ConfigKey, scope: 'app', factory: () => loadConfig() });
 *
 * const db = dependant({
 *   label: 'Database',
 *   scope: 'app',
 *   params: [depends(config)],
 *   factory: (cfg) => new Database(cfg.url),
 *   dispose: (conn) => conn.close(),
 * });
 * ```
 */
export function dependant<T, P extends ParameterRef[] = []>(
  options: DependantOptions<T, P>
): Dependant<T> {
  const k = options.key ?? createKey<T>(options.label);
  if (!isKey(k)) throw new InvalidKeyError(k);
  for (const ref of options.params ?? []) {
    if (!isKey(ref.key)) throw new InvalidKeyError(ref.key);
  }

  const d: Dependant<T> = {
    kind: 'dependant',
    key: k,
    params: options.params ? Object.freeze([...options.params]) : EMPTY_PARAMS,
    scope: options.scope,
    shared: options.shared ?? true,
    factory: options.factory,
    dispose: options.dispose,
  };
  return Object.freeze(d);
}

/**
 * Reference a parameter by key.
 *
 * @param options.provider - Default dependant used when no binding overrides `key`
 * @param options.required - When false, an unsatisfiable parameter resolves to `undefined`
 */
export function param<T>(
  key: Key<T>,
  options?: { provider?: Dependant<T>; required?: true }
): ParameterRef<T, true>;
export function param<T>(
  key: Key<T>,
  options: { provider?: Dependant<T>; required: false }
): ParameterRef<T, false>;
export function param<T>(
  key: Key<T>,
  options: { provider?: Dependant<T>; required?: boolean } = {}
): ParameterRef<T, boolean> {
  const ref: ParameterRef<T, boolean> = {
    key,
    required: options.required ?? true,
    provider: options.provider,
  };
  return Object.freeze(ref);
}

/**
 * Required reference to `target`'s key with `target` as its default provider.
 */
export function depends<T>(target: Dependant<T>): ParameterRef<T, true> {
  return param(target.key, { provider: target });
}

export function isDependant(x: unknown): x is Dependant {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as Dependant).kind === 'dependant' &&
    isKey((x as Dependant).key) &&
    typeof (x as Dependant).factory === 'function'
  );
}
