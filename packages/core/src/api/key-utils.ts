import { key, type Key } from '../core/key.js';

/** Keys for every property of `T`, each typed by that property. */
export type KeyGroup<T extends object> = { readonly [K in keyof T]: Key<T[K]> };

/**
 * Mint one key per own enumerable property of `shape`, labelled
 * `${prefix}${name}`. Property values only carry types. The group is frozen.
 *
 * @example
 * ```typescript
 * const User = createKeyGroup<{ Repository: UserRepository; Service: UserService }>('User', {
 *   Repository: null,
 *   Service: null,
 * });
 * User.Service.label; // 'UserService'
 * ```
 */
export function createKeyGroup<T extends object>(
  prefix: string,
  shape: { [K in keyof T]: T[K] | null }
): KeyGroup<T> {
  const entries = Object.keys(shape).map((name) => [name, key(`${prefix}${name}`)] as const);
  return Object.freeze(Object.fromEntries(entries)) as KeyGroup<T>;
}
