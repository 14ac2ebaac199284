/**
 * Branded type for key identifiers.
 * Prevents accidental use of raw strings as key IDs.
 */
export type KeyId = string & { __brand: 'KeyId' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates keys with the type of value they resolve to.
 */
declare const KEY_BRAND: unique symbol;

/**
 * Identifier a dependant satisfies and callers ask for.
 *
 * Two keys are the same key only when their `id` is equal; labels are for
 * diagnostics and may repeat.
 *
 * @template T - The type of value this key resolves to
 */
export interface Key<T = unknown> {
  /** Discriminant for runtime type checking */
  readonly kind: 'key';

  /** Unique identifier (key_1, key_2, etc.) */
  readonly id: KeyId;

  /** Human-readable label for debugging and error messages */
  readonly label: string;

  /** Phantom type brand */
  readonly [KEY_BRAND]?: T;
}

let _keyCounter = 0;

/**
 * Create a new key.
 *
 * @example
 * ```typescript
 * const DatabaseKey = key<Database>('Database');
 * const RequestKey = key<Request>('Request');
 * ```
 */
export function key<T = unknown>(label?: string): Key<T> {
  const k: Key<T> = {
    kind: 'key',
    id: `key_${++_keyCounter}` as KeyId,
    label: label ?? 'Key',
  };
  return Object.freeze(k);
}

/**
 * Runtime type guard for keys.
 */
export function isKey(x: unknown): x is Key<unknown> {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as Key).kind === 'key' &&
    typeof (x as Key).id === 'string' &&
    typeof (x as Key).label === 'string'
  );
}
