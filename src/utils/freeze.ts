/**
 * Deep freeze for records that must not change once committed
 *
 * @module utils/freeze
 */

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * Freeze an object and everything reachable from it, depth-first.
 */
export function deepFreeze<T extends object>(obj: T): DeepReadonly<T>;
export function deepFreeze(obj: object): object {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}
