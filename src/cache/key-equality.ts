import { isDeepStrictEqual } from 'util';

export type KeyEquality<K> = (a: K, b: K) => boolean;

/** Structural equality: distinct objects with the same shape match. */
export function valueEquals<K>(a: K, b: K): boolean {
  return isDeepStrictEqual(a, b);
}

/** SameValueZero, the comparison `Map` uses. */
export function identityEquals<K>(a: K, b: K): boolean {
  return a === b || (a !== a && b !== b);
}
