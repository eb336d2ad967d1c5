import { isDeepStrictEqual } from 'node:util';

export type Equality<T> = (a: T, b: T) => boolean;

/** Structural equality: same-shaped plain data compares equal regardless of identity */
export function structuralEquals<T>(a: T, b: T): boolean {
  return isDeepStrictEqual(a, b);
}

export function sameElements(a: readonly string[], b: readonly string[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((item, index) => item === b[index]);
}
