import { emptySequence } from "./errors";
import { wraps } from "./wraps";

export type Binary<T> = (x: T, y: T) => T;
export type Variadic<T> = (...xs: readonly T[]) => T;

/**
 * Right fold without a seed: `[x] -> x`, `[x, ...rest] -> f(x, fold(rest))`.
 * Throws `ArityError` on an empty sequence.
 */
export function foldRight<T>(
  f: Binary<T>,
  sequence: readonly T[],
  name: string = f.name
): T {
  if (sequence.length === 0) throw emptySequence(name);
  const go = (i: number): T =>
    i === sequence.length - 1 ? sequence[i] : f(sequence[i], go(i + 1));
  return go(0);
}

// f(x, y, z) = f(x, f(y, z)), and f(x) = x
export function nAry<T>(f: Binary<T>): Variadic<T> {
  return wraps(f, (...xs: readonly T[]): T => foldRight(f, xs, f.name));
}
