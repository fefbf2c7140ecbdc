import { withDoc } from "./wraps";

export function add(a: number, b: number): number {
  return a + b;
}

export function multiply(a: number, b: number): number {
  return a * b;
}

// Open recursion: recursive calls go through `self`, see `fix` in ./hooks
export const openFib = (self: (n: number) => number) =>
  withDoc(
    "Some doc",
    function fib(n: number): number {
      return n <= 1 ? 1 : self(n - 1) + self(n - 2);
    }
  );
