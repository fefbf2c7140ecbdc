import { describe, it, expect, vi } from "vitest";

import { ArityError } from "../errors";
import { foldRight, nAry } from "../nAry";
import { add, multiply } from "../toys";

const subtract = (a: number, b: number) => a - b;
const pair = (a: string, b: string) => `(${a} ${b})`;

describe("foldRight", () => {
  it("returns a single element unchanged", () => {
    expect(foldRight(subtract, [42])).toBe(42);
  });

  it("nests to the right", () => {
    // 10 - (4 - (3 - 1))
    expect(foldRight(subtract, [10, 4, 3, 1])).toBe(8);
    expect(foldRight(pair, ["a", "b", "c", "d"])).toBe("(a (b (c d)))");
  });

  it("fails on an empty sequence with the function's name", () => {
    expect(() => foldRight(subtract, [])).toThrow("subtract() of empty sequence");
  });
});

describe("nAry", () => {
  const sum = nAry(add);
  const product = nAry(multiply);

  it("f(x) = x", () => {
    expect(sum(4)).toBe(4);
    expect(nAry(pair)("only")).toBe("only");
  });

  it("f(x, y) = f(x, y)", () => {
    const spy = vi.fn(add);
    expect(nAry(spy)(4, 3)).toBe(7);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith(4, 3);
  });

  it("folds three or more arguments from the right", () => {
    expect(sum(4, 3, 2)).toBe(9);
    expect(product(4, 3, 2, 1)).toBe(24);
    expect(nAry(subtract)(10, 4, 3, 1)).toBe(8);
    expect(nAry(pair)("a", "b", "c")).toBe("(a (b c))");
  });

  it("calls f innermost pair first", () => {
    const spy = vi.fn(subtract);
    nAry(spy)(1, 2, 3);
    expect(spy.mock.calls).toEqual([
      [2, 3],
      [1, -1],
    ]);
  });

  it("throws ArityError naming the function when called with nothing", () => {
    let caught: unknown;
    try {
      product();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ArityError);
    expect(caught).toBeInstanceOf(Error);
    expect(caught).toMatchObject({
      _tag: "ArityError",
      functionName: "multiply",
      message: "multiply() of empty sequence",
    });
  });

  it("keeps the binary function's name", () => {
    expect(sum.name).toBe("add");
  });
});
