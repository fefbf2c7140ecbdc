import { describe, it, expect } from "vitest";
import { Effect } from "effect";

import { effectDemo, runDemo } from "../demo";

describe("runDemo", () => {
  it("prints the fixed demonstration", () => {
    const lines: string[] = [];
    runDemo((line) => lines.push(line));

    expect(lines).toEqual([
      "7",
      "9",
      "7",
      "add was called 3 times",
      "12",
      "24",
      "24",
      "multiply was called 3 times",
      "name=fib",
      "doc=Some doc",
      " --> fib(3)",
      "#### --> fib(2)",
      "######## --> fib(1)",
      "######## <-- fib(1) ==  1",
      "######## --> fib(0)",
      "######## <-- fib(0) ==  1",
      "#### <-- fib(2) ==  2",
      "#### --> fib(1)",
      "#### <-- fib(1) ==  1",
      " <-- fib(3) ==  3",
      "5 calls made",
    ]);
  });
});

describe("effectDemo", () => {
  it("folds, memoizes and counts through the effectful wrappers", async () => {
    const lines: string[] = [];
    await Effect.runPromise(effectDemo((line) => lines.push(line)));

    expect(lines).toEqual(["7", "9", "7", "add was called 3 times"]);
  });
});
