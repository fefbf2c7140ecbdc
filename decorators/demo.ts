import { Effect } from "effect";

import { CallCounter } from "./counter";
import { fix, stack } from "./hooks";
import { makeCountCalls, makeMemoize, nAryEffect } from "./memoizeEffect";
import { memoize } from "./memoize";
import { nAry } from "./nAry";
import { trace } from "./trace";
import { add, multiply, openFib } from "./toys";
import { docOf } from "./wraps";

type Log = (line: string) => void;

// The counter sits outermost, so it sees every call, cache hits included.
// Put it under `memoize` to count only the calls that compute.
export function runDemo(log: Log = console.log): void {
  const fooCalls = new CallCounter();
  const foo = stack<readonly number[], number>(fooCalls.wrap, memoize)(nAry(add));

  log(String(foo(4, 3)));
  log(String(foo(4, 3, 2)));
  log(String(foo(4, 3)));
  log(`${foo.name} was called ${fooCalls.calls} times`);

  const barCalls = new CallCounter();
  const bar = stack<readonly number[], number>(barCalls.wrap, memoize)(nAry(multiply));

  log(String(bar(4, 3)));
  log(String(bar(4, 3, 2)));
  log(String(bar(4, 3, 2, 1)));
  log(`${bar.name} was called ${barCalls.calls} times`);

  const fibCalls = new CallCounter();
  const fib = fix(
    openFib,
    stack<[number], number>(fibCalls.wrap, trace("####", { log }), memoize)
  );

  log(`name=${fib.name}`);
  log(`doc=${docOf(fib) ?? ""}`);
  fib(3);
  log(`${fibCalls.calls} calls made`);
}

const addEffect = (a: number, b: number) => Effect.succeed(add(a, b));

// Same folding as `foo` above, built from the effectful wrappers
export const effectDemo = (log: Log = console.log) =>
  Effect.gen(function* () {
    const sum = nAryEffect(addEffect, "add");
    const memo = yield* makeMemoize((...xs: readonly number[]) => sum(...xs));
    const counted = yield* makeCountCalls(memo);

    for (const xs of [[4, 3], [4, 3, 2], [4, 3]]) {
      const result = yield* counted.call(...xs);
      log(String(result));
    }
    const calls = yield* counted.calls;
    log(`add was called ${calls} times`);
  });
