import { Deferred, Effect, Exit, Ref, SynchronizedRef } from "effect";

import { ArityError, emptySequence } from "./errors";

// Same trie shape as the synchronous memoizer, but updated immutably so
// concurrent readers never see a half-written path. Each entry is a
// Deferred that the first caller completes; later callers await it.
type TrieNode<R, E> = {
  readonly children: Map<unknown, TrieNode<R, E>>;
  result: Deferred.Deferred<R, E> | undefined;
};

type Claim<R, E> = {
  readonly entry: Deferred.Deferred<R, E>;
  readonly hit: boolean;
};

const makeNode = <R, E>(): TrieNode<R, E> => ({
  children: new Map(),
  result: undefined,
});

/**
 * Creates an Effect that, when executed, produces a memoized and traced
 * version of an effectful function `f`. Any arity works, including zero.
 *
 * The cache lock is only held while claiming an entry, never while `f`
 * runs, so `f` may call back into the memoized function (recursion).
 * Concurrent calls with the same new arguments run `f` once. A failure of
 * `f` is handed to the callers waiting on it and then forgotten.
 */
export function makeMemoize<Args extends readonly unknown[], R, E, Req>(
  f: (...args: Args) => Effect.Effect<R, E, Req>
): Effect.Effect<(...args: Args) => Effect.Effect<R, E, Req>, never, never> {
  return Effect.gen(function* () {
    const cacheRef = yield* SynchronizedRef.make<TrieNode<R, E>>(makeNode());

    return Effect.fn("makeMemoize")(function* (...args: Args) {
      yield* Effect.annotateCurrentSpan("function.args", args);

      const pending = yield* Deferred.make<R, E>();

      // Atomic "get or claim"
      const claim = yield* SynchronizedRef.modify(
        cacheRef,
        (root): readonly [Claim<R, E>, TrieNode<R, E>] => {
          const cached = lookup(root, args);
          if (cached) return [{ entry: cached, hit: true }, root];
          return [{ entry: pending, hit: false }, updateCache(root, args, pending)];
        }
      );
      yield* Effect.annotateCurrentSpan("cache.hit", claim.hit);

      if (claim.hit) return yield* Deferred.await(claim.entry);

      return yield* f(...args).pipe(
        Effect.onExit((exit) =>
          Exit.isSuccess(exit)
            ? Deferred.done(pending, exit)
            : SynchronizedRef.update(cacheRef, (root) =>
                updateCache(root, args, undefined)
              ).pipe(Effect.zipRight(Deferred.done(pending, exit)))
        )
      );
    });
  });
}

function lookup<R, E>(
  root: TrieNode<R, E>,
  args: readonly unknown[]
): Deferred.Deferred<R, E> | undefined {
  let node: TrieNode<R, E> | undefined = root;
  for (const arg of args) {
    node = node.children.get(arg);
    if (node === undefined) return undefined;
  }
  return node.result;
}

/**
 * Copy the path being written to, leaving the previous root untouched.
 * Writing `undefined` forgets the entry.
 */
function updateCache<R, E>(
  root: TrieNode<R, E>,
  args: readonly unknown[],
  entry: Deferred.Deferred<R, E> | undefined
): TrieNode<R, E> {
  const newRoot: TrieNode<R, E> = { ...root, children: new Map(root.children) };

  let currentNode = newRoot;
  for (const arg of args) {
    const existingNext = currentNode.children.get(arg);
    const newNext: TrieNode<R, E> = {
      result: existingNext?.result,
      children: new Map(existingNext?.children),
    };
    currentNode.children.set(arg, newNext);
    currentNode = newNext;
  }

  currentNode.result = entry;
  return newRoot;
}

export interface CountedCalls<Args extends readonly unknown[], R, E, Req> {
  readonly call: (...args: Args) => Effect.Effect<R, E, Req>;
  readonly calls: Effect.Effect<number>;
}

// Call counter whose state lives in a Ref instead of on the function
export function makeCountCalls<Args extends readonly unknown[], R, E, Req>(
  f: (...args: Args) => Effect.Effect<R, E, Req>
): Effect.Effect<CountedCalls<Args, R, E, Req>, never, never> {
  return Effect.gen(function* () {
    const counter = yield* Ref.make(0);
    return {
      call: (...args: Args) =>
        Ref.update(counter, (n) => n + 1).pipe(Effect.zipRight(f(...args))),
      calls: Ref.get(counter),
    };
  });
}

/**
 * Effectful right fold of a binary function. An empty argument list fails
 * with `ArityError` in the error channel instead of throwing.
 */
export function nAryEffect<T, E, Req>(
  f: (x: T, y: T) => Effect.Effect<T, E, Req>,
  name: string = f.name
): (...xs: readonly T[]) => Effect.Effect<T, E | ArityError, Req> {
  return (...xs) => {
    if (xs.length === 0) return Effect.fail(emptySequence(name));
    const go = (i: number): Effect.Effect<T, E, Req> =>
      i === xs.length - 1
        ? Effect.succeed(xs[i])
        : Effect.flatMap(go(i + 1), (rest) => f(xs[i], rest));
    return go(0);
  };
}
