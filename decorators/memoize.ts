import { wraps, type Fn } from "./wraps";

// A node in the cache trie. Each level is keyed by one argument position.
// The result sits in a container so that a cached `undefined` still counts
// as a hit.
type TrieNode<R> = {
  readonly children: Map<unknown, TrieNode<R>>;
  result: { value: R } | undefined;
};

const makeNode = <R>(): TrieNode<R> => ({
  children: new Map(),
  result: undefined,
});

/**
 * Memoize `f` on its whole argument tuple.
 *
 * Arguments are compared with SameValueZero (the `Map` key rule): primitives
 * by value, objects by identity. The cache is unbounded and lives as long as
 * the returned function, so `f` has to be pure.
 */
export function memoize<Args extends readonly unknown[], R>(
  f: Fn<Args, R>
): Fn<Args, R> {
  const root = makeNode<R>();

  // Local helper: get the child node for a key, creating it if absent
  const getOrInit = (node: TrieNode<R>, key: unknown): TrieNode<R> => {
    const existing = node.children.get(key);
    if (existing !== undefined) return existing;
    const created = makeNode<R>();
    node.children.set(key, created);
    return created;
  };

  return wraps(f, (...args: Args): R => {
    // Walk the trie along the argument tuple to reach the leaf node
    const leaf = args.reduce<TrieNode<R>>(getOrInit, root);

    if (leaf.result) return leaf.result.value;

    const value = f(...args);
    leaf.result = { value };
    return value;
  });
}
