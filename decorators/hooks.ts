import { wraps, type Fn } from "./wraps";

export interface CallHooks<Args extends readonly unknown[], R> {
  before?(args: Args): void;
  after?(args: Args, result: R): void;
  // Runs when the call throws; the error is rethrown afterwards
  failed?(args: Args, error: unknown): void;
}

export type Decorator<Args extends readonly unknown[], R> = (
  f: Fn<Args, R>
) => Fn<Args, R>;

export function around<Args extends readonly unknown[], R>(
  f: Fn<Args, R>,
  hooks: CallHooks<Args, R>
): Fn<Args, R> {
  return wraps(f, (...args: Args): R => {
    hooks.before?.(args);
    let result: R;
    try {
      result = f(...args);
    } catch (error) {
      hooks.failed?.(args, error);
      throw error;
    }
    hooks.after?.(args, result);
    return result;
  });
}

/**
 * Compose decorators in the order they would be stacked on top of a
 * definition: the first one listed is the outermost.
 *
 *   stack(counter.wrap, memoize)(f)  ===  counter.wrap(memoize(f))
 */
export function stack<Args extends readonly unknown[], R>(
  ...decorators: ReadonlyArray<Decorator<Args, R>>
): Decorator<Args, R> {
  return (f) => decorators.reduceRight<Fn<Args, R>>((inner, d) => d(inner), f);
}

/**
 * Tie the knot for a recursive function: `open` receives the fully decorated
 * function as `self`, so every recursive call goes through all the wrappers.
 */
export function fix<Args extends readonly unknown[], R>(
  open: (self: Fn<Args, R>) => Fn<Args, R>,
  decorate: Decorator<Args, R>
): Fn<Args, R> {
  const self = (...args: Args): R => closed(...args);
  const closed = decorate(open(self));
  return closed;
}
