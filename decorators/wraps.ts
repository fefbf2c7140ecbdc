// Any callable; `never[]` parameters accept every function type.
export type AnyFunction = (...args: never[]) => unknown;

export type Fn<Args extends readonly unknown[], R> = (...args: Args) => R;

const DOC = "doc";

/**
 * Attach a documentation string to a function. Plays the part of a
 * docstring, so wrappers can carry it along with the name.
 */
export function withDoc<F extends AnyFunction>(doc: string, f: F): F {
  Object.defineProperty(f, DOC, {
    value: doc,
    configurable: true,
    enumerable: false,
    writable: true,
  });
  return f;
}

export function docOf(f: AnyFunction): string | undefined {
  const doc: unknown = Reflect.get(f, DOC);
  return typeof doc === "string" ? doc : undefined;
}

// Copy the identity of `original` (name and doc) onto `wrapper`
export function wraps<W extends AnyFunction>(original: AnyFunction, wrapper: W): W {
  Object.defineProperty(wrapper, "name", {
    value: original.name,
    configurable: true,
  });
  const doc = docOf(original);
  if (doc !== undefined) withDoc(doc, wrapper);
  return wrapper;
}

/**
 * Passthrough wrapper. Swap it in for another wrapper to turn that one off,
 * e.g. use `disable` where `memoize` was.
 */
export function disable<Args extends readonly unknown[], R>(
  f: Fn<Args, R>
): Fn<Args, R> {
  return wraps(f, (...args: Args): R => f(...args));
}
