import { around } from "./hooks";
import type { Fn } from "./wraps";

export type TraceOptions = {
  log?: (line: string) => void;
};

const render = (args: readonly unknown[]): string => args.map(String).join(", ");

/**
 * Print entry and exit of every call, indented by how deep the call is
 * nested inside the same wrapped function:
 *
 *    --> fib(3)
 *   #### --> fib(2)
 *   ######## --> fib(1)
 *   ######## <-- fib(1) ==  1
 *   ...
 *    <-- fib(3) ==  3
 *
 * Depth is per wrapped function and assumes synchronous use.
 */
export function trace(indent: string, options: TraceOptions = {}) {
  const log = options.log ?? console.log;

  return <Args extends readonly unknown[], R>(f: Fn<Args, R>): Fn<Args, R> => {
    let depth = 0;
    const prefix = () => indent.repeat(depth);

    return around(f, {
      before: (args) => {
        log(`${prefix()} --> ${f.name}(${render(args)})`);
        depth++;
      },
      after: (args, result) => {
        depth--;
        log(`${prefix()} <-- ${f.name}(${render(args)}) ==  ${String(result)}`);
      },
      failed: () => {
        depth--;
      },
    });
  };
}
