import { around } from "./hooks";
import type { Fn } from "./wraps";

// Counts invocations of every function it wraps. Never reset.
export class CallCounter {
  #calls = 0;

  get calls(): number {
    return this.#calls;
  }

  // Counted once the call returns; a call that throws is not counted
  readonly wrap = <Args extends readonly unknown[], R>(
    f: Fn<Args, R>
  ): Fn<Args, R> =>
    around(f, {
      after: () => {
        this.#calls++;
      },
    });
}
