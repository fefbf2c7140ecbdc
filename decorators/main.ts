import { Effect } from "effect";

import { withTracing } from "../tracing";
import { DemoConfig } from "./config";
import { effectDemo, runDemo } from "./demo";

const program = Effect.gen(function* () {
  const config = yield* DemoConfig;
  yield* Effect.sync(() => runDemo());
  yield* withTracing(effectDemo(), config);
});

Effect.runPromise(program).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
