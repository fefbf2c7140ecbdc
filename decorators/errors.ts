import { Data } from "effect";

export class ArityError extends Data.TaggedError("ArityError")<{
  readonly functionName: string;
  readonly message: string;
}> {}

export const emptySequence = (functionName: string): ArityError =>
  new ArityError({
    functionName,
    message: `${functionName}() of empty sequence`,
  });
