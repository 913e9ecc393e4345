import type { Failure, FailureReason } from "./failure";
import type { Outcome } from "./outcome";

/**
 * Thrown by the build and apply entry points. The structured failure
 * travels with the error so callers can branch on `reason`.
 */
export class ConversionError extends Error {
  constructor(public readonly failure: Failure) {
    super(failure.message);
    this.name = "ConversionError";
  }

  get reason(): FailureReason {
    return this.failure.reason;
  }
}

export function isConversionError(e: unknown): e is ConversionError {
  return e instanceof ConversionError;
}

/**
 * Run a throwing step and capture a ConversionError as a Fail outcome.
 * Any other exception is a bug and is rethrown.
 */
export function attempt<A>(fn: () => A): Outcome<A> {
  const start = Date.now();
  try {
    const value = fn();
    return { tag: "Done", value, meta: { durationMs: Date.now() - start } };
  } catch (e) {
    if (isConversionError(e)) {
      return { tag: "Fail", failure: e.failure, meta: { durationMs: Date.now() - start } };
    }
    throw e;
  }
}
