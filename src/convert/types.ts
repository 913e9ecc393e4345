import type { ConvertConfig } from "../config/config";
import type { TypeDesc } from "../desc/desc";
import type { DestType } from "../dest/types";
import type { TraceSink } from "../ports/trace";
import { ConversionError, isConversionError } from "../outcome/errors";
import { wrapFailure } from "../outcome/failure";

/**
 * A built conversion: read the source value at `srcOffset`, write the
 * destination value at `dstOffset`. Holds no mutable state.
 */
export type ConvFn = (src: DataView, srcOffset: number, dst: DataView, dstOffset: number) => void;

export type BuildFn = (dest: DestType, desc: TypeDesc, ctx: BuildContext) => ConvFn;

export interface BuildContext {
  readonly config: ConvertConfig;
  readonly trace: TraceSink;
  /** Location of the node being built, from the destination root */
  readonly path: readonly string[];
  /** Recursive entry for nested element, field and payload types */
  readonly build: BuildFn;
}

/**
 * Build a nested node one path segment deeper. A failure raised inside is
 * re-thrown with the segment prefixed to its message; its reason is kept.
 */
export function within<A>(ctx: BuildContext, segment: string, fn: (inner: BuildContext) => A): A {
  const inner: BuildContext = { ...ctx, path: [...ctx.path, segment] };
  try {
    return fn(inner);
  } catch (e) {
    if (!isConversionError(e)) throw e;
    const path = e.failure.context?.path ?? inner.path;
    throw new ConversionError(wrapFailure(e.failure, `${segment}: ${e.failure.message}`, { path }));
  }
}
