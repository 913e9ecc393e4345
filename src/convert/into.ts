import { mergeConfigs, validateConfig, type ConvertConfig } from "../config/config";
import type { TypeDesc } from "../desc/desc";
import { showDesc } from "../desc/show";
import { alloc, type DestType } from "../dest/types";
import { nullSink, type TraceSink } from "../ports/trace";
import { ConversionError, attempt, isConversionError } from "../outcome/errors";
import { invalidConfig, outOfBounds } from "../outcome/constructors";
import type { Outcome } from "../outcome/outcome";
import { buildArray } from "./array";
import { buildPrim } from "./prim";
import { buildRecord } from "./record";
import { buildVariant } from "./variant";
import { sourceExtent } from "./extent";
import type { BuildContext, ConvFn } from "./types";

export interface BuildOptions extends Partial<ConvertConfig> {
  trace?: TraceSink;
}

/**
 * A converter into a fixed destination type, built once for one source
 * shape. Safe to share: it holds only immutable offsets and closures.
 */
export interface Converter<T> {
  readonly dest: DestType<T>;
  /** Bytes of one source value the converter reads */
  readonly sourceSize: number;
  /** Convert the source value at `srcOffset` into `dst` at `dstOffset` */
  apply(src: DataView | Uint8Array, dst: DataView | Uint8Array, srcOffset?: number, dstOffset?: number): void;
  /**
   * Convert into fresh destination memory and decode it. An unknown source
   * tag fails with unknown-tag whatever the configured policy, since there
   * is no destination value to decode.
   */
  convert(src: DataView | Uint8Array, srcOffset?: number): T;
}

/** The closures behind a converter. */
export interface Compiled {
  readonly apply: ConvFn;
  /** Same conversion, failing on every unknown source tag */
  readonly strict: ConvFn;
  readonly sourceSize: number;
}

/**
 * Dispatch on the destination's kind. Each builder recurses back through
 * here for its element, field or payload types.
 */
export function buildConv(dest: DestType, desc: TypeDesc, ctx: BuildContext): ConvFn {
  switch (dest.kind) {
    case "prim":
      return buildPrim(dest, desc, ctx);
    case "array":
      return buildArray(dest, desc, ctx);
    case "record":
      return buildRecord(dest, desc, ctx);
    case "variant":
      return buildVariant(dest, desc, ctx);
  }
}

function toView(bytes: DataView | Uint8Array): DataView {
  return bytes instanceof DataView ? bytes : new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function checkRange(side: "source" | "destination", view: DataView, start: number, size: number): void {
  const end = start + size;
  if (!Number.isInteger(start) || start < 0 || end > view.byteLength) {
    throw new ConversionError(outOfBounds(side, start, end, view.byteLength));
  }
}

export function resolveConfig(options: BuildOptions): ConvertConfig {
  const config = mergeConfigs(options);
  const validation = validateConfig(config);
  if (!validation.valid) {
    throw new ConversionError(invalidConfig(validation.errors.join("; ")));
  }
  return config;
}

/**
 * Build the closures for one (dest, desc) pair. Under the "ignore" policy
 * a second, failing build backs `convert`; it reports nothing to the trace.
 */
export function compile(dest: DestType, desc: TypeDesc, ctx: BuildContext): Compiled {
  const apply = buildConv(dest, desc, ctx);
  const strict =
    ctx.config.unknownTag === "fail"
      ? apply
      : buildConv(dest, desc, { ...ctx, config: { ...ctx.config, unknownTag: "fail" }, trace: nullSink });
  return { apply, strict, sourceSize: sourceExtent(dest, desc) };
}

export function makeConverter<T>(dest: DestType<T>, compiled: Compiled, config: ConvertConfig): Converter<T> {
  const { boundsCheck, littleEndian } = config;
  const { sourceSize } = compiled;

  const run = (fn: ConvFn, src: DataView | Uint8Array, dst: DataView | Uint8Array, srcOffset: number, dstOffset: number) => {
    const sv = toView(src);
    const dv = toView(dst);
    if (boundsCheck) {
      checkRange("source", sv, srcOffset, sourceSize);
      checkRange("destination", dv, dstOffset, dest.size);
    }
    fn(sv, srcOffset, dv, dstOffset);
  };

  return {
    dest,
    sourceSize,
    apply(src, dst, srcOffset = 0, dstOffset = 0) {
      run(compiled.apply, src, dst, srcOffset, dstOffset);
    },
    convert(src, srcOffset = 0) {
      const out = alloc(dest);
      run(compiled.strict, src, out, srcOffset, 0);
      return dest.read(out, 0, littleEndian);
    },
  };
}

/**
 * Build a converter from values described by `desc` into `dest`.
 * Throws ConversionError when no converter exists for the pair.
 */
export function into<T>(dest: DestType<T>, desc: TypeDesc, options: BuildOptions = {}): Converter<T> {
  const config = resolveConfig(options);
  const trace = options.trace ?? nullSink;
  const ctx: BuildContext = { config, trace, path: [], build: buildConv };
  const start = Date.now();

  let compiled: Compiled;
  try {
    compiled = compile(dest, desc, ctx);
  } catch (e) {
    if (isConversionError(e)) {
      trace.emit({
        tag: "E_BuildFailed",
        dest: dest.name,
        source: showDesc(desc),
        reason: e.reason,
        message: e.message,
      });
    }
    throw e;
  }

  trace.emit({ tag: "E_ConverterBuilt", dest: dest.name, source: showDesc(desc), durationMs: Date.now() - start });
  return makeConverter(dest, compiled, config);
}

/**
 * Like `into`, but a build failure comes back as a Fail outcome.
 */
export function tryInto<T>(dest: DestType<T>, desc: TypeDesc, options: BuildOptions = {}): Outcome<Converter<T>> {
  return attempt(() => into(dest, desc, options));
}
