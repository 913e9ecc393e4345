// src/index.ts
// structconv - Public API
//
// Build converters from runtime-described bytes into statically typed layouts:
//
//   const Point = t.record({ x: t.int64, y: t.double });
//   const conv = into(Point, structOf([["x", prim("int")], ["y", prim("float")]]));
//   const p = conv.convert(bytes); // { x: bigint, y: number }

// ═══════════════════════════════════════════════════════════════════════════════
// BUILD & APPLY
// ═══════════════════════════════════════════════════════════════════════════════

export { into, into as build, tryInto, buildConv, type BuildOptions, type Converter } from "./convert/into";
export { ConverterCache } from "./convert/cache";
export { planRecord, type FieldConv } from "./convert/record";
export { planVariant, type VariantPlan, type CtorConv } from "./convert/variant";
export type { ConvFn, BuildContext } from "./convert/types";

// ═══════════════════════════════════════════════════════════════════════════════
// SOURCE TYPE DESCRIPTORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  prim,
  nat,
  farr,
  struct,
  structOf,
  variant,
  isPrimName,
  PRIM_NAMES,
  type TypeDesc,
  type DescTag,
  type Prim,
  type PrimName,
  type Nat,
  type FArr,
  type Struct,
  type StructField,
  type Variant,
  type VariantCtor,
} from "./desc/desc";
export { sizeOf, alignOf, alignTo, variantPayloadOffset, TAG_SIZE } from "./desc/layout";
export { showDesc } from "./desc/show";
export { encodeDesc, decodeDesc, toDesc } from "./desc/codec";

// ═══════════════════════════════════════════════════════════════════════════════
// DESTINATION TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export * as t from "./dest/index";
export type { DestType, InferDest } from "./dest/types";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export { ConversionError, isConversionError, attempt } from "./outcome/errors";
export type { Failure, FailureReason } from "./outcome/failure";
export { allDiagnostics, rootCause, isFailureReason } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export type { Outcome, Done, Fail } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export { match, mapOutcome, flatMapOutcome, unwrap, unwrapOr } from "./outcome/matchers";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION & TRACING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./config/index";
export { nullSink, memorySink, type TraceSink, type TraceEvent, type MemorySink } from "./ports/trace";
