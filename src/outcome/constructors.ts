import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(reason: FailureReason, message: string, meta: OutcomeMeta = {}): Fail {
  return fail(failure(reason, message), meta);
}

// ─────────────────────────────────────────────────────────────────
// Build-time failures
// ─────────────────────────────────────────────────────────────────

export function kindMismatch(expected: string, actual: string, path: readonly string[] = []): Failure {
  return failure("kind-mismatch", `Can't convert ${actual} to ${expected} due to kind mismatch`, {
    diagnostics: [makeDiagnostic("C0100", { expected, actual }, [...path])],
    context: { expected, actual },
  });
}

export function noConversionPath(source: string, dest: string, path: readonly string[] = []): Failure {
  return failure("no-conversion-path", `Can't convert from ${source} to ${dest}`, {
    diagnostics: [makeDiagnostic("C0101", { source, dest }, [...path])],
    context: { source, dest },
  });
}

export function invalidLength(len: string, path: readonly string[] = []): Failure {
  return failure("invalid-length", `Invalid type description due to non-size array length: ${len}`, {
    diagnostics: [makeDiagnostic("C0102", { len }, [...path])],
    context: { len },
  });
}

export function lengthMismatch(expected: number, actual: number, path: readonly string[] = []): Failure {
  return failure("length-mismatch", `Can't convert array of ${actual} elements to array of ${expected} due to length mismatch`, {
    diagnostics: [makeDiagnostic("C0103", { expected, actual }, [...path])],
    context: { expected, actual },
  });
}

export function missingField(field: string, path: readonly string[] = []): Failure {
  return failure("missing-field", `The field '${field}' is not defined`, {
    diagnostics: [makeDiagnostic("C0104", { field }, [...path])],
    context: { field },
  });
}

export function invalidLayout(field: string, size: number, path: readonly string[] = []): Failure {
  return failure("invalid-layout", `The destination slot '${field}' lies outside its ${size}-byte parent`, {
    diagnostics: [makeDiagnostic("C0105", { field, size }, [...path])],
    context: { field, size },
  });
}

// ─────────────────────────────────────────────────────────────────
// Apply-time failures
// ─────────────────────────────────────────────────────────────────

export function unknownTag(tag: number): Failure {
  return failure("unknown-tag", `No constructor is defined for source tag ${tag}`, {
    diagnostics: [makeDiagnostic("C0200", { tag })],
    context: { tag },
  });
}

export function outOfBounds(side: "source" | "destination", start: number, end: number, length: number): Failure {
  return failure("out-of-bounds", `The ${side} range [${start}, ${end}) exceeds its ${length}-byte buffer`, {
    diagnostics: [makeDiagnostic("C0201", { side, start, end, length })],
    context: { side, start, end, length },
  });
}

// ─────────────────────────────────────────────────────────────────
// Input failures
// ─────────────────────────────────────────────────────────────────

export function invalidDescriptor(detail: string): Failure {
  return failure("invalid-descriptor", `Invalid type descriptor: ${detail}`, {
    diagnostics: [makeDiagnostic("C0300", { detail })],
  });
}

export function invalidConfig(detail: string): Failure {
  return failure("invalid-config", `Invalid configuration: ${detail}`, {
    diagnostics: [makeDiagnostic("C0301", { detail })],
  });
}
