import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "kind-mismatch"
  | "no-conversion-path"
  | "invalid-length"
  | "length-mismatch"
  | "missing-field"
  | "unknown-tag"
  | "invalid-layout"
  | "out-of-bounds"
  | "invalid-descriptor"
  | "invalid-config";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
    cause: opts?.cause,
  };
}

/**
 * Re-label a failure raised by a nested build with the enclosing location.
 * The reason is kept so callers can still match on the root cause.
 */
export function wrapFailure(
  inner: Failure,
  message: string,
  context?: Record<string, unknown>
): Failure {
  return {
    ...inner,
    message,
    context: { ...inner.context, ...context },
    cause: inner,
  };
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}

export function rootCause(f: Failure): Failure {
  return f.cause ? rootCause(f.cause) : f;
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}
