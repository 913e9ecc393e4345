import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  C0100: { code: "C0100", severity: "error", category: "Build", template: "Kind mismatch: expected {expected}, got {actual}" },
  C0101: { code: "C0101", severity: "error", category: "Build", template: "No conversion from {source} to {dest}" },
  C0102: { code: "C0102", severity: "error", category: "Build", template: "Array length is not a size: {len}" },
  C0103: { code: "C0103", severity: "error", category: "Build", template: "Array length mismatch: expected {expected}, got {actual}" },
  C0104: { code: "C0104", severity: "error", category: "Build", template: "Field not defined in source: {field}" },
  C0105: { code: "C0105", severity: "error", category: "Build", template: "Destination slot {field} overruns its parent of {size} bytes" },

  C0200: { code: "C0200", severity: "error", category: "Apply", template: "Unknown source tag: {tag}" },
  C0201: { code: "C0201", severity: "error", category: "Apply", template: "{side} range [{start}, {end}) exceeds buffer of {length} bytes" },

  C0300: { code: "C0300", severity: "error", category: "Input", template: "Invalid type descriptor: {detail}" },
  C0301: { code: "C0301", severity: "error", category: "Input", template: "Invalid configuration: {detail}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  path?: string[]
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    path,
    data: params,
  };
}
