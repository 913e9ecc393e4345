export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Location inside the destination type, e.g. ["pos", "x"] */
  path?: string[];
  data?: Record<string, unknown>;
}
