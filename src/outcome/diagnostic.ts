// src/outcome/diagnostic.ts
// Structured diagnostics shared by the compiler and the validator

export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

/** Location of a diagnostic inside DSL text (1-based line). */
export interface Span {
  line: number;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

/**
 * Flat rendering used in result lists: "Line N: message".
 */
export function formatDiagnostic(diag: Diagnostic): string {
  return diag.span ? `Line ${diag.span.line}: ${diag.message}` : diag.message;
}

export function errorsOf(diags: readonly Diagnostic[]): string[] {
  return diags.filter(d => d.severity === "error").map(formatDiagnostic);
}

export function warningsOf(diags: readonly Diagnostic[]): string[] {
  return diags.filter(d => d.severity === "warning").map(formatDiagnostic);
}

export function hasErrors(diags: readonly Diagnostic[]): boolean {
  return diags.some(d => d.severity === "error");
}
