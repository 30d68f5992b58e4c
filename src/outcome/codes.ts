import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0101: { code: "E0101", severity: "error", category: "Parse", template: "Malformed {kind} instruction: {detail}" },
  E0102: { code: "E0102", severity: "error", category: "Parse", template: "Invalid curve point '{point}'" },
  E0103: { code: "E0103", severity: "error", category: "Syntax", template: "Compiler returned an empty plan" },
  E0104: { code: "E0104", severity: "error", category: "Syntax", template: "DSL output is empty" },
  E0105: { code: "E0105", severity: "error", category: "Syntax", template: "Invalid JSON record: {reason}" },

  W0101: { code: "W0101", severity: "warning", category: "Parse", template: "Unrecognized instruction: {text}..." },
  W0102: { code: "W0102", severity: "warning", category: "Compile", template: "Unknown object type '{type}' passed through" },
  W0103: { code: "W0103", severity: "warning", category: "Compile", template: "Unknown reference slot '{slot}' passed through" },
  W0104: { code: "W0104", severity: "warning", category: "Compile", template: "Unknown action type '{action}', defaulting to Play" },
  W0105: { code: "W0105", severity: "warning", category: "Parse", template: "Trailing text ignored: {text}" },

  E0201: { code: "E0201", severity: "error", category: "Semantic", template: "Invalid reference type '{slot}'" },
  W0201: { code: "W0201", severity: "warning", category: "Semantic", template: "Non-standard type '{type}', the compiler will try to correct it" },
  W0202: { code: "W0202", severity: "warning", category: "Semantic", template: "Unusual property '{property}', may need review" },

  W0301: { code: "W0301", severity: "warning", category: "Dependency", template: "Parent '{parent}' not found in context (object: {name})" },
  W0302: { code: "W0302", severity: "warning", category: "Dependency", template: "Reference target '{target}' may not exist (object: {name})" },
  W0303: { code: "W0303", severity: "warning", category: "Dependency", template: "Switch/State '{target}' may not exist (object: {name})" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, () => String(value));
    }
  }

  const diag: Diagnostic = {
    code: def.code,
    severity: def.severity,
    message,
  };
  if (span) diag.span = span;
  if (params) diag.data = { ...params };
  return diag;
}

export function isDiagnosticCode(code: string): code is DiagnosticCode {
  return Object.prototype.hasOwnProperty.call(DIAGNOSTIC_CODES, code);
}
