import type { Span } from "../core/node";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed expression: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unbalanced delimiter: {detail}" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "Invalid string literal" },

  H0001: { code: "H0001", severity: "error", category: "Hook", template: "Invalid {macro} call: expected {expected}, got {received}" },
  H0002: { code: "H0002", severity: "error", category: "Hook", template: "lint-as target is not a known hook: {target}" },

  W0101: { code: "W0101", severity: "info", category: "Hook", template: "Hook disabled for {macro}" },
} satisfies Record<string, DiagCodeDef>;

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
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    category: def.category,
    message,
    span,
    data: params,
  };
}
