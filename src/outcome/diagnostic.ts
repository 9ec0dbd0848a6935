import type { Span } from "../core/node";

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  /** "Hook" marks tool/configuration diagnostics, distinct from lint findings. */
  category?: string;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}
