import type { Diagnostic } from "./diagnostic";

// Malformed macro calls are the only failure the rewrite core reports
export type FailureReason = "shape-violation";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
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
    context: opts?.context,
  };
}
