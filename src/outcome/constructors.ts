import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import type { Span } from "../core/node";
import type { ShapeViolation } from "../hooks/shape";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/**
 * Failure for an invocation whose arguments do not fit its hook.
 * Scoped to that one invocation; the diagnostic carries its span.
 */
export function shapeViolated(violation: ShapeViolation, span?: Span): Fail {
  const macro = violation.macroName ?? "macro";
  const diagnostic = makeDiagnostic(
    "H0001",
    { macro, expected: violation.expected, received: violation.received },
    span
  );
  return fail(
    failure("shape-violation", diagnostic.message, {
      diagnostics: [diagnostic],
      context: { violation },
    }),
    { span, macroName: violation.macroName }
  );
}
