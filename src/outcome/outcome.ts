import type { Failure } from "./failure";
import type { Span } from "../core/node";

export interface OutcomeMeta {
  span?: Span;
  /** Fully-qualified macro name the outcome was produced for. */
  macroName?: string;
}

export interface Done<A> {
  readonly tag: "Done";
  readonly value: A;
  readonly meta: OutcomeMeta;
}

export interface Fail {
  readonly tag: "Fail";
  readonly failure: Failure;
  readonly meta: OutcomeMeta;
}

export type Outcome<A> = Done<A> | Fail;

export function isDone<A>(o: Outcome<A>): o is Done<A> {
  return o.tag === "Done";
}

export function isFail<A>(o: Outcome<A>): o is Fail {
  return o.tag === "Fail";
}
