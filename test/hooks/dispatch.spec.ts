import { describe, it, expect } from "vitest";
import { dispatch, invocationName } from "../../src/hooks/dispatch";
import { HookRegistry, defaultRegistry } from "../../src/hooks/registry";
import { RULES } from "../../src/hooks/rules";
import type { Node } from "../../src/core/node";
import { list, nodeToString, str, token, vector } from "../../src/core/node";
import { readForm } from "../../src/core/reader";
import { isDone, isFail } from "../../src/outcome/outcome";
import type { Outcome } from "../../src/outcome/outcome";

// Scenario registry: short names, as a host would register them after resolution
const registry = new HookRegistry();
registry.register("with-thing", RULES["single-resource"]);
registry.register("step", RULES["label-stripping"]);
registry.register("with-retry", RULES["optional-config"]);
registry.register("with-page-api", RULES["fixed-three"]);
registry.seal();

function valueOf(o: Outcome<Node>): Node {
  if (!isDone(o)) throw new Error(o.failure.message);
  return o.value;
}

function expand(src: string): string {
  return nodeToString(valueOf(dispatch(readForm(src), registry)));
}

describe("end-to-end scenarios", () => {
  it("A: resource binding becomes let", () => {
    expect(expand("(with-thing [x (foo)] (bar x))")).toBe("(let [x (foo)] (bar x))");
  });

  it("B: step keeps a lone label and drops it before a body", () => {
    expect(expand('(step "label")')).toBe('(do "label")');
    expect(expand('(step "label" (click))')).toBe("(do (click))");
  });

  it("C: retry binds its options or sequences its body", () => {
    expect(expand("(with-retry {:times 3} (go!))")).toBe("(let [_ {:times 3}] (go!))");
    expect(expand("(with-retry (go!))")).toBe("(do (go!))");
  });

  it("D: page API self-binds page and options", () => {
    expect(expand("(with-page-api pg opts [ctx] (use ctx))")).toBe("(let [pg pg opts opts ctx nil] (use ctx))");
  });
});

describe("dispatch", () => {
  it("returns an unregistered invocation unchanged", () => {
    const node = readForm("(unknown [x] (y))");
    const out = dispatch(node, registry);
    expect(isDone(out) && out.value).toBe(node);
  });

  it("returns non-invocations unchanged", () => {
    for (const node of [token("x"), str("s"), vector([]), list([]), list([str("not-a-symbol")])]) {
      const out = dispatch(node, registry);
      expect(isDone(out) && out.value).toBe(node);
    }
  });

  it("gives the replacement the invocation's metadata", () => {
    const node = readForm("(with-thing [x] (bar x))", "case.clj");
    const out = valueOf(dispatch(node, registry));
    expect(out).not.toBe(node);
    expect(out.meta).toBe(node.meta);
    expect(out.meta?.span).toEqual({ file: "case.clj", startLine: 1, startCol: 0, endLine: 1, endCol: 24 });
  });

  it("reports a shape violation with the macro name and span", () => {
    const node = readForm("(with-thing [a b c] (bar))", "case.clj");
    const out = dispatch(node, registry);
    expect(isFail(out)).toBe(true);
    if (!isFail(out)) return;
    expect(out.failure.reason).toBe("shape-violation");
    expect(out.failure.message).toBe("Invalid with-thing call: expected a binding vector of 1 to 2, got vector of 3");
    expect(out.failure.context).toEqual({
      violation: { macroName: "with-thing", expected: "a binding vector of 1 to 2", received: "vector of 3" },
    });
    const [diag] = out.failure.diagnostics;
    expect(diag.code).toBe("H0001");
    expect(diag.category).toBe("Hook");
    expect(diag.severity).toBe("error");
    expect(diag.span).toBe(node.meta?.span);
  });

  it("resolves the written name before lookup", () => {
    const node = readForm("(api/with-retry (go!))");
    const out = dispatch(node, defaultRegistry, {
      resolve: name => name.replace(/^api\//, "browser.api/"),
    });
    expect(nodeToString(valueOf(out))).toBe("(do (go!))");
  });

  it("uses the default registry", () => {
    expect(nodeToString(valueOf(dispatch(readForm("(browser.report/it \"x\" (a))"))))).toBe("(do (a))");
  });
});

describe("invocationName", () => {
  it("reads the head symbol", () => {
    expect(invocationName(readForm("(ns/m a)"))).toBe("ns/m");
    expect(invocationName(readForm("((f) a)"))).toBeUndefined();
    expect(invocationName(readForm("(:kw m)"))).toBeUndefined();
    expect(invocationName(readForm("[m a]"))).toBeUndefined();
  });
});
