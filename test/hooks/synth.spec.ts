import { describe, it, expect } from "vitest";
import {
  anonymousSymbol,
  emptyMapPlaceholder,
  nilPlaceholder,
  synthesizeBinding,
  synthesizeDeclaration,
  synthesizeFunctionLiteral,
  synthesizeSequence,
} from "../../src/hooks/synth";
import { list, nodeToString, token, vector } from "../../src/core/node";

describe("placeholders", () => {
  it("prints as nil, _ and {}", () => {
    expect(nodeToString(nilPlaceholder())).toBe("nil");
    expect(nodeToString(anonymousSymbol())).toBe("_");
    expect(nodeToString(emptyMapPlaceholder())).toBe("{}");
  });
});

describe("synthesizers", () => {
  const body = list([token("bar"), token("x")]);

  it("builds a binding form", () => {
    const init = list([token("foo")]);
    const out = synthesizeBinding([{ target: token("x"), init }], [body]);
    expect(nodeToString(out)).toBe("(let [x (foo)] (bar x))");
    expect(out.children[2]).toBe(body);
    const bindings = out.children[1];
    expect(bindings.tag === "Vector" && bindings.children[1]).toBe(init);
  });

  it("builds a sequencing block", () => {
    expect(nodeToString(synthesizeSequence([]))).toBe("(do)");
    expect(synthesizeSequence([body]).children[1]).toBe(body);
  });

  it("builds a function literal reusing the parameter vector", () => {
    const params = vector([token("f")]);
    const out = synthesizeFunctionLiteral(params, [body]);
    expect(nodeToString(out)).toBe("(fn [f] (bar x))");
    expect(out.children[1]).toBe(params);
  });

  it("builds a declaration stub followed by the body", () => {
    const name = token("suite");
    const out = synthesizeDeclaration(name, [body]);
    expect(nodeToString(out)).toBe("(do (def suite nil) (bar x))");
  });
});
