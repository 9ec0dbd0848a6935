import { describe, it, expect } from "vitest";
import { createHookExpansionPass } from "../../src/lint/passes/hookExpansion";
import { createDefaultRunner } from "../../src/lint/runner";
import { expandSource } from "../../src/lint/expand";
import type { SourceUnit } from "../../src/lint/types";
import { nodeToString } from "../../src/core/node";
import { readForms } from "../../src/core/reader";
import { defaultRegistry } from "../../src/hooks/registry";
import type { HooksConfig } from "../../src/core/config";

function unitOf(src: string): SourceUnit {
  return { file: "case.clj", forms: readForms(src, "case.clj") };
}

function expanded(src: string, hooks: Partial<HooksConfig> = {}): string[] {
  return expandSource(src, { hooks }).unit.forms.map(nodeToString);
}

describe("hook expansion pass", () => {
  it("expands invocations nested inside replacements", () => {
    const src = '(browser.core/with-page [pg] (browser.report/step "open" (browser.report/it "x" (go pg))))';
    const result = expandSource(src);
    expect(result.unit.forms.map(nodeToString)).toEqual(["(let [pg nil] (do (do (go pg))))"]);
    expect(result.diagnostics).toEqual([]);
    expect(result.passResults.get("hooks/expand")?.metadata).toEqual({ rewritten: 3, violations: 0 });
  });

  it("expands invocations inside vectors and maps", () => {
    expect(expanded('[(browser.report/should ok?) {:k (browser.report/it "x" (a))}]'))
      .toEqual(["[(do ok?) {:k (do (a))}]"]);
  });

  it("reports a malformed invocation and keeps expanding the rest", () => {
    const src = '(browser.core/with-page [] (a)) (browser.report/it "y" (b))';
    const result = expandSource(src, { file: "case.clj" });

    expect(result.unit.forms.map(nodeToString)).toEqual(["(browser.core/with-page [] (a))", "(do (b))"]);
    expect(result.diagnostics).toHaveLength(1);
    const [diag] = result.diagnostics;
    expect(diag.code).toBe("H0001");
    expect(diag.severity).toBe("error");
    expect(diag.message).toBe(
      "Invalid browser.core/with-page call: expected a binding vector of 1 to 2, got vector of 0"
    );
    expect(diag.span).toEqual({ file: "case.clj", startLine: 1, startCol: 0, endLine: 1, endCol: 31 });
    expect(result.passResults.get("hooks/expand")?.metadata).toEqual({ rewritten: 1, violations: 1 });
  });

  it("reports a malformed call shared by a self-binding once", () => {
    const src = "(browser.api/with-page-api (browser.core/with-page [] (p)) opts [ctx] (use ctx))";
    const result = expandSource(src);

    expect(result.diagnostics.map(d => d.code)).toEqual(["H0001"]);
    expect(result.passResults.get("hooks/expand")?.metadata).toEqual({ rewritten: 1, violations: 1 });
    expect(result.unit.forms.map(nodeToString)).toEqual([
      "(let [(browser.core/with-page [] (p)) (browser.core/with-page [] (p)) opts opts ctx nil] (use ctx))",
    ]);
  });

  it("expands a self-bound call once and shares the result", () => {
    const src = '(browser.api/with-page-api (browser.report/it "x" (a)) opts [ctx] (use ctx))';
    const result = expandSource(src);

    expect(result.unit.forms.map(nodeToString)).toEqual(["(let [(do (a)) (do (a)) opts opts ctx nil] (use ctx))"]);
    expect(result.passResults.get("hooks/expand")?.metadata).toEqual({ rewritten: 2, violations: 0 });

    const [form] = result.unit.forms;
    const bindings = form.tag === "List" ? form.children[1] : undefined;
    expect(bindings?.tag).toBe("Vector");
    if (bindings?.tag !== "Vector") return;
    expect(bindings.children[0]).toBe(bindings.children[1]);
  });

  it("reports violations at the configured severity", () => {
    const result = expandSource("(browser.api/with-hooks)", { hooks: { violationSeverity: "warning" } });
    expect(result.diagnostics.map(d => [d.code, d.severity])).toEqual([["H0001", "warning"]]);
  });

  it("resolves namespace aliases", () => {
    expect(expanded('(r/it "x" (a))', { aliases: { r: "browser.report" } })).toEqual(["(do (a))"]);
  });

  it("resolves referred names", () => {
    expect(expanded('(step "x" (a))', { refers: { step: "browser.report" } })).toEqual(["(do (a))"]);
    expect(expanded('(step "x" (a))')).toEqual(['(step "x" (a))']);
  });

  it("borrows a hook through lint-as", () => {
    const hooks = { lintAs: { "my.ns/my-step": "browser.report/step" } };
    expect(expanded('(my.ns/my-step "x" (a))', hooks)).toEqual(["(do (a))"]);
  });

  it("applies lint-as after alias expansion", () => {
    const hooks = { aliases: { m: "my.ns" }, lintAs: { "my.ns/with-db": "browser.core/with-page" } };
    expect(expanded("(m/with-db [db (connect)] (q db))", hooks)).toEqual(["(let [db (connect)] (q db))"]);
  });

  it("flags lint-as targets missing from the registry", () => {
    const result = expandSource("(f)", { hooks: { lintAs: { "x/y": "browser.report/nope" } } });
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0].code).toBe("H0002");
    expect(result.diagnostics[0].message).toBe("lint-as target is not a known hook: browser.report/nope");
  });

  it("skips disabled hooks but expands inside them", () => {
    const src = '(browser.report/it "x" (browser.report/step "s" (a)))';
    const result = expandSource(src, { hooks: { disabled: ["browser.report/it"] } });

    expect(result.unit.forms.map(nodeToString)).toEqual(['(browser.report/it "x" (do (a)))']);
    expect(result.diagnostics.map(d => [d.code, d.severity, d.message])).toEqual([
      ["W0101", "info", "Hook disabled for browser.report/it"],
    ]);
  });

  it("returns the unit unchanged when nothing is hooked", () => {
    const unit = unitOf("(a (b)) [c {:d e}]");
    const result = createDefaultRunner().run(unit);
    expect(result.unit).toBe(unit);
    expect(result.passResults.get("hooks/expand")?.transformed).toBeUndefined();
  });

  it("keeps untouched sibling forms by reference", () => {
    const unit = unitOf('(a (b)) (browser.report/it "x" (c))');
    const pass = createHookExpansionPass();
    const result = pass.run(unit, defaultRegistry);
    const forms = result.transformed?.forms ?? [];
    expect(forms[0]).toBe(unit.forms[0]);
    expect(forms.map(nodeToString)).toEqual(["(a (b))", "(do (c))"]);
    expect(result.transformed?.file).toBe("case.clj");
  });

  it("logs each rewrite through the injected logger", () => {
    const messages: string[] = [];
    const pass = createHookExpansionPass({ log: msg => messages.push(msg) });
    pass.run(unitOf('(browser.report/it "x" (browser.core/with-page []))'), defaultRegistry);
    expect(messages).toEqual(["Hook rewrite", "Hook shape violation"]);
  });
});

describe("expandSource", () => {
  it("turns a reader error into a single diagnostic", () => {
    const result = expandSource("(a (b", { file: "broken.clj" });
    expect(result.unit).toEqual({ file: "broken.clj", forms: [] });
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0].code).toBe("E0002");
    expect(result.diagnostics[0].message).toBe("Unbalanced delimiter: missing closing for '('");
    expect(result.diagnostics[0].span).toEqual({ file: "broken.clj", startLine: 1, startCol: 3, endLine: 1, endCol: 4 });
    expect(result.passResults.size).toBe(0);
  });

  it("honours pass configuration", () => {
    const result = expandSource("(browser.api/with-hooks)", {
      lint: { passes: { "hooks/expand": { enabled: true, severityOverride: "info" } } },
    });
    expect(result.diagnostics.map(d => d.severity)).toEqual(["info"]);
  });
});
