import { describe, it, expect, beforeEach } from "vitest";
import {
  CATALOG,
  HookRegistry,
  defaultRegistry,
  localNameOf,
  namespaceOf,
} from "../../src/hooks/registry";
import { RULES } from "../../src/hooks/rules";
import type { HookDescriptor } from "../../src/hooks/types";

function makeDescriptor(overrides: Partial<HookDescriptor> = {}): HookDescriptor {
  return {
    id: "test.ns/with-thing",
    family: "single-resource",
    doc: { summary: "Test hook" },
    ...overrides,
  };
}

describe("HookRegistry", () => {
  let registry: HookRegistry;

  beforeEach(() => {
    registry = new HookRegistry();
  });

  describe("Happy Path", () => {
    it("registers and looks up rules by name", () => {
      registry.register("with-thing", RULES["single-resource"]);
      expect(registry.lookup("with-thing")).toBe(RULES["single-resource"]);
      expect(registry.has("with-thing")).toBe(true);
      expect(registry.names()).toEqual(["with-thing"]);
    });

    it("resolves a descriptor's rule from its family", () => {
      registry.registerDescriptor(makeDescriptor({ family: "body-only" }));
      expect(registry.lookup("test.ns/with-thing")).toBe(RULES["body-only"]);
      expect(registry.getDescriptor("test.ns/with-thing")?.doc.summary).toBe("Test hook");
    });

    it("queries by family and namespace", () => {
      registry.registerDescriptor(makeDescriptor());
      registry.registerDescriptor(makeDescriptor({ id: "other.ns/step", family: "label-stripping" }));
      expect(registry.getByFamily("label-stripping").map(d => d.id)).toEqual(["other.ns/step"]);
      expect(registry.getByFamily("flat-pairs")).toEqual([]);
      expect(registry.getByNamespace("test.ns").map(d => d.id)).toEqual(["test.ns/with-thing"]);
    });

    it("searches ids and docs", () => {
      registry.registerDescriptor(makeDescriptor({ doc: { summary: "Binds a page", detail: "closes on exit" } }));
      expect(registry.search("PAGE")).toHaveLength(1);
      expect(registry.search("exit")).toHaveLength(1);
      expect(registry.search("nothing-like-this")).toHaveLength(0);
    });

    it("serializes descriptors", () => {
      const desc = makeDescriptor();
      registry.registerDescriptor(desc);
      expect(registry.toJSON()).toEqual({ "test.ns/with-thing": desc });
    });
  });

  describe("Error Handling", () => {
    it("rejects duplicate names", () => {
      registry.register("m", RULES["body-only"]);
      expect(() => registry.register("m", RULES["body-only"])).toThrow("Hook already registered: m");
    });

    it("rejects registration once sealed", () => {
      registry.seal();
      expect(registry.isSealed).toBe(true);
      expect(() => registry.register("m", RULES["body-only"])).toThrow("Hook registry is sealed; cannot register m");
      expect(registry.lookup("m")).toBeUndefined();
    });

    it("reports unqualified ids and missing summaries", () => {
      registry.registerDescriptor(makeDescriptor({ id: "bare", doc: { summary: "" } }));
      expect(registry.validate()).toEqual({
        valid: false,
        errors: ["bare: id must be namespace-qualified", "bare: missing doc.summary"],
      });
    });
  });
});

describe("namespaceOf / localNameOf", () => {
  it("splits qualified names", () => {
    expect(namespaceOf("browser.api/with-retry")).toBe("browser.api");
    expect(localNameOf("browser.api/with-retry")).toBe("with-retry");
  });

  it("leaves unqualified names and the division symbol alone", () => {
    expect(namespaceOf("step")).toBeUndefined();
    expect(namespaceOf("/")).toBeUndefined();
    expect(localNameOf("/")).toBe("/");
  });
});

describe("defaultRegistry", () => {
  it("is sealed and holds the whole catalog", () => {
    expect(defaultRegistry.isSealed).toBe(true);
    expect(defaultRegistry.getAll()).toHaveLength(CATALOG.length);
    expect(CATALOG).toHaveLength(27);
    expect(defaultRegistry.validate()).toEqual({ valid: true, errors: [] });
  });

  it("maps macros to their families", () => {
    expect(defaultRegistry.lookup("browser.core/with-page")).toBe(RULES["single-resource"]);
    expect(defaultRegistry.lookup("browser.api/with-api-contexts")).toBe(RULES["flat-pairs"]);
    expect(defaultRegistry.lookup("browser.api/with-page-api")).toBe(RULES["fixed-three"]);
    expect(defaultRegistry.lookup("browser.report/around")).toBe(RULES["parameter-capture"]);
    expect(defaultRegistry.lookup("with-page")).toBeUndefined();
  });

  it("groups by namespace", () => {
    expect(defaultRegistry.getByNamespace("browser.core")).toHaveLength(5);
    expect(defaultRegistry.getByNamespace("browser.api")).toHaveLength(6);
    expect(defaultRegistry.getByNamespace("browser.report")).toHaveLength(16);
  });
});
