import type { HookDescriptor, HookFamily } from "../types";

function alias(name: string, family: HookFamily, summary: string, input: string, output: string): HookDescriptor {
  return {
    id: `browser.report/${name}`,
    family,
    doc: { summary, examples: [{ input, output }] },
  };
}

export const reportDescriptors: HookDescriptor[] = [
  // === Report steps ===
  {
    id: "browser.report/step",
    family: "label-stripping",
    doc: {
      summary: "Records a report step.",
      detail: "A lone label is a marker step and is analyzed; with a body the label is dropped.",
      examples: [
        { input: "(step \"Open login page\")", output: "(do \"Open login page\")", description: "Marker step" },
        { input: "(step \"Log in\" (click submit))", output: "(do (click submit))" },
      ],
    },
  },
  alias("ui-step", "doc-skipping-body", "Records a UI step.", "(ui-step \"Fill form\" (fill input \"x\"))", "(do (fill input \"x\"))"),
  alias("api-step", "doc-skipping-body", "Records an API step.", "(api-step \"Create user\" (api-post ctx \"/users\"))", "(do (api-post ctx \"/users\"))"),

  // === Test definition ===
  {
    id: "browser.report/defdescribe",
    family: "doc-skipping-definition",
    doc: {
      summary: "Defines a named test suite var.",
      examples: [
        {
          input: "(defdescribe login-test \"Login flow\" (it \"works\" (expect ok?)))",
          output: "(do (def login-test nil) (it \"works\" (expect ok?)))",
        },
      ],
    },
  },
  alias(
    "describe",
    "doc-skipping-body",
    "Groups test cases; the attribute map is kept.",
    "(describe \"login\" {:context [fixture]} (it \"works\" (expect ok?)))",
    "(do {:context [fixture]} (it \"works\" (expect ok?)))"
  ),
  alias("context", "doc-skipping-body", "Alias of describe.", "(context \"when logged out\" (it \"redirects\" (expect ok?)))", "(do (it \"redirects\" (expect ok?)))"),
  alias("it", "doc-skipping-body", "Defines a test case.", "(it \"loads\" (expect (visible? pg)))", "(do (expect (visible? pg)))"),
  alias("specify", "doc-skipping-body", "Alias of it.", "(specify \"loads\" (expect ok?))", "(do (expect ok?))"),

  // === Assertions ===
  alias("expect", "body-only", "Asserts an expression, with optional message.", "(expect (= 1 n) \"n is one\")", "(do (= 1 n) \"n is one\")"),
  alias("should", "body-only", "Alias of expect.", "(should (pos? n))", "(do (pos? n))"),
  alias("expect-it", "doc-skipping-body", "Test case holding a single assertion.", "(expect-it \"is positive\" (pos? n))", "(do (pos? n))"),

  // === Hooks ===
  alias("before", "body-only", "Runs once before the suite.", "(before (start-server!))", "(do (start-server!))"),
  alias("after", "body-only", "Runs once after the suite.", "(after (stop-server!))", "(do (stop-server!))"),
  alias("before-each", "body-only", "Runs before each case.", "(before-each (reset-db!))", "(do (reset-db!))"),
  alias("after-each", "body-only", "Runs after each case.", "(after-each (clear-cookies! ctx))", "(do (clear-cookies! ctx))"),
  alias("around", "parameter-capture", "Wraps each case; the parameter is the case thunk.", "(around [f] (with-server (f)))", "(fn [f] (with-server (f)))"),
];
