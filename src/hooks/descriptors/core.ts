import type { HookDescriptor } from "../types";

const resource = (name: string, summary: string, input: string, output: string): HookDescriptor => ({
  id: `browser.core/${name}`,
  family: "single-resource",
  doc: { summary, examples: [{ input, output }] },
});

export const coreDescriptors: HookDescriptor[] = [
  {
    id: "browser.core/with-playwright",
    family: "single-resource",
    doc: {
      summary: "Binds a driver instance and closes it on exit.",
      detail: "A one-element vector creates the driver internally; the symbol is bound to nil for analysis.",
      examples: [
        {
          input: "(with-playwright [pw] (launch-chromium pw))",
          output: "(let [pw nil] (launch-chromium pw))",
          description: "Driver created by the macro",
        },
        {
          input: "(with-playwright [pw (create)] (launch-chromium pw))",
          output: "(let [pw (create)] (launch-chromium pw))",
        },
      ],
    },
  },
  resource(
    "with-browser",
    "Binds a launched browser and closes it on exit.",
    "(with-browser [browser (launch-chromium pw)] (new-page browser))",
    "(let [browser (launch-chromium pw)] (new-page browser))"
  ),
  resource(
    "with-context",
    "Binds a browser context and closes it on exit.",
    "(with-context [ctx (new-context browser)] (new-page-from-context ctx))",
    "(let [ctx (new-context browser)] (new-page-from-context ctx))"
  ),
  resource(
    "with-page",
    "Binds a page and closes it on exit.",
    "(with-page [pg (new-page browser)] (navigate pg \"https://example.org\"))",
    "(let [pg (new-page browser)] (navigate pg \"https://example.org\"))"
  ),
  {
    id: "browser.core/with-testing-page",
    family: "optional-config-symbol",
    doc: {
      summary: "Driver, browser, context and page in one form, with optional options map.",
      examples: [
        {
          input: "(with-testing-page [pg] (navigate pg url))",
          output: "(let [_ {} pg nil] (navigate pg url))",
          description: "Options omitted",
        },
        {
          input: "(with-testing-page {:device :iphone-14} [pg] (navigate pg url))",
          output: "(let [_ {:device :iphone-14} pg nil] (navigate pg url))",
        },
      ],
    },
  },
];
