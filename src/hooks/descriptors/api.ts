import type { HookDescriptor } from "../types";

export const apiDescriptors: HookDescriptor[] = [
  {
    id: "browser.api/with-api-context",
    family: "single-resource",
    doc: {
      summary: "Binds a single API request context and disposes it on exit.",
      examples: [
        {
          input: "(with-api-context [ctx (new-api-context req {:base-url \"https://api.example.org\"})] (api-get ctx \"/users\"))",
          output: "(let [ctx (new-api-context req {:base-url \"https://api.example.org\"})] (api-get ctx \"/users\"))",
        },
      ],
    },
  },
  {
    id: "browser.api/with-api-contexts",
    family: "flat-pairs",
    doc: {
      summary: "Binds several API request contexts as flat pairs, like with-open.",
      examples: [
        {
          input: "(with-api-contexts [users (new-api-context req) billing (new-api-context req)] (api-get users \"/me\"))",
          output: "(let [users (new-api-context req) billing (new-api-context req)] (api-get users \"/me\"))",
        },
      ],
    },
  },
  {
    id: "browser.api/with-hooks",
    family: "config-map",
    doc: {
      summary: "Installs request/response hooks for the body.",
      detail: "The hooks map is an expression, not a binding vector.",
      examples: [
        {
          input: "(with-hooks {:on-request log-request} (api-get ctx \"/health\"))",
          output: "(let [_ {:on-request log-request}] (api-get ctx \"/health\"))",
        },
      ],
    },
  },
  {
    id: "browser.api/with-retry",
    family: "optional-config",
    doc: {
      summary: "Runs the body with retry logic; the first argument may be an options map or the sole body form.",
      examples: [
        {
          input: "(with-retry (api-get ctx \"/flaky\"))",
          output: "(do (api-get ctx \"/flaky\"))",
        },
        {
          input: "(with-retry {:max-attempts 5} (api-post ctx \"/jobs\"))",
          output: "(let [_ {:max-attempts 5}] (api-post ctx \"/jobs\"))",
        },
      ],
    },
  },
  {
    id: "browser.api/with-testing-api",
    family: "optional-config-symbol",
    doc: {
      summary: "Binds a ready API context, with optional options map.",
      examples: [
        {
          input: "(with-testing-api [ctx] (api-get ctx \"/users\"))",
          output: "(let [_ {} ctx nil] (api-get ctx \"/users\"))",
        },
        {
          input: "(with-testing-api {:base-url base} [ctx] (api-get ctx \"/users\"))",
          output: "(let [_ {:base-url base} ctx nil] (api-get ctx \"/users\"))",
        },
      ],
    },
  },
  {
    id: "browser.api/with-page-api",
    family: "fixed-three",
    doc: {
      summary: "Binds an API context that shares a page's cookies.",
      examples: [
        {
          input: "(with-page-api pg opts [ctx] (api-get ctx \"/users\"))",
          output: "(let [pg pg opts opts ctx nil] (api-get ctx \"/users\"))",
        },
      ],
    },
  },
];
