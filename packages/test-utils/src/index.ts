export const PACKAGE_NAME = "@triage/test-utils" as const;

export {
  attributeKeysWithPrefix,
  attributeOf,
  createTestTracing,
  type TestTracing,
} from "./tracing.js";
