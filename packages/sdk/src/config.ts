/**
 * Configuration resolution: explicit options > env vars > defaults.
 */

import { basename } from "node:path";
import { ConfigurationError } from "@triage/errors";
import { z } from "zod";
import {
  DEFAULT_APP_NAME,
  DEFAULT_ENDPOINT,
  DEFAULT_ENVIRONMENT,
  ENV_API_KEY,
  ENV_APP_NAME,
  ENV_ENABLED,
  ENV_ENDPOINT,
  ENV_ENVIRONMENT,
  ENV_TRACE_CONTENT,
} from "./constants.js";
import type { InitOptions, TriageConfig } from "./types.js";

/**
 * Zod schema for the resolved configuration.
 * Only the API key is constrained; a bad endpoint surfaces later as an export failure.
 */
export const TriageConfigSchema = z
  .object({
    apiKey: z
      .string()
      .min(
        1,
        `API key is required. Pass { apiKey } to init() or set the ${ENV_API_KEY} environment variable`,
      ),
    endpoint: z.string(),
    appName: z.string(),
    environment: z.string(),
    enabled: z.boolean(),
    traceContent: z.boolean(),
  })
  .strict();

/**
 * Parse a boolean env var.
 *
 * Returns undefined when unset or empty; otherwise true for
 * "true" / "1" / "yes" (case-insensitive) and false for anything else.
 */
export function parseEnvBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  switch (value.toLowerCase()) {
    case "true":
    case "1":
    case "yes":
      return true;
    default:
      return false;
  }
}

/** Basename of the running script, or "unknown" */
export function defaultAppName(argv: readonly string[] = process.argv): string {
  const script = argv[1];
  if (script === undefined || script === "") {
    return DEFAULT_APP_NAME;
  }
  return basename(script) || DEFAULT_APP_NAME;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Resolve and validate the SDK configuration.
 *
 * @param overrides - Explicit options; an `undefined` field does not count as set
 * @param env - Environment to read (default: process.env)
 * @throws ConfigurationError when the API key is empty after all three layers
 */
export function resolveConfig(
  overrides: InitOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): TriageConfig {
  const candidate = {
    apiKey: overrides.apiKey ?? nonEmpty(env[ENV_API_KEY]) ?? "",
    endpoint: overrides.endpoint ?? nonEmpty(env[ENV_ENDPOINT]) ?? DEFAULT_ENDPOINT,
    appName: overrides.appName ?? nonEmpty(env[ENV_APP_NAME]) ?? defaultAppName(),
    environment: overrides.environment ?? nonEmpty(env[ENV_ENVIRONMENT]) ?? DEFAULT_ENVIRONMENT,
    enabled: overrides.enabled ?? parseEnvBool(env[ENV_ENABLED]) ?? true,
    traceContent: overrides.traceContent ?? parseEnvBool(env[ENV_TRACE_CONTENT]) ?? true,
  };

  const result = TriageConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    throw new ConfigurationError(issues.map((i) => i.message).join("; "), issues);
  }

  return Object.freeze(result.data);
}
