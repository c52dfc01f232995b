/**
 * Type guards for code-level discrimination.
 */

import type { TriageError } from "./base.js";
import type { ErrorCode } from "./catalog.js";
import { ConfigurationError, ShutdownTimeoutError } from "./sdk.js";

/** Check if an error is a ConfigurationError (missing API key) */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

/** Check if an error is a ShutdownTimeoutError (flush deadline exceeded) */
export function isShutdownTimeoutError(error: unknown): error is ShutdownTimeoutError {
  return error instanceof ShutdownTimeoutError;
}

/**
 * Check if a TriageError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: TriageError,
  code: C,
): error is TriageError & { readonly code: C } {
  return error.code === code;
}

/**
 * Check if an error represents an expected condition.
 * Returns false for values that carry no `isExpected` flag.
 */
export function isExpectedError(error: unknown): boolean {
  if (error !== null && typeof error === "object" && "isExpected" in error) {
    return error.isExpected === true;
  }
  return false;
}
