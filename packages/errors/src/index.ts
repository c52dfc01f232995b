/**
 * @triage/errors
 *
 * Error taxonomy for the Triage SDK. Each error carries a `.code` from the
 * catalog; use `error.code === "XXX"` for fine-grained matching or
 * `instanceof` for category matching.
 */

export const PACKAGE_NAME = "@triage/errors" as const;

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isTriageError, TriageError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export { getCatalogEntry, getErrorCodesByDomain, getErrorMessage, isValidErrorCode } from "./utils.js";

export { hasCode, isConfigurationError, isExpectedError, isShutdownTimeoutError } from "./guards.js";

export type { ValidationIssue } from "./types.js";

// ============================================================================
// SDK ERRORS
// ============================================================================

export { ConfigurationError, ShutdownTimeoutError, TriageSdkError } from "./sdk.js";
