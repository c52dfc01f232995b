/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code the SDK can raise, with its domain and behavioral base
 * type. Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE).
 */

/**
 * The behavioral base types error codes map to.
 */
export type BaseErrorType = "ValidationError" | "TimeoutError";

export const ERROR_CATALOG = {
  // ============================================================================
  // SDK ERRORS - Initialization and shutdown of the tracing pipeline
  // ============================================================================
  TRIAGE_CONFIGURATION_INVALID: {
    domain: "sdk",
    baseType: "ValidationError",
    isExpected: true,
    title: "Invalid SDK configuration",
    description: "The resolved configuration is missing a required field",
  },
  TRIAGE_SHUTDOWN_TIMEOUT: {
    domain: "sdk",
    baseType: "TimeoutError",
    isExpected: false,
    title: "Shutdown timed out",
    description: "Flushing pending spans exceeded the shutdown deadline",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
