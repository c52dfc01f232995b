/**
 * SDK errors: tracing pipeline lifecycle
 *
 * Abstract base: TriageSdkError
 * Concrete:
 *   - ConfigurationError   (TRIAGE_CONFIGURATION_INVALID)
 *   - ShutdownTimeoutError (TRIAGE_SHUTDOWN_TIMEOUT)
 */

import { TriageError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";
import type { ValidationIssue } from "./types.js";

// ---------------------------------------------------------------------------
// Abstract Base
// ---------------------------------------------------------------------------

export abstract class TriageSdkError extends TriageError {}

// ---------------------------------------------------------------------------
// Concrete Errors
// ---------------------------------------------------------------------------

/**
 * Raised by `init()` when the resolved configuration cannot start a pipeline.
 * Never retried internally.
 */
export class ConfigurationError extends TriageSdkError {
  readonly _tag = "ValidationError" as const;
  readonly code = "TRIAGE_CONFIGURATION_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly issues: readonly ValidationIssue[];

  constructor(message: string, issues: readonly ValidationIssue[] = []) {
    super(message, issues.length > 0 ? { fields: issues.map((i) => i.field).join(",") } : undefined);
    const entry = ERROR_CATALOG.TRIAGE_CONFIGURATION_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.issues = issues;
  }
}

export class ShutdownTimeoutError extends TriageSdkError {
  readonly _tag = "TimeoutError" as const;
  readonly code = "TRIAGE_SHUTDOWN_TIMEOUT" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Span flush did not finish within ${timeoutMs}ms`, { timeoutMs: String(timeoutMs) });
    const entry = ERROR_CATALOG.TRIAGE_SHUTDOWN_TIMEOUT;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.timeoutMs = timeoutMs;
  }
}
