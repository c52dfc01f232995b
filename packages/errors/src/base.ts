/**
 * TriageError: root of the SDK error hierarchy.
 *
 * Concrete errors bind a catalog code and copy `domain` / `isExpected`
 * from the catalog entry in their constructor.
 */

import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Serialized shape produced by `TriageError.toJSON()`.
 */
export interface ErrorJSON {
  _tag: BaseErrorType;
  name: string;
  code: ErrorCode;
  message: string;
  domain: ErrorDomain;
  isExpected: boolean;
  metadata?: Record<string, string> | undefined;
  timestamp: string;
}

export abstract class TriageError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;

  readonly metadata: Record<string, string> | undefined;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>) {
    super(message);
    this.name = new.target.name;
    this.metadata = metadata;
    this.timestamp = new Date();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      isExpected: this.isExpected,
      metadata: this.metadata,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/** Check if a value is any TriageError */
export function isTriageError(error: unknown): error is TriageError {
  return error instanceof TriageError;
}

/** Check if a value is a native Error (TriageError included) */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
