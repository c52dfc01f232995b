/**
 * Shared shapes carried by SDK errors.
 */

/**
 * Structured validation issue (field-level detail)
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
}
