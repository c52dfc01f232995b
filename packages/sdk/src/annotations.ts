/**
 * AnnotationContext: the immutable bag of request-scoped metadata and its
 * projection onto `triage.*` span attributes.
 */

import type { AttributeValue } from "@opentelemetry/api";
import {
  ATTR_CHUNK_ACLS,
  ATTR_INPUT_RAW,
  ATTR_INPUT_SANITIZED,
  ATTR_SESSION_HISTORY_HASH,
  ATTR_SESSION_ID,
  ATTR_SESSION_TURN_NUMBER,
  ATTR_TEMPLATE_ID,
  ATTR_TEMPLATE_VERSION,
  ATTR_TENANT_ID,
  ATTR_TENANT_NAME,
  ATTR_USER_ID,
  ATTR_USER_ROLE,
} from "./constants.js";

/**
 * Request/user/tenant/session/input/template/ACL state for one call chain.
 * Absent or empty fields are "not set". `sessionTurnNumber` 0 is set.
 */
export interface AnnotationContext {
  readonly userId?: string;
  readonly userRole?: string;
  readonly tenantId?: string;
  readonly tenantName?: string;
  readonly sessionId?: string;
  readonly sessionTurnNumber?: number;
  readonly sessionHistoryHash?: string;
  readonly inputRaw?: string;
  readonly inputSanitized?: string;
  readonly templateId?: string;
  readonly templateVersion?: string;
  /** JSON-serialized chunk ACL list */
  readonly chunkAcls?: string;
}

/** Access-control metadata for one retrieved chunk */
export type ChunkAcl = Readonly<Record<string, unknown>>;

export type AnnotationAttribute = readonly [key: string, value: AttributeValue];

export const EMPTY_ANNOTATIONS: AnnotationContext = Object.freeze({});

type StringField = Exclude<keyof AnnotationContext, "sessionTurnNumber">;

/** Projection table, in emission order */
const STRING_FIELDS: ReadonlyArray<readonly [StringField, string]> = [
  ["userId", ATTR_USER_ID],
  ["userRole", ATTR_USER_ROLE],
  ["tenantId", ATTR_TENANT_ID],
  ["tenantName", ATTR_TENANT_NAME],
  ["sessionId", ATTR_SESSION_ID],
];

const TRAILING_STRING_FIELDS: ReadonlyArray<readonly [StringField, string]> = [
  ["sessionHistoryHash", ATTR_SESSION_HISTORY_HASH],
  ["inputRaw", ATTR_INPUT_RAW],
  ["inputSanitized", ATTR_INPUT_SANITIZED],
  ["templateId", ATTR_TEMPLATE_ID],
  ["templateVersion", ATTR_TEMPLATE_VERSION],
  ["chunkAcls", ATTR_CHUNK_ACLS],
];

/**
 * Derive a new context from `base`, overwriting only the fields that carry a
 * value in `update`. Neither input is modified.
 */
export function extendAnnotations(
  base: AnnotationContext,
  update: AnnotationContext,
): AnnotationContext {
  const next: { -readonly [K in keyof AnnotationContext]: AnnotationContext[K] } = { ...base };
  for (const [key] of [...STRING_FIELDS, ...TRAILING_STRING_FIELDS]) {
    const value = update[key];
    if (value !== undefined) {
      next[key] = value;
    }
  }
  if (update.sessionTurnNumber !== undefined) {
    next.sessionTurnNumber = update.sessionTurnNumber;
  }
  return Object.freeze(next);
}

/**
 * Map a context to its span attributes.
 *
 * Emits one pair per set field in a fixed order; unset fields emit nothing.
 * A turn number that is not an integer counts as unset.
 */
export function projectAnnotations(annotations: AnnotationContext): AnnotationAttribute[] {
  const attributes: AnnotationAttribute[] = [];

  for (const [field, key] of STRING_FIELDS) {
    const value = annotations[field];
    if (value !== undefined && value !== "") {
      attributes.push([key, value]);
    }
  }

  const turn = annotations.sessionTurnNumber;
  if (turn !== undefined && Number.isInteger(turn)) {
    attributes.push([ATTR_SESSION_TURN_NUMBER, turn]);
  }

  for (const [field, key] of TRAILING_STRING_FIELDS) {
    const value = annotations[field];
    if (value !== undefined && value !== "") {
      attributes.push([key, value]);
    }
  }

  return attributes;
}

/**
 * JSON-encode chunk ACLs for the `triage.chunk_acls` attribute.
 *
 * Returns undefined when the value cannot be encoded (cycles, BigInt).
 */
export function serializeChunkAcls(acls: readonly ChunkAcl[]): string | undefined {
  try {
    return JSON.stringify(acls);
  } catch {
    return undefined;
  }
}
