/**
 * Ambient annotation helpers over the OpenTelemetry Context.
 *
 * Each helper returns a new Context carrying an extended AnnotationContext.
 * Spans started from that context (or any descendant) receive the
 * `triage.*` attributes through TriageSpanProcessor.
 */

import { type Context, context, createContextKey, trace } from "@opentelemetry/api";
import {
  type AnnotationContext,
  type ChunkAcl,
  EMPTY_ANNOTATIONS,
  extendAnnotations,
  projectAnnotations,
  serializeChunkAcls,
} from "./annotations.js";

const ANNOTATIONS_KEY = createContextKey("triage.annotations");

export interface UserOptions {
  /** e.g. "admin", "viewer" */
  role?: string;
}

export interface TenantOptions {
  /** Tenant/organization display name */
  name?: string;
}

export interface SessionOptions {
  /** Conversation turn number; 0 is recorded */
  turnNumber?: number;
  historyHash?: string;
}

export interface InputOptions {
  /** Sanitized version of the raw input */
  sanitized?: string;
}

export interface TemplateOptions {
  version?: string;
}

function isAnnotationContext(value: unknown): value is AnnotationContext {
  return typeof value === "object" && value !== null;
}

/** Read the annotations carried by `ctx` (empty when none) */
export function getAnnotations(ctx: Context = context.active()): AnnotationContext {
  const value = ctx.getValue(ANNOTATIONS_KEY);
  return isAnnotationContext(value) ? value : EMPTY_ANNOTATIONS;
}

/** Replace the annotations carried by `ctx` with a frozen copy of `annotations` */
export function setAnnotations(ctx: Context, annotations: AnnotationContext): Context {
  return ctx.setValue(ANNOTATIONS_KEY, extendAnnotations(EMPTY_ANNOTATIONS, annotations));
}

/**
 * Extend the annotations carried by `ctx` with `update`.
 *
 * The span already active in `ctx` is stamped too, so it carries the new
 * fields even though it started before the annotation.
 */
export function annotate(ctx: Context, update: AnnotationContext): Context {
  const span = trace.getSpan(ctx);
  if (span?.isRecording()) {
    const attributes = projectAnnotations(update);
    if (attributes.length > 0) {
      span.setAttributes(Object.fromEntries(attributes));
    }
  }
  return setAnnotations(ctx, extendAnnotations(getAnnotations(ctx), update));
}

/** Attach user identity (`triage.user.*`) */
export function withUser(ctx: Context, userId: string, options: UserOptions = {}): Context {
  return annotate(ctx, { userId, userRole: options.role });
}

/** Attach tenant/organization identity (`triage.tenant.*`) */
export function withTenant(ctx: Context, tenantId: string, options: TenantOptions = {}): Context {
  return annotate(ctx, { tenantId, tenantName: options.name });
}

/** Attach conversation session metadata (`triage.session.*`) */
export function withSession(
  ctx: Context,
  sessionId: string,
  options: SessionOptions = {},
): Context {
  return annotate(ctx, {
    sessionId,
    sessionTurnNumber: options.turnNumber,
    sessionHistoryHash: options.historyHash,
  });
}

/** Attach raw (and optionally sanitized) user input (`triage.input.*`) */
export function withInput(ctx: Context, raw: string, options: InputOptions = {}): Context {
  return annotate(ctx, { inputRaw: raw, inputSanitized: options.sanitized });
}

/** Attach prompt template identity (`triage.template.*`) */
export function withTemplate(
  ctx: Context,
  templateId: string,
  options: TemplateOptions = {},
): Context {
  return annotate(ctx, { templateId, templateVersion: options.version });
}

/**
 * Attach access-control metadata for retrieved chunks (`triage.chunk_acls`).
 *
 * Span attributes only hold primitives, so the list is stored as JSON.
 * When it cannot be encoded, `ctx` is returned unchanged.
 */
export function withChunkAcls(ctx: Context, acls: readonly ChunkAcl[]): Context {
  const chunkAcls = serializeChunkAcls(acls);
  if (chunkAcls === undefined) {
    return ctx;
  }
  return annotate(ctx, { chunkAcls });
}

/**
 * Run `fn` with the active context extended by `update`.
 *
 * @example
 * ```typescript
 * await runWithAnnotations({ userId: "u_42", tenantId: "org_7" }, async () => {
 *   await handleRequest(req);
 * });
 * ```
 */
export function runWithAnnotations<T>(update: AnnotationContext, fn: () => T): T {
  return context.with(annotate(context.active(), update), fn);
}
