/**
 * Span helper utilities: callback-scoped variants of the span wrappers.
 *
 * Each helper makes its span the active context while `fn` runs, so any span
 * started inside nests underneath without passing contexts around, and:
 * - Records exceptions and sets ERROR status on failure
 * - Sets OK status on success (hierarchy spans)
 * - Always ends the span (even on error)
 */

import { type Context, context, SpanStatusCode } from "@opentelemetry/api";
import { getErrorMessage } from "@triage/errors";
import {
  type HierarchySpan,
  startAgent,
  startTask,
  startTool,
  startWorkflow,
} from "./hierarchy.js";
import { type LLMCallSpan, logPrompt } from "./llm.js";
import type { PromptRequest } from "./types.js";

async function runInHierarchySpan<T>(
  scoped: HierarchySpan,
  fn: (span: HierarchySpan) => Promise<T>,
): Promise<T> {
  return context.with(scoped.context, async () => {
    const span = scoped.otelSpan;
    try {
      const result = await fn(scoped);
      span?.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      if (error instanceof Error) {
        span?.recordException(error);
      }
      span?.setStatus({ code: SpanStatusCode.ERROR, message: getErrorMessage(error) });
      throw error;
    } finally {
      scoped.end();
    }
  });
}

/**
 * Execute an async function within a workflow span.
 *
 * @throws Re-throws any error from fn after recording it on the span
 */
export function withWorkflow<T>(name: string, fn: (span: HierarchySpan) => Promise<T>): Promise<T> {
  return runInHierarchySpan(startWorkflow(name), fn);
}

/** Execute an async function within a task span */
export function withTask<T>(name: string, fn: (span: HierarchySpan) => Promise<T>): Promise<T> {
  return runInHierarchySpan(startTask(name), fn);
}

/** Execute an async function within an agent span */
export function withAgent<T>(name: string, fn: (span: HierarchySpan) => Promise<T>): Promise<T> {
  return runInHierarchySpan(startAgent(name), fn);
}

/** Execute an async function within a tool span */
export function withTool<T>(name: string, fn: (span: HierarchySpan) => Promise<T>): Promise<T> {
  return runInHierarchySpan(startTool(name), fn);
}

/**
 * Execute a model call within an LLM call span.
 *
 * `fn` should call `span.logCompletion()` with the response. If it throws,
 * the error is recorded on the span and re-thrown; the span is ended either way.
 *
 * @example
 * ```typescript
 * const reply = await withLLMCall({ vendor: "openai", model, messages }, async (span) => {
 *   const res = await client.chat.completions.create({ model, messages });
 *   span.logCompletion({ model: res.model, usage: { totalTokens: res.usage?.total_tokens } });
 *   return res;
 * });
 * ```
 */
export function withLLMCall<T>(
  request: PromptRequest,
  fn: (span: LLMCallSpan) => Promise<T>,
  parent: Context = context.active(),
): Promise<T> {
  const { span, context: ctx } = logPrompt(request, parent);
  return context.with(ctx, async () => {
    try {
      return await fn(span);
    } catch (error) {
      span.setError(error);
      throw error;
    } finally {
      span.end();
    }
  });
}
