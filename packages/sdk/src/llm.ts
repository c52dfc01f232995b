/**
 * LLM call spans: one span per model invocation.
 *
 * Request attributes are written when the prompt is logged; response and
 * usage attributes when the completion is logged. Every fact is written under
 * the gen_ai.* schema and, where one exists, the llm.* compatibility schema.
 *
 * Lifecycle: unopened -> open -> closed. The underlying span is ended exactly
 * once; calls outside the state where they apply are no-ops.
 */

import {
  type Attributes,
  type Context,
  context,
  type Span,
  SpanStatusCode,
  trace,
} from "@opentelemetry/api";
import { getErrorMessage } from "@triage/errors";
import {
  ATTR_GEN_AI_REQUEST_FREQUENCY_PENALTY,
  ATTR_GEN_AI_REQUEST_MAX_TOKENS,
  ATTR_GEN_AI_REQUEST_MODEL,
  ATTR_GEN_AI_REQUEST_PRESENCE_PENALTY,
  ATTR_GEN_AI_REQUEST_STOP_SEQUENCES,
  ATTR_GEN_AI_REQUEST_TEMPERATURE,
  ATTR_GEN_AI_REQUEST_TOP_P,
  ATTR_GEN_AI_RESPONSE_FINISH_REASON,
  ATTR_GEN_AI_RESPONSE_MODEL,
  ATTR_GEN_AI_SYSTEM,
  ATTR_GEN_AI_USAGE_CACHE_READ_TOKENS,
  ATTR_GEN_AI_USAGE_CACHE_WRITE_TOKENS,
  ATTR_GEN_AI_USAGE_INPUT_TOKENS,
  ATTR_GEN_AI_USAGE_OUTPUT_TOKENS,
  ATTR_GEN_AI_USAGE_REASONING_TOKENS,
  ATTR_GEN_AI_USAGE_TOTAL_TOKENS,
  ATTR_LLM_REQUEST_MODEL,
  ATTR_LLM_REQUEST_TYPE,
  ATTR_LLM_RESPONSE_MODEL,
  ATTR_LLM_USAGE_COMPLETION_TOKENS,
  ATTR_LLM_USAGE_PROMPT_TOKENS,
  ATTR_LLM_USAGE_TOTAL_TOKENS,
  ATTR_LLM_VENDOR,
  FALLBACK_LLM_SPAN_NAME,
  GEN_AI_COMPLETION_PREFIX,
  GEN_AI_PROMPT_PREFIX,
  GEN_AI_REQUEST_TOOLS_PREFIX,
  TRACER_NAME,
} from "./constants.js";
import { shouldTraceContent } from "./setup.js";
import type {
  CompletionResponse,
  Message,
  PromptRequest,
  ScopedSpan,
  TokenUsage,
  ToolDefinition,
} from "./types.js";

export type LLMCallState = "unopened" | "open" | "closed";

/** Usage counters in emission order, with their compatibility key where one exists */
const USAGE_FIELDS: ReadonlyArray<readonly [keyof TokenUsage, string, string | undefined]> = [
  ["inputTokens", ATTR_GEN_AI_USAGE_INPUT_TOKENS, ATTR_LLM_USAGE_PROMPT_TOKENS],
  ["outputTokens", ATTR_GEN_AI_USAGE_OUTPUT_TOKENS, ATTR_LLM_USAGE_COMPLETION_TOKENS],
  ["totalTokens", ATTR_GEN_AI_USAGE_TOTAL_TOKENS, ATTR_LLM_USAGE_TOTAL_TOKENS],
  ["reasoningTokens", ATTR_GEN_AI_USAGE_REASONING_TOKENS, undefined],
  ["cacheReadTokens", ATTR_GEN_AI_USAGE_CACHE_READ_TOKENS, undefined],
  ["cacheWriteTokens", ATTR_GEN_AI_USAGE_CACHE_WRITE_TOKENS, undefined],
];

/**
 * Span name for a request: "<vendor>.chat <model>", "<vendor>.chat", or
 * "llm.chat" when no vendor is given.
 */
export function llmSpanName(request: Pick<PromptRequest, "vendor" | "model">): string {
  if (!request.vendor) {
    return FALLBACK_LLM_SPAN_NAME;
  }
  return request.model ? `${request.vendor}.chat ${request.model}` : `${request.vendor}.chat`;
}

/**
 * Flatten messages into indexed attributes under `prefix`
 * (`gen_ai.prompt` or `gen_ai.completion`).
 */
export function messageAttributes(prefix: string, messages: readonly Message[]): Attributes {
  const attributes: Attributes = {};
  messages.forEach((message, i) => {
    const p = `${prefix}.${i}`;
    if (message.role) attributes[`${p}.role`] = message.role;
    if (message.content) attributes[`${p}.content`] = message.content;
    if (message.toolCallId) attributes[`${p}.tool_call_id`] = message.toolCallId;
    message.toolCalls?.forEach((call, j) => {
      const tp = `${p}.tool_calls.${j}`;
      if (call.id) attributes[`${tp}.id`] = call.id;
      if (call.type) attributes[`${tp}.type`] = call.type;
      if (call.name) attributes[`${tp}.name`] = call.name;
      if (call.arguments) attributes[`${tp}.arguments`] = call.arguments;
    });
  });
  return attributes;
}

/**
 * Flatten tool definitions into `gen_ai.request.tools.<i>.*`.
 * A parameters schema that cannot be JSON-encoded is skipped.
 */
export function toolDefinitionAttributes(tools: readonly ToolDefinition[]): Attributes {
  const attributes: Attributes = {};
  tools.forEach((tool, i) => {
    const p = `${GEN_AI_REQUEST_TOOLS_PREFIX}.${i}`;
    if (tool.name) attributes[`${p}.name`] = tool.name;
    if (tool.description) attributes[`${p}.description`] = tool.description;
    if (tool.parameters !== undefined && tool.parameters !== null) {
      const schema = encodeJson(tool.parameters);
      if (schema !== undefined) attributes[`${p}.parameters`] = schema;
    }
  });
  return attributes;
}

function encodeJson(value: unknown): string | undefined {
  try {
    return JSON.stringify(value);
  } catch {
    return undefined;
  }
}

function requestAttributes(request: PromptRequest): Attributes {
  const attributes: Attributes = {};
  if (request.vendor) {
    attributes[ATTR_GEN_AI_SYSTEM] = request.vendor;
    attributes[ATTR_LLM_VENDOR] = request.vendor;
  }
  if (request.model) {
    attributes[ATTR_GEN_AI_REQUEST_MODEL] = request.model;
    attributes[ATTR_LLM_REQUEST_MODEL] = request.model;
  }
  attributes[ATTR_LLM_REQUEST_TYPE] = "chat";
  if (request.temperature !== undefined) {
    attributes[ATTR_GEN_AI_REQUEST_TEMPERATURE] = request.temperature;
  }
  if (request.topP !== undefined) {
    attributes[ATTR_GEN_AI_REQUEST_TOP_P] = request.topP;
  }
  if (request.frequencyPenalty !== undefined) {
    attributes[ATTR_GEN_AI_REQUEST_FREQUENCY_PENALTY] = request.frequencyPenalty;
  }
  if (request.presencePenalty !== undefined) {
    attributes[ATTR_GEN_AI_REQUEST_PRESENCE_PENALTY] = request.presencePenalty;
  }
  if (request.maxTokens !== undefined) {
    attributes[ATTR_GEN_AI_REQUEST_MAX_TOKENS] = request.maxTokens;
  }
  if (request.stop !== undefined && request.stop.length > 0) {
    attributes[ATTR_GEN_AI_REQUEST_STOP_SEQUENCES] = [...request.stop];
  }
  return attributes;
}

function responseAttributes(response: CompletionResponse): Attributes {
  const attributes: Attributes = {};
  if (response.model) {
    attributes[ATTR_GEN_AI_RESPONSE_MODEL] = response.model;
    attributes[ATTR_LLM_RESPONSE_MODEL] = response.model;
  }
  if (response.finishReason) {
    attributes[ATTR_GEN_AI_RESPONSE_FINISH_REASON] = response.finishReason;
  }
  const usage = response.usage ?? {};
  for (const [field, key, compatKey] of USAGE_FIELDS) {
    const count = usage[field];
    // zero and absent are recorded the same way: not at all
    if (count !== undefined && count > 0) {
      attributes[key] = count;
      if (compatKey !== undefined) attributes[compatKey] = count;
    }
  }
  return attributes;
}

/**
 * One model invocation. Obtain with `logPrompt()`; finish with
 * `logCompletion()` or, when no response was obtained, `end()`.
 */
export class LLMCallSpan implements ScopedSpan {
  private readonly span: Span | undefined;
  private readonly scope: Context;
  private current: LLMCallState;

  private constructor(span: Span | undefined, ctx: Context) {
    this.span = span;
    this.scope = ctx;
    this.current = span === undefined ? "unopened" : "open";
  }

  /** @internal */
  static open(span: Span, ctx: Context): LLMCallSpan {
    return new LLMCallSpan(span, ctx);
  }

  /** An inert placeholder; every operation on it is a no-op */
  static unopened(): LLMCallSpan {
    return new LLMCallSpan(undefined, context.active());
  }

  get state(): LLMCallState {
    return this.current;
  }

  /** Context carrying this span; spans started from it nest underneath */
  get context(): Context {
    return this.scope;
  }

  /**
   * Record response model, finish reason and non-zero usage counters (plus
   * completion content when enabled), then end the span.
   */
  logCompletion(response: CompletionResponse): void {
    const span = this.openSpan();
    if (span === undefined) return;

    span.setAttributes(responseAttributes(response));
    if (shouldTraceContent() && response.messages !== undefined) {
      span.setAttributes(messageAttributes(GEN_AI_COMPLETION_PREFIX, response.messages));
    }
    this.close(span);
  }

  /**
   * Record a failure and mark the span ERROR. Does not end the span:
   * call `end()` afterwards.
   */
  setError(error: unknown): void {
    const span = this.openSpan();
    if (span === undefined) return;

    const message = getErrorMessage(error);
    span.recordException(error instanceof Error ? error : message);
    span.setStatus({ code: SpanStatusCode.ERROR, message });
  }

  /** End the span without completion data */
  end(): void {
    const span = this.openSpan();
    if (span === undefined) return;
    this.close(span);
  }

  private openSpan(): Span | undefined {
    return this.current === "open" ? this.span : undefined;
  }

  private close(span: Span): void {
    this.current = "closed";
    span.end();
  }
}

export interface LoggedPrompt {
  span: LLMCallSpan;
  /** Context carrying the LLM span */
  context: Context;
}

/**
 * Start an LLM call span and record the request.
 *
 * The returned span inherits the ambient triage.* annotations through
 * TriageSpanProcessor. Message content, tool calls and tool definitions are
 * recorded only when content tracing is enabled.
 *
 * @example
 * ```typescript
 * const { span } = logPrompt({
 *   vendor: "openai",
 *   model: "gpt-4o",
 *   messages: [{ role: "user", content: "Hello" }],
 * });
 * // ... make the LLM call ...
 * span.logCompletion({
 *   model: "gpt-4o",
 *   messages: [{ role: "assistant", content: "Hi!" }],
 *   usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
 * });
 * ```
 */
export function logPrompt(request: PromptRequest, parent: Context = context.active()): LoggedPrompt {
  const tracer = trace.getTracer(TRACER_NAME);
  const span = tracer.startSpan(llmSpanName(request), {}, parent);

  span.setAttributes(requestAttributes(request));
  if (shouldTraceContent()) {
    if (request.messages !== undefined) {
      span.setAttributes(messageAttributes(GEN_AI_PROMPT_PREFIX, request.messages));
    }
    if (request.tools !== undefined) {
      span.setAttributes(toolDefinitionAttributes(request.tools));
    }
  }

  const ctx = trace.setSpan(parent, span);
  return { span: LLMCallSpan.open(span, ctx), context: ctx };
}
