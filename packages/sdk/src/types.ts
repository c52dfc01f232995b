/**
 * Public types for the Triage SDK.
 *
 * Configuration is env-var driven with explicit overrides; LLM call shapes are
 * vendor-neutral so any client library can be mapped onto them.
 */

import type { Context } from "@opentelemetry/api";

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Explicit options for `init()`.
 * All fields are optional: unset fields fall back to env vars, then defaults.
 */
export interface InitOptions {
  /** Backend API key (env: TRIAGE_API_KEY). Required after resolution. */
  apiKey?: string;
  /** Backend base URL (env: TRIAGE_ENDPOINT, default: "https://api.triageai.dev") */
  endpoint?: string;
  /** Reported as service.name (env: TRIAGE_APP_NAME, default: script basename) */
  appName?: string;
  /** Deployment environment (env: TRIAGE_ENVIRONMENT, default: "development") */
  environment?: string;
  /** When false, `init()` is a no-op (env: TRIAGE_ENABLED, default: true) */
  enabled?: boolean;
  /** Record prompt/completion content (env: TRIAGE_TRACE_CONTENT, default: true) */
  traceContent?: boolean;
}

/** Fully resolved config (no optionals) */
export interface TriageConfig {
  readonly apiKey: string;
  readonly endpoint: string;
  readonly appName: string;
  readonly environment: string;
  readonly enabled: boolean;
  readonly traceContent: boolean;
}

export interface ShutdownOptions {
  /** Flush deadline in ms (default: 5000) */
  timeoutMs?: number;
}

/**
 * Returned by `init()`. Flushes and releases the pipeline; never rejects.
 */
export type ShutdownHandle = (options?: ShutdownOptions) => Promise<void>;

// ---------------------------------------------------------------------------
// LLM calls
// ---------------------------------------------------------------------------

/** A tool/function call requested by the model */
export interface ToolCall {
  id?: string;
  type?: string;
  name?: string;
  /** Raw arguments, usually a JSON string */
  arguments?: string;
}

/** A chat message in a prompt or completion */
export interface Message {
  role?: string;
  content?: string;
  toolCalls?: readonly ToolCall[];
  /** For tool-result messages: id of the call being answered */
  toolCallId?: string;
}

/** A tool made available to the model */
export interface ToolDefinition {
  name?: string;
  description?: string;
  /** JSON schema of the tool's parameters */
  parameters?: unknown;
}

export interface TokenUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
  reasoningTokens?: number;
  cacheReadTokens?: number;
  cacheWriteTokens?: number;
}

/** Request side of one model invocation */
export interface PromptRequest {
  /** Provider, e.g. "openai", "anthropic" */
  vendor?: string;
  model?: string;
  messages?: readonly Message[];
  tools?: readonly ToolDefinition[];
  temperature?: number;
  topP?: number;
  frequencyPenalty?: number;
  presencePenalty?: number;
  maxTokens?: number;
  stop?: readonly string[];
}

/** Response side of one model invocation */
export interface CompletionResponse {
  /** Response model (may differ from the request model) */
  model?: string;
  messages?: readonly Message[];
  usage?: TokenUsage;
  /** "stop", "length", "tool_calls", ... */
  finishReason?: string;
}

/** A span wrapper that can be ended and nested under */
export interface ScopedSpan {
  /** Context that nests further spans under this one */
  readonly context: Context;
  end(): void;
}
