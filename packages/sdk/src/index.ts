/**
 * @triage/sdk: security-relevant annotations and LLM call data on OpenTelemetry spans.
 *
 * Public API:
 * - init() / shutdown(): SDK lifecycle
 * - withUser() / withTenant() / withSession() / withInput() / withTemplate() / withChunkAcls()
 *   request-scoped annotations, copied onto every descendant span
 * - logPrompt() / LLMCallSpan: one span per model invocation
 * - startWorkflow() / startTask() / startAgent() / startTool(): hierarchy spans
 * - withWorkflow() / withTask() / withAgent() / withTool() / withLLMCall(): callback helpers
 *
 * @example
 * ```typescript
 * import { context } from "@opentelemetry/api";
 * import { init, logPrompt, withSession, withUser } from "@triage/sdk";
 *
 * const shutdown = await init({ apiKey: process.env.TRIAGE_API_KEY });
 *
 * let ctx = withUser(context.active(), "u_42", { role: "admin" });
 * ctx = withSession(ctx, "sess_1", { turnNumber: 3 });
 *
 * const { span } = logPrompt({ vendor: "openai", model: "gpt-4o", messages }, ctx);
 * span.logCompletion({ model: "gpt-4o", usage: { inputTokens: 10, outputTokens: 5 } });
 *
 * await shutdown();
 * ```
 */

// Selective OTel re-exports for advanced users
export { context, SpanStatusCode, trace } from "@opentelemetry/api";

export {
  type AnnotationAttribute,
  type AnnotationContext,
  type ChunkAcl,
  EMPTY_ANNOTATIONS,
  extendAnnotations,
  projectAnnotations,
  serializeChunkAcls,
} from "./annotations.js";
export { defaultAppName, parseEnvBool, resolveConfig, TriageConfigSchema } from "./config.js";
export * from "./constants.js";
export {
  annotate,
  getAnnotations,
  type InputOptions,
  runWithAnnotations,
  type SessionOptions,
  setAnnotations,
  type TemplateOptions,
  type TenantOptions,
  type UserOptions,
  withChunkAcls,
  withInput,
  withSession,
  withTemplate,
  withTenant,
  withUser,
} from "./context.js";
export {
  getWorkflowName,
  HierarchySpan,
  type HierarchySpanKind,
  startAgent,
  startTask,
  startTool,
  startWorkflow,
} from "./hierarchy.js";
export {
  LLMCallSpan,
  type LLMCallState,
  llmSpanName,
  type LoggedPrompt,
  logPrompt,
  messageAttributes,
  toolDefinitionAttributes,
} from "./llm.js";
export { TriageSpanProcessor } from "./processor.js";
export {
  getActiveConfig,
  init,
  isInitialized,
  shouldTraceContent,
  shutdown,
} from "./setup.js";
export { withAgent, withLLMCall, withTask, withTool, withWorkflow } from "./span-helpers.js";
export type {
  CompletionResponse,
  InitOptions,
  Message,
  PromptRequest,
  ScopedSpan,
  ShutdownHandle,
  ShutdownOptions,
  TokenUsage,
  ToolCall,
  ToolDefinition,
  TriageConfig,
} from "./types.js";
