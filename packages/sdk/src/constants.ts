/**
 * Span attribute keys, environment variable names and defaults.
 */

// ---------------------------------------------------------------------------
// Annotation attributes (triage.*)
// ---------------------------------------------------------------------------

export const ATTR_USER_ID = "triage.user.id";
export const ATTR_USER_ROLE = "triage.user.role";
export const ATTR_TENANT_ID = "triage.tenant.id";
export const ATTR_TENANT_NAME = "triage.tenant.name";
export const ATTR_SESSION_ID = "triage.session.id";
export const ATTR_SESSION_TURN_NUMBER = "triage.session.turn_number";
export const ATTR_SESSION_HISTORY_HASH = "triage.session.history_hash";
export const ATTR_INPUT_RAW = "triage.input.raw";
export const ATTR_INPUT_SANITIZED = "triage.input.sanitized";
export const ATTR_TEMPLATE_ID = "triage.template.id";
export const ATTR_TEMPLATE_VERSION = "triage.template.version";
export const ATTR_CHUNK_ACLS = "triage.chunk_acls";

// SDK metadata (resource attributes)
export const ATTR_SDK_NAME = "triage.sdk.name";
export const ATTR_SDK_VERSION = "triage.sdk.version";
export const ATTR_ENVIRONMENT = "triage.environment";

export const SDK_NAME = "triage-sdk-node";
export const SDK_VERSION = "0.1.0";
export const TRACER_NAME = SDK_NAME;

// ---------------------------------------------------------------------------
// LLM attributes: gen_ai.* (primary) and llm.* (compatibility)
// ---------------------------------------------------------------------------

export const ATTR_GEN_AI_SYSTEM = "gen_ai.system";
export const ATTR_GEN_AI_REQUEST_MODEL = "gen_ai.request.model";
export const ATTR_GEN_AI_REQUEST_TEMPERATURE = "gen_ai.request.temperature";
export const ATTR_GEN_AI_REQUEST_TOP_P = "gen_ai.request.top_p";
export const ATTR_GEN_AI_REQUEST_FREQUENCY_PENALTY = "gen_ai.request.frequency_penalty";
export const ATTR_GEN_AI_REQUEST_PRESENCE_PENALTY = "gen_ai.request.presence_penalty";
export const ATTR_GEN_AI_REQUEST_MAX_TOKENS = "gen_ai.request.max_tokens";
export const ATTR_GEN_AI_REQUEST_STOP_SEQUENCES = "gen_ai.request.stop_sequences";
export const ATTR_GEN_AI_RESPONSE_MODEL = "gen_ai.response.model";
export const ATTR_GEN_AI_RESPONSE_FINISH_REASON = "gen_ai.response.finish_reason";
export const ATTR_GEN_AI_USAGE_INPUT_TOKENS = "gen_ai.usage.input_tokens";
export const ATTR_GEN_AI_USAGE_OUTPUT_TOKENS = "gen_ai.usage.output_tokens";
export const ATTR_GEN_AI_USAGE_TOTAL_TOKENS = "gen_ai.usage.total_tokens";
export const ATTR_GEN_AI_USAGE_REASONING_TOKENS = "gen_ai.usage.reasoning_tokens";
export const ATTR_GEN_AI_USAGE_CACHE_READ_TOKENS = "gen_ai.usage.cache_read_tokens";
export const ATTR_GEN_AI_USAGE_CACHE_WRITE_TOKENS = "gen_ai.usage.cache_write_tokens";

export const GEN_AI_PROMPT_PREFIX = "gen_ai.prompt";
export const GEN_AI_COMPLETION_PREFIX = "gen_ai.completion";
export const GEN_AI_REQUEST_TOOLS_PREFIX = "gen_ai.request.tools";

export const ATTR_LLM_VENDOR = "llm.vendor";
export const ATTR_LLM_REQUEST_MODEL = "llm.request.model";
export const ATTR_LLM_REQUEST_TYPE = "llm.request.type";
export const ATTR_LLM_RESPONSE_MODEL = "llm.response.model";
export const ATTR_LLM_USAGE_PROMPT_TOKENS = "llm.usage.prompt_tokens";
export const ATTR_LLM_USAGE_COMPLETION_TOKENS = "llm.usage.completion_tokens";
export const ATTR_LLM_USAGE_TOTAL_TOKENS = "llm.usage.total_tokens";

/** Span name used when the request names no vendor */
export const FALLBACK_LLM_SPAN_NAME = "llm.chat";

// ---------------------------------------------------------------------------
// Hierarchy attributes (traceloop.* conventions)
// ---------------------------------------------------------------------------

export const ATTR_SPAN_KIND = "traceloop.span.kind";
export const ATTR_ENTITY_NAME = "traceloop.entity.name";
export const ATTR_WORKFLOW_NAME = "traceloop.workflow.name";
export const ATTR_AGENT_NAME = "llm.agent.name";

// ---------------------------------------------------------------------------
// Environment variables
// ---------------------------------------------------------------------------

export const ENV_API_KEY = "TRIAGE_API_KEY";
export const ENV_ENDPOINT = "TRIAGE_ENDPOINT";
export const ENV_APP_NAME = "TRIAGE_APP_NAME";
export const ENV_ENVIRONMENT = "TRIAGE_ENVIRONMENT";
export const ENV_ENABLED = "TRIAGE_ENABLED";
export const ENV_TRACE_CONTENT = "TRIAGE_TRACE_CONTENT";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_ENDPOINT = "https://api.triageai.dev";
export const DEFAULT_APP_NAME = "unknown";
export const DEFAULT_ENVIRONMENT = "development";
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5_000;
export const OTLP_TRACES_PATH = "/v1/traces";
