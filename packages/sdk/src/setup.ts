/**
 * SDK lifecycle: one tracing pipeline per process, toggled by init/shutdown.
 *
 * Lazy-loaded: OTel SDK packages are only imported when a pipeline is built,
 * so a disabled or never-initialized SDK costs nothing.
 */

import { trace } from "@opentelemetry/api";
import { getErrorMessage, ShutdownTimeoutError } from "@triage/errors";
import { resolveConfig } from "./config.js";
import {
  ATTR_ENVIRONMENT,
  ATTR_SDK_NAME,
  ATTR_SDK_VERSION,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  OTLP_TRACES_PATH,
  SDK_NAME,
  SDK_VERSION,
} from "./constants.js";
import { TriageSpanProcessor } from "./processor.js";
import type {
  InitOptions,
  ShutdownHandle,
  ShutdownOptions,
  TriageConfig,
} from "./types.js";

interface LifecycleState {
  initialized: boolean;
  /** Reference to the NodeSDK for shutdown */
  sdk: { shutdown(): Promise<void> } | undefined;
  /** Kept for runtime checks such as traceContent */
  config: TriageConfig | undefined;
}

const state: LifecycleState = {
  initialized: false,
  sdk: undefined,
  config: undefined,
};

/** Tail of the lifecycle queue; every state transition runs after the previous one */
let lock: Promise<void> = Promise.resolve();

function exclusive<T>(transition: () => Promise<T>): Promise<T> {
  const run = lock.then(transition);
  lock = run.then(
    () => undefined,
    () => undefined,
  );
  return run;
}

const inertShutdown: ShutdownHandle = () => Promise.resolve();

/**
 * Initialize the Triage SDK.
 *
 * Configures:
 * - NodeSDK with a Resource carrying service.name, SDK name/version and environment
 * - TriageSpanProcessor (stamps triage.* annotations on span start)
 * - BatchSpanProcessor + OTLP HTTP exporter pointed at `<endpoint>/v1/traces`
 * - UndiciInstrumentation (auto-instruments Node fetch)
 *
 * A second call while initialized logs a warning, keeps the first pipeline and
 * returns an inert handle. A disabled config returns an inert handle as well.
 *
 * @param options - Explicit overrides (env vars and defaults fill the rest)
 * @returns A handle that flushes and releases the pipeline; it never rejects
 * @throws ConfigurationError when no API key is resolved
 */
export function init(options: InitOptions = {}): Promise<ShutdownHandle> {
  return exclusive(async () => {
    if (state.initialized) {
      console.warn("[triage] init() called more than once, ignoring");
      return inertShutdown;
    }

    const config = resolveConfig(options);

    if (!config.enabled) {
      console.info("[triage] SDK disabled via config, skipping initialization");
      return inertShutdown;
    }

    // Dynamic imports: only loaded when a pipeline is built
    const { NodeSDK } = await import("@opentelemetry/sdk-node");
    const { OTLPTraceExporter } = await import("@opentelemetry/exporter-trace-otlp-http");
    const { UndiciInstrumentation } = await import("@opentelemetry/instrumentation-undici");
    const { ATTR_SERVICE_NAME } = await import("@opentelemetry/semantic-conventions");
    const { Resource } = await import("@opentelemetry/resources");
    const { BatchSpanProcessor } = await import("@opentelemetry/sdk-trace-base");

    const resource = new Resource({
      [ATTR_SERVICE_NAME]: config.appName,
      [ATTR_SDK_NAME]: SDK_NAME,
      [ATTR_SDK_VERSION]: SDK_VERSION,
      [ATTR_ENVIRONMENT]: config.environment,
      "deployment.environment": config.environment,
    });

    const traceExporter = new OTLPTraceExporter({
      url: `${config.endpoint}${OTLP_TRACES_PATH}`,
      headers: { Authorization: `Bearer ${config.apiKey}` },
    });

    const sdk = new NodeSDK({
      resource,
      spanProcessors: [new TriageSpanProcessor(), new BatchSpanProcessor(traceExporter)],
      instrumentations: [new UndiciInstrumentation()],
    });

    sdk.start();

    state.sdk = sdk;
    state.config = config;
    state.initialized = true;

    console.info(
      `[triage] SDK initialized (app=${config.appName}, env=${config.environment}, endpoint=${config.endpoint})`,
    );

    return async (shutdownOptions?: ShutdownOptions) => {
      try {
        await shutdown(shutdownOptions);
      } catch (error) {
        console.error("[triage] Shutdown error:", getErrorMessage(error));
      }
    };
  });
}

/**
 * Flush pending spans and release the pipeline.
 *
 * State is detached under the lifecycle lock; the flush itself runs outside
 * it. Safe to call when never initialized and safe to repeat.
 *
 * @throws ShutdownTimeoutError when the flush outlives `timeoutMs`
 */
export async function shutdown(options: ShutdownOptions = {}): Promise<void> {
  const sdk = await exclusive(async () => {
    const current = state.sdk;
    if (current !== undefined) {
      // Unregister the global provider so a later init() can register its own
      trace.disable();
    }
    state.initialized = false;
    state.sdk = undefined;
    state.config = undefined;
    return current;
  });

  if (sdk === undefined) {
    return;
  }

  await withDeadline(sdk.shutdown(), options.timeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS);
}

function withDeadline(flush: Promise<void>, timeoutMs: number): Promise<void> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ShutdownTimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([flush, deadline]).finally(() => clearTimeout(timer));
}

/** Whether a pipeline is currently running */
export function isInitialized(): boolean {
  return state.initialized;
}

/** The config of the running pipeline, if any */
export function getActiveConfig(): TriageConfig | undefined {
  return state.config;
}

/**
 * Whether prompt/completion content should be recorded.
 * True when no pipeline is running.
 */
export function shouldTraceContent(): boolean {
  return state.config?.traceContent ?? true;
}
