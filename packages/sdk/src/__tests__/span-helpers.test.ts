import { context, ROOT_CONTEXT, SpanStatusCode, trace } from "@opentelemetry/api";
import { attributeOf, createTestTracing, type TestTracing } from "@triage/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { withUser } from "../context.js";
import { TriageSpanProcessor } from "../processor.js";
import { withAgent, withLLMCall, withTask, withTool, withWorkflow } from "../span-helpers.js";

describe("hierarchy span helpers", () => {
  let tracing: TestTracing;

  beforeEach(() => {
    tracing = createTestTracing([new TriageSpanProcessor()]);
  });

  afterEach(async () => {
    await tracing.shutdown();
  });

  it("should set OK status on success", async () => {
    await withWorkflow("wf.ok", async () => "result");

    expect(tracing.span("wf.ok").status.code).toBe(SpanStatusCode.OK);
  });

  it("should return the function's return value", async () => {
    const result = await withTask("task.return", async () => 42);
    expect(result).toBe(42);
  });

  it("should record exception and set ERROR status on failure", async () => {
    const error = new Error("test failure");

    await expect(
      withTool("tool.error", async () => {
        throw error;
      }),
    ).rejects.toThrow("test failure");

    const span = tracing.span("tool.error");
    expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: "test failure" });
    expect(span.events.map((event) => event.name)).toEqual(["exception"]);
  });

  it("should set ERROR status without an exception event for non-Error throws", async () => {
    await expect(
      withAgent("agent.string", async () => {
        throw "string error";
      }),
    ).rejects.toBe("string error");

    const span = tracing.span("agent.string");
    expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: "string error" });
    expect(span.events).toEqual([]);
  });

  it("should make the span active while fn runs", async () => {
    await withWorkflow("pipeline", async (wf) => {
      expect(trace.getSpan(context.active())).toBe(wf.otelSpan);
      await withAgent("planner", async () => {
        await withTool("search", async () => {});
      });
    });

    const pipeline = tracing.span("pipeline");
    const planner = tracing.span("planner");
    const search = tracing.span("search");
    expect(planner.parentSpanId).toBe(pipeline.spanContext().spanId);
    expect(search.parentSpanId).toBe(planner.spanContext().spanId);
    expect(attributeOf(search, "traceloop.workflow.name")).toBe("pipeline");
    expect(attributeOf(planner, "llm.agent.name")).toBe("planner");
  });
});

describe("withLLMCall", () => {
  let tracing: TestTracing;

  beforeEach(() => {
    tracing = createTestTracing([new TriageSpanProcessor()]);
  });

  afterEach(async () => {
    await tracing.shutdown();
  });

  it("should log the completion and return the result", async () => {
    const reply = await withLLMCall({ vendor: "openai", model: "gpt-4o" }, async (span) => {
      span.logCompletion({ model: "gpt-4o", usage: { totalTokens: 12 } });
      return "Hi!";
    });

    expect(reply).toBe("Hi!");
    const span = tracing.span("openai.chat gpt-4o");
    expect(attributeOf(span, "gen_ai.usage.total_tokens")).toBe(12);
    expect(span.status.code).toBe(SpanStatusCode.UNSET);
  });

  it("should end the span when fn never logs a completion", async () => {
    await withLLMCall({ vendor: "openai" }, async () => undefined);

    expect(tracing.spans()).toHaveLength(1);
    expect(attributeOf(tracing.span("openai.chat"), "gen_ai.response.model")).toBeUndefined();
  });

  it("should record the failure and re-throw", async () => {
    await expect(
      withLLMCall({ vendor: "anthropic" }, async () => {
        throw new Error("overloaded");
      }),
    ).rejects.toThrow("overloaded");

    const span = tracing.span("anthropic.chat");
    expect(span.status).toEqual({ code: SpanStatusCode.ERROR, message: "overloaded" });
  });

  it("should re-throw a value that cannot be converted to a string unchanged", async () => {
    const thrown: unknown = Object.create(null);

    await expect(
      withLLMCall({ vendor: "openai" }, async () => {
        throw thrown;
      }),
    ).rejects.toBe(thrown);

    expect(tracing.span("openai.chat").status).toEqual({
      code: SpanStatusCode.ERROR,
      message: "An unknown error occurred",
    });
  });

  it("should nest spans started in fn and inherit annotations", async () => {
    await context.with(withUser(context.active(), "u_42"), async () => {
      await withLLMCall({ vendor: "openai" }, async () => {
        trace.getTracer("http").startSpan("POST /v1/chat/completions").end();
      });
    });

    const llm = tracing.span("openai.chat");
    const http = tracing.span("POST /v1/chat/completions");
    expect(http.parentSpanId).toBe(llm.spanContext().spanId);
    expect(attributeOf(llm, "triage.user.id")).toBe("u_42");
    expect(attributeOf(http, "triage.user.id")).toBe("u_42");
  });

  it("should nest under an explicit parent context", async () => {
    const parent = trace.getTracer("test").startSpan("caller", {}, ROOT_CONTEXT);
    await withLLMCall({ vendor: "openai" }, async () => undefined, trace.setSpan(ROOT_CONTEXT, parent));
    parent.end();

    expect(tracing.span("openai.chat").parentSpanId).toBe(parent.spanContext().spanId);
  });
});
