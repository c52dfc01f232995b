import { ROOT_CONTEXT, trace } from "@opentelemetry/api";
import { attributeOf, createTestTracing, type TestTracing } from "@triage/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { withSession, withTenant, withUser } from "../context.js";
import { TriageSpanProcessor } from "../processor.js";

describe("TriageSpanProcessor", () => {
  let tracing: TestTracing;

  beforeEach(() => {
    tracing = createTestTracing([new TriageSpanProcessor()]);
  });

  afterEach(async () => {
    await tracing.shutdown();
  });

  it("should copy the parent context annotations onto the span at start", () => {
    let ctx = withUser(ROOT_CONTEXT, "u_42", { role: "admin" });
    ctx = withTenant(ctx, "org_7");
    ctx = withSession(ctx, "sess_1", { turnNumber: 0 });

    trace.getTracer("test").startSpan("child", {}, ctx).end();

    expect(tracing.span("child").attributes).toEqual({
      "triage.user.id": "u_42",
      "triage.user.role": "admin",
      "triage.tenant.id": "org_7",
      "triage.session.id": "sess_1",
      "triage.session.turn_number": 0,
    });
  });

  it("should reach grandchildren through the span context chain", () => {
    const tracer = trace.getTracer("test");
    const ctx = withUser(ROOT_CONTEXT, "u1");

    const parent = tracer.startSpan("parent", {}, ctx);
    const child = tracer.startSpan("child", {}, trace.setSpan(ctx, parent));
    child.end();
    parent.end();

    expect(attributeOf(tracing.span("child"), "triage.user.id")).toBe("u1");
    expect(tracing.span("child").parentSpanId).toBe(parent.spanContext().spanId);
  });

  it("should let span attributes set after start override annotations", () => {
    const span = trace.getTracer("test").startSpan("s", {}, withUser(ROOT_CONTEXT, "ambient"));
    span.setAttribute("triage.user.id", "explicit");
    span.end();

    expect(attributeOf(tracing.span("s"), "triage.user.id")).toBe("explicit");
  });

  it("should flush and shut down without work", async () => {
    const processor = new TriageSpanProcessor();
    await expect(processor.forceFlush()).resolves.toBeUndefined();
    await expect(processor.shutdown()).resolves.toBeUndefined();
  });
});
