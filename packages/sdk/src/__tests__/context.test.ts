import { context, ROOT_CONTEXT, trace } from "@opentelemetry/api";
import { attributeOf, createTestTracing, type TestTracing } from "@triage/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EMPTY_ANNOTATIONS } from "../annotations.js";
import {
  annotate,
  getAnnotations,
  runWithAnnotations,
  setAnnotations,
  withChunkAcls,
  withInput,
  withSession,
  withTemplate,
  withTenant,
  withUser,
} from "../context.js";
import { TriageSpanProcessor } from "../processor.js";

describe("annotation context helpers", () => {
  it("should return the empty context when nothing is attached", () => {
    expect(getAnnotations(ROOT_CONTEXT)).toBe(EMPTY_ANNOTATIONS);
  });

  it("should layer helpers without touching the parent context", () => {
    const userCtx = withUser(ROOT_CONTEXT, "u_42", { role: "admin" });
    const tenantCtx = withTenant(userCtx, "org_7", { name: "Acme Corp" });

    expect(getAnnotations(userCtx)).toEqual({ userId: "u_42", userRole: "admin" });
    expect(getAnnotations(tenantCtx)).toEqual({
      userId: "u_42",
      userRole: "admin",
      tenantId: "org_7",
      tenantName: "Acme Corp",
    });
    expect(getAnnotations(ROOT_CONTEXT)).toEqual({});
  });

  it("should keep the role when the user id alone is replaced", () => {
    let ctx = withUser(ROOT_CONTEXT, "u1", { role: "admin" });
    ctx = withUser(ctx, "u2");

    expect(getAnnotations(ctx)).toEqual({ userId: "u2", userRole: "admin" });
  });

  it("should map session, input and template options", () => {
    let ctx = withSession(ROOT_CONTEXT, "sess_1", { turnNumber: 0, historyHash: "abc" });
    ctx = withInput(ctx, "raw text", { sanitized: "clean text" });
    ctx = withTemplate(ctx, "tmpl_chat", { version: "v2" });

    expect(getAnnotations(ctx)).toEqual({
      sessionId: "sess_1",
      sessionTurnNumber: 0,
      sessionHistoryHash: "abc",
      inputRaw: "raw text",
      inputSanitized: "clean text",
      templateId: "tmpl_chat",
      templateVersion: "v2",
    });
  });

  it("should store chunk ACLs as JSON", () => {
    const ctx = withChunkAcls(ROOT_CONTEXT, [{ chunk_id: "c1", acl: ["role:admin"] }]);
    expect(getAnnotations(ctx).chunkAcls).toBe('[{"chunk_id":"c1","acl":["role:admin"]}]');
  });

  it("should return the context unchanged when ACLs cannot be encoded", () => {
    const base = withUser(ROOT_CONTEXT, "u1");
    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;

    expect(withChunkAcls(base, [cyclic])).toBe(base);
  });

  it("should store a frozen copy in setAnnotations", () => {
    const source: { userId?: string } = { userId: "u1" };
    const ctx = setAnnotations(ROOT_CONTEXT, source);
    source.userId = "mutated";

    expect(getAnnotations(ctx).userId).toBe("u1");
    expect(Object.isFrozen(getAnnotations(ctx))).toBe(true);
  });

  it("should replace annotations wholesale with setAnnotations", () => {
    const ctx = setAnnotations(withUser(ROOT_CONTEXT, "u1"), { tenantId: "org_1" });
    expect(getAnnotations(ctx)).toEqual({ tenantId: "org_1" });
  });
});

describe("annotations on spans", () => {
  let tracing: TestTracing;

  beforeEach(() => {
    tracing = createTestTracing([new TriageSpanProcessor()]);
  });

  afterEach(async () => {
    await tracing.shutdown();
  });

  it("should stamp the active span when annotating after it started", () => {
    const tracer = trace.getTracer("test");
    const span = tracer.startSpan("request");
    const ctx = trace.setSpan(ROOT_CONTEXT, span);

    const annotated = withUser(ctx, "late_user", { role: "viewer" });
    span.end();

    const finished = tracing.span("request");
    expect(attributeOf(finished, "triage.user.id")).toBe("late_user");
    expect(attributeOf(finished, "triage.user.role")).toBe("viewer");
    expect(trace.getSpan(annotated)).toBe(span);
  });

  it("should not stamp a span that has already ended", () => {
    const tracer = trace.getTracer("test");
    const span = tracer.startSpan("done");
    span.end();

    annotate(trace.setSpan(ROOT_CONTEXT, span), { userId: "too_late" });

    expect(attributeOf(tracing.span("done"), "triage.user.id")).toBeUndefined();
  });

  it("should carry annotations onto spans from any tracer", () => {
    runWithAnnotations({ userId: "u_42", tenantId: "org_7" }, () => {
      trace.getTracer("third-party-http").startSpan("GET /search").end();
    });

    const span = tracing.span("GET /search");
    expect(attributeOf(span, "triage.user.id")).toBe("u_42");
    expect(attributeOf(span, "triage.tenant.id")).toBe("org_7");
  });

  it("should return the callback result", () => {
    expect(runWithAnnotations({ userId: "u1" }, () => getAnnotations().userId)).toBe("u1");
  });

  it("should isolate concurrent call chains", async () => {
    const handle = async (userId: string, delayMs: number): Promise<void> => {
      await context.with(withUser(context.active(), userId), async () => {
        await new Promise((resolve) => setTimeout(resolve, delayMs));
        trace.getTracer("test").startSpan(`work-${userId}`).end();
      });
    };

    await Promise.all([handle("alice", 20), handle("bob", 5)]);

    expect(attributeOf(tracing.span("work-alice"), "triage.user.id")).toBe("alice");
    expect(attributeOf(tracing.span("work-bob"), "triage.user.id")).toBe("bob");
  });

  it("should leave spans without annotations untouched", () => {
    trace.getTracer("test").startSpan("plain", {}, ROOT_CONTEXT).end();

    const keys = Object.keys(tracing.span("plain").attributes);
    expect(keys.filter((key) => key.startsWith("triage."))).toEqual([]);
  });
});
