/**
 * Hierarchy spans: workflow / task / agent / tool (traceloop conventions).
 *
 * A workflow writes its name into the context it returns; tasks, agents and
 * tools started beneath it read that slot and stamp `traceloop.workflow.name`.
 */

import {
  type Attributes,
  type Context,
  context,
  createContextKey,
  ROOT_CONTEXT,
  type Span,
  trace,
} from "@opentelemetry/api";
import {
  ATTR_AGENT_NAME,
  ATTR_ENTITY_NAME,
  ATTR_SPAN_KIND,
  ATTR_WORKFLOW_NAME,
  TRACER_NAME,
} from "./constants.js";
import type { ScopedSpan } from "./types.js";

export type HierarchySpanKind = "workflow" | "task" | "agent" | "tool";

const WORKFLOW_NAME_KEY = createContextKey("triage.workflow.name");

/** Name of the workflow `ctx` descends from, if any */
export function getWorkflowName(ctx: Context = context.active()): string | undefined {
  const value = ctx.getValue(WORKFLOW_NAME_KEY);
  return typeof value === "string" && value !== "" ? value : undefined;
}

export class HierarchySpan implements ScopedSpan {
  private ended = false;

  private constructor(
    readonly kind: HierarchySpanKind,
    readonly name: string,
    private readonly span: Span | undefined,
    private readonly scope: Context,
  ) {}

  /** @internal */
  static start(kind: HierarchySpanKind, name: string, parent: Context): HierarchySpan {
    const span = trace.getTracer(TRACER_NAME).startSpan(name, {}, parent);

    const attributes: Attributes = {
      [ATTR_SPAN_KIND]: kind,
      [ATTR_ENTITY_NAME]: name,
    };
    if (kind === "agent") {
      attributes[ATTR_AGENT_NAME] = name;
    }

    let scope = trace.setSpan(parent, span);
    if (kind === "workflow") {
      attributes[ATTR_WORKFLOW_NAME] = name;
      scope = scope.setValue(WORKFLOW_NAME_KEY, name);
    } else {
      const workflow = getWorkflowName(parent);
      if (workflow !== undefined) {
        attributes[ATTR_WORKFLOW_NAME] = workflow;
      }
    }
    span.setAttributes(attributes);

    return new HierarchySpan(kind, name, span, scope);
  }

  /** An inert placeholder; `end()` is a no-op and `context` is the root context */
  static unopened(kind: HierarchySpanKind, name = ""): HierarchySpan {
    return new HierarchySpan(kind, name, undefined, ROOT_CONTEXT);
  }

  /** Context carrying this span; spans started from it nest underneath */
  get context(): Context {
    return this.scope;
  }

  /** Underlying span, for attributes the SDK does not model */
  get otelSpan(): Span | undefined {
    return this.span;
  }

  /** End the span. Idempotent. */
  end(): void {
    if (this.span === undefined || this.ended) return;
    this.ended = true;
    this.span.end();
  }
}

/**
 * Start a workflow span: the top-level grouping of a multi-step pipeline.
 *
 * @example
 * ```typescript
 * const wf = startWorkflow("chat-pipeline");
 * try {
 *   const task = startTask("parse-input", wf.context);
 *   task.end();
 * } finally {
 *   wf.end();
 * }
 * ```
 */
export function startWorkflow(name: string, parent: Context = context.active()): HierarchySpan {
  return HierarchySpan.start("workflow", name, parent);
}

/** Start a task span: a discrete step within a workflow */
export function startTask(name: string, parent: Context = context.active()): HierarchySpan {
  return HierarchySpan.start("task", name, parent);
}

/** Start an agent span: an autonomous entity making LLM calls and using tools */
export function startAgent(name: string, parent: Context = context.active()): HierarchySpan {
  return HierarchySpan.start("agent", name, parent);
}

/** Start a tool execution span */
export function startTool(name: string, parent: Context = context.active()): HierarchySpan {
  return HierarchySpan.start("tool", name, parent);
}
