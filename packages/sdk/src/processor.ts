/**
 * TriageSpanProcessor: copies the ambient annotations onto every span at start.
 *
 * OpenTelemetry hands `onStart` the context the span was created from, so the
 * annotations set by `withUser()` & co. land on every descendant span,
 * including spans started by third-party instrumentation.
 */

import type { Context } from "@opentelemetry/api";
import type { ReadableSpan, Span, SpanProcessor } from "@opentelemetry/sdk-trace-base";
import { projectAnnotations } from "./annotations.js";
import { getAnnotations } from "./context.js";

export class TriageSpanProcessor implements SpanProcessor {
  onStart(span: Span, parentContext: Context): void {
    const attributes = projectAnnotations(getAnnotations(parentContext));
    if (attributes.length > 0) {
      span.setAttributes(Object.fromEntries(attributes));
    }
  }

  onEnd(_span: ReadableSpan): void {
    // attributes are written at start only
  }

  forceFlush(): Promise<void> {
    return Promise.resolve();
  }

  shutdown(): Promise<void> {
    return Promise.resolve();
  }
}
