/**
 * In-process tracing harness for span assertions.
 *
 * Registers a NodeTracerProvider as the global provider with a synchronous
 * SimpleSpanProcessor + InMemorySpanExporter, so finished spans are readable
 * as soon as `end()` returns. Extra processors (e.g. TriageSpanProcessor) run
 * before the exporter.
 */

import { type AttributeValue, trace } from "@opentelemetry/api";
import {
  InMemorySpanExporter,
  type ReadableSpan,
  SimpleSpanProcessor,
  type SpanProcessor,
} from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";

export interface TestTracing {
  readonly provider: NodeTracerProvider;
  readonly exporter: InMemorySpanExporter;
  /** All spans ended so far */
  spans(): ReadableSpan[];
  /** The single finished span with this name; throws when absent or ambiguous */
  span(name: string): ReadableSpan;
  /** Unregister the provider and drop recorded spans */
  shutdown(): Promise<void>;
}

export function createTestTracing(processors: readonly SpanProcessor[] = []): TestTracing {
  const exporter = new InMemorySpanExporter();
  const provider = new NodeTracerProvider();
  for (const processor of processors) {
    provider.addSpanProcessor(processor);
  }
  provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
  trace.disable(); // Clear any previous global provider
  provider.register();

  return {
    provider,
    exporter,
    spans: () => exporter.getFinishedSpans(),
    span(name: string): ReadableSpan {
      const matches = exporter.getFinishedSpans().filter((s) => s.name === name);
      const [only] = matches;
      if (only === undefined || matches.length > 1) {
        throw new Error(`Expected exactly one span named "${name}", found ${matches.length}`);
      }
      return only;
    },
    async shutdown(): Promise<void> {
      trace.disable();
      exporter.reset();
      await provider.shutdown();
    },
  };
}

/** Attribute value on a finished span (undefined when absent) */
export function attributeOf(span: ReadableSpan, key: string): AttributeValue | undefined {
  return span.attributes[key];
}

/** Attribute keys of a finished span that start with `prefix` */
export function attributeKeysWithPrefix(span: ReadableSpan, prefix: string): string[] {
  return Object.keys(span.attributes).filter((key) => key.startsWith(prefix));
}
