import { createTestTracing, type TestTracing } from "@triage/test-utils";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { logPrompt } from "../llm.js";

vi.mock("../setup.js", () => ({
  shouldTraceContent: () => false,
}));

describe("LLM spans with content tracing disabled", () => {
  let tracing: TestTracing;

  beforeEach(() => {
    tracing = createTestTracing();
  });

  afterEach(async () => {
    await tracing.shutdown();
  });

  it("should keep metadata and usage but drop messages and tool definitions", () => {
    const { span } = logPrompt({
      vendor: "openai",
      model: "gpt-4o",
      temperature: 0.2,
      messages: [{ role: "user", content: "my card number is 4111" }],
      tools: [{ name: "charge_card", parameters: { type: "object" } }],
    });
    span.logCompletion({
      model: "gpt-4o",
      messages: [
        {
          role: "assistant",
          toolCalls: [{ id: "call_1", name: "charge_card", arguments: "{}" }],
        },
      ],
      usage: { inputTokens: 8, outputTokens: 2 },
      finishReason: "tool_calls",
    });

    expect(tracing.span("openai.chat gpt-4o").attributes).toEqual({
      "gen_ai.system": "openai",
      "llm.vendor": "openai",
      "gen_ai.request.model": "gpt-4o",
      "llm.request.model": "gpt-4o",
      "llm.request.type": "chat",
      "gen_ai.request.temperature": 0.2,
      "gen_ai.response.model": "gpt-4o",
      "llm.response.model": "gpt-4o",
      "gen_ai.response.finish_reason": "tool_calls",
      "gen_ai.usage.input_tokens": 8,
      "llm.usage.prompt_tokens": 8,
      "gen_ai.usage.output_tokens": 2,
      "llm.usage.completion_tokens": 2,
    });
  });
});
