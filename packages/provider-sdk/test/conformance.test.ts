import test from "node:test";
import assert from "node:assert/strict";
import { ReadableStream } from "node:stream/web";
import {
  AnthropicAdapter,
  GoogleAdapter,
  OpenAIAdapter,
  ProviderRequestError,
  createGenerationClient,
  readServerSentData
} from "../src/index.js";
import type { ModelClientConfig } from "../src/index.js";

interface CapturedRequest {
  url: string;
  body: Record<string, unknown>;
  headers: Record<string, string>;
}

const captured: CapturedRequest[] = [];

function sse(events: unknown[]): string {
  return events.map((event) => `data: ${typeof event === "string" ? event : JSON.stringify(event)}\n\n`).join("");
}

function setMockFetch(status: number, body: string): void {
  captured.length = 0;
  globalThis.fetch = async (input: string | URL | Request, init?: RequestInit) => {
    captured.push({
      url: String(input),
      body: typeof init?.body === "string" ? (JSON.parse(init.body) as Record<string, unknown>) : {},
      headers: (init?.headers ?? {}) as Record<string, string>
    });
    return new Response(body, { status });
  };
}

function config(overrides: Partial<ModelClientConfig> = {}): ModelClientConfig {
  return {
    providerKind: "openai",
    model: "model-x",
    apiKey: "test-key",
    inputCostPer1k: 0.01,
    outputCostPer1k: 0.03,
    baseUrl: "https://api.example.com/v1/",
    ...overrides
  };
}

test("openai adapter streams deltas and uses reported usage", async () => {
  setMockFetch(
    200,
    sse([
      { choices: [{ delta: { content: "Hello" } }] },
      { choices: [{ delta: { content: " world" }, finish_reason: "stop" }] },
      { choices: [], usage: { prompt_tokens: 10, completion_tokens: 2 } },
      "[DONE]"
    ])
  );
  const client = new OpenAIAdapter(config());
  const result = await client.generate({ prompt: "hi", maxTokens: 50, temperature: 0.3 });

  assert.equal(result.text, "Hello world");
  assert.equal(result.inputTokens, 10);
  assert.equal(result.outputTokens, 2);
  assert.ok(Math.abs(result.totalCost - 0.00016) < 1e-12);
  assert.equal(typeof result.timeToFirstToken, "number");
  assert.equal(result.metadata.provider, "openai");
  assert.equal(result.metadata.usageReported, true);

  assert.equal(captured[0]?.url, "https://api.example.com/v1/chat/completions");
  assert.equal(captured[0]?.body.stream, true);
  assert.equal(captured[0]?.body.max_tokens, 50);
  assert.equal(captured[0]?.headers.authorization, "Bearer test-key");
});

test("anthropic adapter reads usage from message events", async () => {
  setMockFetch(
    200,
    sse([
      { type: "message_start", message: { usage: { input_tokens: 4, output_tokens: 1 } } },
      { type: "content_block_start", index: 0 },
      { type: "content_block_delta", delta: { type: "text_delta", text: "world" } },
      { type: "message_delta", usage: { output_tokens: 3 } },
      { type: "message_stop" }
    ])
  );
  const client = new AnthropicAdapter(config({ providerKind: "anthropic" }));
  const result = await client.generate({ prompt: "hi" });

  assert.equal(result.text, "world");
  assert.equal(result.inputTokens, 4);
  assert.equal(result.outputTokens, 3);
  assert.equal(result.metadata.provider, "anthropic");
  assert.equal(captured[0]?.url, "https://api.example.com/v1/messages");
  assert.equal(captured[0]?.headers["x-api-key"], "test-key");
});

test("google adapter estimates tokens when usage is missing", async () => {
  setMockFetch(
    200,
    sse([
      { candidates: [{ content: { parts: [{ text: "hi there" }] } }] },
      { candidates: [{ content: { parts: [{ text: " everyone" }] }, finishReason: "STOP" }] }
    ])
  );
  const client = new GoogleAdapter(config({ providerKind: "google", model: "gemini-x" }));
  const result = await client.generate({ prompt: "say hi to everyone" });

  assert.equal(result.text, "hi there everyone");
  assert.equal(result.inputTokens, 5);
  assert.equal(result.outputTokens, 3);
  assert.equal(result.metadata.usageReported, false);
  assert.equal(captured[0]?.url, "https://api.example.com/v1/models/gemini-x:streamGenerateContent?alt=sse");
});

test("maps provider errors to ProviderRequestError", async () => {
  setMockFetch(401, "unauthorized");
  const client = new OpenAIAdapter(config());
  await assert.rejects(
    () => client.generate({ prompt: "hi" }),
    (error: unknown) => error instanceof ProviderRequestError && error.status === 401 && /401/.test(error.message)
  );
});

test("anthropic stream error events reject the generation", async () => {
  setMockFetch(200, sse([{ type: "error", error: { message: "overloaded" } }]));
  const client = new AnthropicAdapter(config({ providerKind: "anthropic" }));
  await assert.rejects(() => client.generate({ prompt: "hi" }), /overloaded/);
});

test("factory selects the adapter for each provider kind", () => {
  assert.ok(createGenerationClient(config({ providerKind: "openai" })) instanceof OpenAIAdapter);
  assert.ok(createGenerationClient(config({ providerKind: "anthropic" })) instanceof AnthropicAdapter);
  const google = createGenerationClient(config({ providerKind: "google", model: "gemini-x" }));
  assert.ok(google instanceof GoogleAdapter);
  assert.equal(google.model, "gemini-x");
});

test("server-sent data survives split reads and CRLF framing", async () => {
  const encoder = new TextEncoder();
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(encoder.encode('data: {"a"'));
      controller.enqueue(encoder.encode(":1}\r\n\r\nevent: ping\r\ndata: x\r\n\r\n"));
      controller.enqueue(encoder.encode("data: tail"));
      controller.close();
    }
  });
  const payloads: string[] = [];
  for await (const payload of readServerSentData(new Response(stream))) {
    payloads.push(payload);
  }
  assert.deepEqual(payloads, ['{"a":1}', "x", "tail"]);
});

test("a malformed chunk cancels the response body", async () => {
  const encoder = new TextEncoder();
  let cancelled = false;
  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      controller.enqueue(encoder.encode("data: {not json}\n\n"));
    },
    cancel() {
      cancelled = true;
    }
  });
  globalThis.fetch = async () => new Response(stream);

  const client = new OpenAIAdapter(config());
  await assert.rejects(() => client.generate({ prompt: "hi" }), /malformed stream chunk/);
  assert.equal(cancelled, true);
});

test("a consumer that stops early cancels the body", async () => {
  const encoder = new TextEncoder();
  let cancelled = false;
  const stream = new ReadableStream<Uint8Array>({
    pull(controller) {
      controller.enqueue(encoder.encode("data: chunk\n\n"));
    },
    cancel() {
      cancelled = true;
    }
  });
  for await (const payload of readServerSentData(new Response(stream))) {
    assert.equal(payload, "chunk");
    break;
  }
  assert.equal(cancelled, true);
});
