import test from "node:test";
import assert from "node:assert/strict";
import { GeminiAdapter, extractResponseText } from "../../../runtime/llm/gemini.adapter";
import { DEFAULT_OLLAMA_MODEL, LocalLLMClient } from "../../../runtime/llm/local.adapter";
import type { ProviderConfig } from "../../../runtime/llm/provider.config";

interface CapturedRequest {
  readonly url: string;
  readonly headers: Headers;
  readonly body: unknown;
}

function stubFetch(t: test.TestContext, responses: Response[]): CapturedRequest[] {
  const captured: CapturedRequest[] = [];
  t.mock.method(globalThis, "fetch", async (...args: Parameters<typeof fetch>) => {
    const [input, init] = args;
    captured.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: JSON.parse(String(init?.body ?? "null")),
    });
    const next = responses.shift();
    if (!next) {
      throw new Error("unexpected fetch");
    }
    return next;
  });
  return captured;
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function geminiBody(text: string): unknown {
  return { candidates: [{ content: { parts: [{ text }] } }] };
}

const GEMINI_CONFIG: ProviderConfig = {
  provider: "gemini",
  model: "gemini-test",
  timeoutMs: 1000,
  maxAttempts: 2,
  backoffMs: [0],
};

test("ollama client: posts a json-format generate request and returns the response text", async (t) => {
  const captured = stubFetch(t, [jsonResponse({ response: '{"action":"decline"}' })]);
  const client = new LocalLLMClient(
    { provider: "ollama", timeoutMs: 1000, maxAttempts: 1, backoffMs: [] },
    { OLLAMA_BASE_URL: "http://ollama.test:11434" }
  );

  assert.equal(await client.generate("route this"), '{"action":"decline"}');
  assert.equal(captured[0]?.url, "http://ollama.test:11434/api/generate");
  assert.deepEqual(captured[0]?.body, {
    model: DEFAULT_OLLAMA_MODEL,
    prompt: "route this",
    stream: false,
    format: "json",
  });
});

test("ollama client: model comes from config, then OLLAMA_MODEL, then the default", async (t) => {
  const captured = stubFetch(t, [
    jsonResponse({ response: "a" }),
    jsonResponse({ response: "b" }),
    jsonResponse({ response: "c" }),
  ]);
  const base: ProviderConfig = { provider: "ollama", timeoutMs: 1000, maxAttempts: 1, backoffMs: [] };

  await new LocalLLMClient({ ...base, model: "flag-model" }, { OLLAMA_MODEL: "env-model" }).generate("1");
  await new LocalLLMClient(base, { OLLAMA_MODEL: "env-model" }).generate("2");
  await new LocalLLMClient(base, { OLLAMA_MODEL: "   " }).generate("3");

  const models = captured.map((request) =>
    typeof request.body === "object" && request.body !== null ? Reflect.get(request.body, "model") : undefined
  );
  assert.deepEqual(models, ["flag-model", "env-model", DEFAULT_OLLAMA_MODEL]);
});

test("ollama client: non-2xx responses throw with the status", async (t) => {
  stubFetch(t, [new Response("model missing", { status: 404 })]);
  const client = new LocalLLMClient({ provider: "ollama", timeoutMs: 1000, maxAttempts: 1, backoffMs: [] }, {});
  await assert.rejects(client.generate("x"), /OLLAMA_HTTP_404: model missing/);
});

test("ollama client: retries transient statuses up to maxAttempts", async (t) => {
  const captured = stubFetch(t, [
    new Response("busy", { status: 503 }),
    jsonResponse({ response: "ok" }),
    new Response("busy", { status: 503 }),
    new Response("still busy", { status: 503 }),
  ]);
  const client = new LocalLLMClient(
    { provider: "ollama", timeoutMs: 1000, maxAttempts: 2, backoffMs: [0] },
    {}
  );

  assert.equal(await client.generate("first"), "ok");
  assert.equal(captured.length, 2);

  await assert.rejects(client.generate("second"), /OLLAMA_HTTP_503: still busy/);
  assert.equal(captured.length, 4);
});

test("gemini adapter: sends the key header and asks for JSON output", async (t) => {
  const captured = stubFetch(t, [jsonResponse(geminiBody(' {"action":"decline"} '))]);
  const adapter = new GeminiAdapter(GEMINI_CONFIG, { GEMINI_API_KEY: "test-key" });

  assert.equal(await adapter.generate("route this"), '{"action":"decline"}');
  const request = captured[0];
  assert.ok(request);
  assert.equal(
    request.url,
    "https://generativelanguage.googleapis.com/v1beta/models/gemini-test:generateContent"
  );
  assert.equal(request.headers.get("x-goog-api-key"), "test-key");
  assert.deepEqual(request.body, {
    contents: [{ parts: [{ text: "route this" }] }],
    generationConfig: { responseMimeType: "application/json" },
  });
});

test("gemini adapter: retries transient statuses and fails fast on permanent ones", async (t) => {
  const captured = stubFetch(t, [
    new Response("busy", { status: 503 }),
    jsonResponse(geminiBody("ok")),
    new Response("denied", { status: 403 }),
  ]);
  const adapter = new GeminiAdapter(GEMINI_CONFIG, { GEMINI_API_KEY: "test-key" });

  assert.equal(await adapter.generate("first"), "ok");
  assert.equal(captured.length, 2);

  await assert.rejects(adapter.generate("second"), /GEMINI_PERMANENT_HTTP_403: request failed/);
  assert.equal(captured.length, 3);
});

test("gemini adapter: requires an API key", () => {
  assert.throws(() => new GeminiAdapter(GEMINI_CONFIG, {}), /GEMINI_API_KEY is required/);
});

test("gemini adapter: extracts and joins candidate text parts", () => {
  assert.equal(
    extractResponseText({ candidates: [{ content: { parts: [{ text: "a" }, { text: "b" }, {}] } }] }),
    "ab"
  );
  assert.equal(extractResponseText({ candidates: [] }), null);
  assert.equal(extractResponseText({ candidates: [{ content: { parts: [{ text: "  " }] } }] }), null);
  assert.equal(extractResponseText("nope"), null);
});
