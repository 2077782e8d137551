import test from "node:test";
import assert from "node:assert/strict";
import { ConfigurationError } from "../../../src/core/errors/configuration.error";
import { createLLMClientFromProviderConfig } from "../../../runtime/llm/provider.client";
import { DEFAULT_GEMINI_MODEL, resolveProviderConfig } from "../../../runtime/llm/provider.router";
import { GeminiAdapter } from "../../../runtime/llm/gemini.adapter";
import { LocalLLMClient } from "../../../runtime/llm/local.adapter";

test("provider router: defaults to the rules engine without a model", () => {
  assert.deepEqual(resolveProviderConfig({}, {}), {
    provider: "rules",
    model: undefined,
    timeoutMs: 30000,
    maxAttempts: 3,
    backoffMs: [500, 1000],
  });
});

test("provider router: flags win over environment variables", () => {
  const config = resolveProviderConfig(
    { provider: "ollama", model: "flag-model", timeoutMs: 5000, maxAttempts: 1 },
    { LLM_PROVIDER: "gemini", LLM_MODEL: "env-model", LLM_TIMEOUT_MS: "10", LLM_MAX_ATTEMPTS: "9" }
  );
  assert.deepEqual(config, {
    provider: "ollama",
    model: "flag-model",
    timeoutMs: 5000,
    maxAttempts: 1,
    backoffMs: [],
  });
});

test("provider router: environment fills what flags leave out", () => {
  const config = resolveProviderConfig(
    {},
    { LLM_PROVIDER: " Gemini ", LLM_TIMEOUT_MS: "1500", LLM_MAX_ATTEMPTS: "2", GEMINI_API_KEY: "test-key" }
  );
  assert.equal(config.provider, "gemini");
  assert.equal(config.model, DEFAULT_GEMINI_MODEL);
  assert.equal(config.timeoutMs, 1500);
  assert.deepEqual(config.backoffMs, [500]);
});

test("provider router: invalid values are configuration errors", () => {
  const cases: Array<[Parameters<typeof resolveProviderConfig>[0], Parameters<typeof resolveProviderConfig>[1], RegExp]> = [
    [{ provider: "openai" }, {}, /unsupported provider='openai'/],
    [{ provider: "gemini" }, {}, /GEMINI_API_KEY is required/],
    [{ timeoutMs: 0 }, {}, /timeoutMs must be > 0/],
    [{}, { LLM_TIMEOUT_MS: "abc" }, /timeoutMs must be an integer/],
    [{ maxAttempts: 0 }, {}, /maxAttempts must be >= 1/],
  ];
  for (const [args, env, pattern] of cases) {
    assert.throws(
      () => resolveProviderConfig(args, env),
      (error: unknown) => error instanceof ConfigurationError && pattern.test(error.message)
    );
  }
});

test("provider client: builds the adapter for each model provider and refuses rules", () => {
  const base = { timeoutMs: 1000, maxAttempts: 1, backoffMs: [] };
  assert.ok(
    createLLMClientFromProviderConfig({ ...base, provider: "ollama" }, {}) instanceof LocalLLMClient
  );
  assert.ok(
    createLLMClientFromProviderConfig(
      { ...base, provider: "gemini" },
      { GEMINI_API_KEY: "test-key" }
    ) instanceof GeminiAdapter
  );
  assert.throws(
    () => createLLMClientFromProviderConfig({ ...base, provider: "rules" }, {}),
    /provider 'rules' does not use a language model/
  );
});
