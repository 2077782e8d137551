import type { LLMClient } from "./llm.types";
import type { ProviderConfig } from "./provider.config";
import { GeminiAdapter } from "./gemini.adapter";
import { LocalLLMClient } from "./local.adapter";
import { ConfigurationError } from "../../src/core/errors/configuration.error";

export function createLLMClientFromProviderConfig(
  config: ProviderConfig,
  env: NodeJS.ProcessEnv = process.env
): LLMClient {
  if (config.provider === "ollama") {
    return new LocalLLMClient(config, env);
  }
  if (config.provider === "gemini") {
    return new GeminiAdapter(config, env);
  }
  throw new ConfigurationError(
    `CONFIGURATION_ERROR provider '${config.provider}' does not use a language model`
  );
}
