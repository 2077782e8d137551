import type { InferenceEngine } from "../../src/core/routing/routing.types";
import type { TriggerDefinition } from "../../src/policy/schema/team.types";
import { createLLMClientFromProviderConfig } from "../llm/provider.client";
import type { ProviderConfig } from "../llm/provider.config";
import { LlmInferenceEngine } from "./llm.inference";
import { RuleInferenceEngine } from "./rule.inference";

export interface InferenceEngineFactoryInput {
  readonly provider: ProviderConfig;
  readonly triggers: readonly TriggerDefinition[];
  readonly env?: NodeJS.ProcessEnv;
}

export function createInferenceEngine(input: InferenceEngineFactoryInput): InferenceEngine {
  if (input.provider.provider === "rules") {
    return new RuleInferenceEngine(input.triggers);
  }
  return new LlmInferenceEngine({
    llm: createLLMClientFromProviderConfig(input.provider, input.env ?? process.env),
    maxAttempts: input.provider.maxAttempts,
  });
}
