import { ConfigurationError } from "../../src/core/errors/configuration.error";
import type {
  InferenceEngine,
  InferenceOutcome,
  InferenceRequest,
} from "../../src/core/routing/routing.types";
import type { TriggerDefinition } from "../../src/policy/schema/team.types";
import type { ToolArguments } from "../../src/core/tools/tool.types";

interface CompiledTrigger {
  readonly definition: TriggerDefinition;
  readonly match: (utterance: string) => ToolArguments | null;
}

function compileTrigger(trigger: TriggerDefinition): CompiledTrigger {
  const raw = trigger.condition.trim();
  if (!raw.startsWith("re:")) {
    const needle = raw.toLowerCase();
    return {
      definition: trigger,
      match: (utterance) => (utterance.toLowerCase().includes(needle) ? {} : null),
    };
  }

  const pattern = raw.slice(3).trim();
  if (pattern === "") {
    throw new ConfigurationError("CONFIGURATION_ERROR trigger condition 're:' requires a pattern");
  }
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, "i");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `CONFIGURATION_ERROR invalid trigger pattern '${pattern}': ${message}`,
      { cause: error }
    );
  }

  return {
    definition: trigger,
    match: (utterance) => {
      const matched = regex.exec(utterance);
      if (!matched) {
        return null;
      }
      const args: Record<string, string> = {};
      for (const [name, value] of Object.entries(matched.groups ?? {})) {
        const trimmed = typeof value === "string" ? value.trim() : "";
        if (trimmed !== "") {
          args[name] = trimmed;
        }
      }
      return args;
    },
  };
}

/**
 * Deterministic stand-in for model inference. The first trigger whose
 * condition matches picks the intent and tool; named regex groups become the
 * tool arguments. No match declines.
 */
export class RuleInferenceEngine implements InferenceEngine {
  private readonly triggers: readonly CompiledTrigger[];

  constructor(triggers: readonly TriggerDefinition[]) {
    this.triggers = triggers.map(compileTrigger);
  }

  async infer(request: InferenceRequest): Promise<InferenceOutcome> {
    for (const trigger of this.triggers) {
      const args = trigger.match(request.utterance);
      if (args === null) {
        continue;
      }

      const { intent, tool } = trigger.definition;
      if (request.team.coordinator.intent === intent) {
        return { kind: "self", toolName: tool, arguments: args };
      }
      const specialist = request.team.specialists.find((handler) => handler.intent === intent);
      if (!specialist) {
        return { kind: "malformed", reason: `no handler serves intent '${intent}'` };
      }
      return { kind: "delegate", handlerId: specialist.id, toolName: tool, arguments: args };
    }

    return { kind: "decline" };
  }
}
