import { InferenceError } from "../../src/core/routing/errors";
import type {
  HandlerSchema,
  InferenceEngine,
  InferenceOutcome,
  InferenceRequest,
} from "../../src/core/routing/routing.types";
import type { ToolArguments } from "../../src/core/tools/tool.types";
import type { StateValue } from "../../src/session/session.types";
import type { LLMClient } from "../llm/llm.types";

const DEFAULT_DECISION_ATTEMPTS = 2;

export interface LlmInferenceEngineOptions {
  readonly llm: LLMClient;
  /** Total prompts per decision, counting the first; later ones follow an unusable reply. Defaults to 2. */
  readonly maxAttempts?: number;
}

function describeHandler(handler: HandlerSchema): string {
  const tools = handler.tools
    .map((tool) => {
      const params = tool.parameters
        .map((param) => `${param.name}${param.required ? "" : "?"}: ${param.description}`)
        .join("; ");
      return `    - ${tool.name}(${params}): ${tool.description}`;
    })
    .join("\n");
  return `  - id: ${handler.id}\n    handles: ${handler.intent}\n    description: ${handler.description}\n    tools:\n${tools}`;
}

export function buildDecisionPrompt(request: InferenceRequest): string {
  const { coordinator, specialists } = request.team;
  const specialistBlock =
    specialists.length === 0 ? "  (none)" : specialists.map(describeHandler).join("\n");

  return [
    `You are the coordinator '${coordinator.id}': ${coordinator.description}`,
    "Decide how to handle the user's message. Use one of your own tools, delegate to exactly one specialist, or decline.",
    "",
    "Your tools:",
    describeHandler(coordinator),
    "",
    "Specialists:",
    specialistBlock,
    "",
    `Session state: ${JSON.stringify(request.state)}`,
    `User message: ${JSON.stringify(request.utterance)}`,
    "",
    "Reply with a single JSON object and nothing else:",
    '{"action":"self","tool":"<tool name>","arguments":{...}}',
    '{"action":"delegate","handler":"<specialist id>","tool":"<specialist tool>","arguments":{...}}',
    '{"action":"decline"}',
  ].join("\n");
}

function stripCodeFence(raw: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(raw);
  return (fenced?.[1] ?? raw).trim();
}

function isStateValue(value: unknown): value is StateValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function readArguments(value: unknown): ToolArguments | null {
  if (typeof value === "undefined" || value === null) {
    return {};
  }
  if (typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  const args: Record<string, StateValue> = {};
  for (const [name, entry] of Object.entries(value)) {
    if (!isStateValue(entry)) {
      return null;
    }
    args[name] = entry;
  }
  return args;
}

function readName(row: Record<string, unknown>, field: string): string | null {
  const value = row[field];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

export function parseDecision(raw: string): InferenceOutcome {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch {
    return { kind: "malformed", reason: "reply is not valid JSON" };
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return { kind: "malformed", reason: "reply must be a JSON object" };
  }
  const row: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));

  const action = readName(row, "action");
  if (action === "decline") {
    return { kind: "decline" };
  }
  if (action !== "self" && action !== "delegate") {
    return { kind: "malformed", reason: `unknown action '${String(row.action)}'` };
  }

  const toolName = readName(row, "tool");
  if (!toolName) {
    return { kind: "malformed", reason: "tool must be a non-empty string" };
  }
  const args = readArguments(row.arguments);
  if (!args) {
    return { kind: "malformed", reason: "arguments must be an object of scalar values" };
  }

  if (action === "self") {
    return { kind: "self", toolName, arguments: args };
  }
  const handlerId = readName(row, "handler");
  if (!handlerId) {
    return { kind: "malformed", reason: "handler must be a non-empty string" };
  }
  return { kind: "delegate", handlerId, toolName, arguments: args };
}

export class LlmInferenceEngine implements InferenceEngine {
  private readonly llm: LLMClient;
  private readonly maxAttempts: number;

  constructor(options: LlmInferenceEngineOptions) {
    this.llm = options.llm;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_DECISION_ATTEMPTS);
  }

  async infer(request: InferenceRequest): Promise<InferenceOutcome> {
    const basePrompt = buildDecisionPrompt(request);
    let outcome: InferenceOutcome = { kind: "malformed", reason: "no attempt made" };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const prompt =
        outcome.kind === "malformed" && attempt > 1
          ? `${basePrompt}\n\nYour previous reply was rejected (${outcome.reason}). Reply with JSON only.`
          : basePrompt;

      let reply: string;
      try {
        reply = await this.llm.generate(prompt);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new InferenceError(`model request failed: ${message}`, { cause: error });
      }

      outcome = parseDecision(reply);
      if (outcome.kind !== "malformed") {
        return outcome;
      }
    }

    return outcome;
  }
}
