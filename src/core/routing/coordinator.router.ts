import { createSnapshot, deepFreeze } from "../_shared/utils/snapshot";
import { ConfigurationError } from "../errors/configuration.error";
import type { SessionStateMap } from "../../session/session.types";
import type { ToolRegistry } from "../tools/tool.registry";
import type { ToolArguments } from "../tools/tool.types";
import { CapabilityError, InferenceError } from "./errors";
import type {
  HandlerDefinition,
  HandlerSchema,
  InferenceEngine,
  RouteResult,
  RoutingDecision,
  TeamDefinition,
  TeamSchema,
} from "./routing.types";

export interface CoordinatorRouterOptions {
  readonly team: TeamDefinition;
  readonly tools: ToolRegistry;
  readonly engine: InferenceEngine;
}

function assertToolsRegistered(handler: HandlerDefinition, tools: ToolRegistry): void {
  for (const toolName of handler.tools) {
    if (!tools.get(toolName)) {
      throw new ConfigurationError(
        `CONFIGURATION_ERROR handler '${handler.id}' allows unregistered tool '${toolName}'`
      );
    }
  }
}

function buildCapabilityTable(team: TeamDefinition): ReadonlyMap<string, HandlerDefinition> {
  const table = new Map<string, HandlerDefinition>();
  const seenIds = new Set<string>();

  for (const handler of [team.coordinator, ...team.specialists]) {
    if (seenIds.has(handler.id)) {
      throw new ConfigurationError(`CONFIGURATION_ERROR duplicate handler id '${handler.id}'`);
    }
    seenIds.add(handler.id);

    if (table.has(handler.intent)) {
      throw new ConfigurationError(
        `CONFIGURATION_ERROR intent '${handler.intent}' is claimed by more than one handler`
      );
    }
    table.set(handler.intent, handler);
  }

  return table;
}

/**
 * Decides per turn whether the coordinator handles the utterance with one of
 * its own tools, hands it to exactly one specialist, or declines. Delegation is
 * single level: only the coordinator delegates.
 */
export class CoordinatorRouter {
  private readonly team: TeamDefinition;
  private readonly engine: InferenceEngine;
  private readonly capabilityTable: ReadonlyMap<string, HandlerDefinition>;
  private readonly specialistsById: ReadonlyMap<string, HandlerDefinition>;
  private readonly schema: TeamSchema;

  constructor(options: CoordinatorRouterOptions) {
    this.team = createSnapshot(options.team);
    this.engine = options.engine;
    this.capabilityTable = buildCapabilityTable(this.team);
    this.specialistsById = new Map(this.team.specialists.map((handler) => [handler.id, handler]));

    for (const handler of this.capabilityTable.values()) {
      assertToolsRegistered(handler, options.tools);
    }

    const describe = (handler: HandlerDefinition): HandlerSchema => ({
      id: handler.id,
      description: handler.description,
      intent: handler.intent,
      tools: handler.tools.map((toolName) => {
        const tool = options.tools.get(toolName);
        return {
          name: toolName,
          description: tool?.description ?? "",
          parameters: tool?.parameters ?? [],
        };
      }),
    });
    const schema: TeamSchema = {
      coordinator: describe(this.team.coordinator),
      specialists: this.team.specialists.map(describe),
    };
    this.schema = deepFreeze(schema);
  }

  get coordinator(): HandlerDefinition {
    return this.team.coordinator;
  }

  getCapabilityTable(): ReadonlyMap<string, HandlerDefinition> {
    return this.capabilityTable;
  }

  getTeamSchema(): TeamSchema {
    return this.schema;
  }

  async route(utterance: string, state: SessionStateMap): Promise<RouteResult> {
    const outcome = await this.engine.infer({ utterance, state, team: this.schema });

    switch (outcome.kind) {
      case "decline": {
        const declined: RouteResult = { decision: { kind: "decline" } };
        return deepFreeze(declined);
      }
      case "malformed":
        throw new InferenceError(`unusable decision: ${outcome.reason}`);
      case "self":
        return this.resolveCall(
          { kind: "handle_self", toolName: outcome.toolName },
          this.team.coordinator,
          outcome.toolName,
          outcome.arguments
        );
      case "delegate": {
        const specialist = this.specialistsById.get(outcome.handlerId);
        if (!specialist) {
          throw new InferenceError(`unknown specialist '${outcome.handlerId}'`);
        }
        return this.resolveCall(
          { kind: "delegate", handlerId: specialist.id },
          specialist,
          outcome.toolName,
          outcome.arguments
        );
      }
    }
  }

  private resolveCall(
    decision: Extract<RoutingDecision, { kind: "handle_self" | "delegate" }>,
    handler: HandlerDefinition,
    toolName: string,
    args: ToolArguments
  ): RouteResult {
    if (!handler.tools.includes(toolName)) {
      throw new CapabilityError(handler.id, toolName, handler.tools);
    }
    const routed: RouteResult = {
      decision,
      call: { handler, toolName, arguments: { ...args } },
    };
    return deepFreeze(routed);
  }
}
