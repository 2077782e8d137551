import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { CoordinatorRouter } from "../../src/core/routing/coordinator.router";
import { InferenceError } from "../../src/core/routing/errors";
import type { RouteResult } from "../../src/core/routing/routing.types";
import type { ToolRegistry } from "../../src/core/tools/tool.registry";
import type { ToolPayload, ToolResult } from "../../src/core/tools/tool.types";
import type { SessionStateMap, StateValue, StateWrite } from "../../src/session/session.types";

export const TURN_REPLIES = Object.freeze({
  toolFailure: (message: string) => `Sorry, I couldn't complete that request: ${message}`,
  inferenceFailure: "Sorry, I couldn't work out how to handle that request.",
  declined: "Sorry, I can't help with that request.",
});

export type TurnStage =
  | "START"
  | "ROUTED"
  | "SELF_TOOL"
  | "DELEGATED_TOOL"
  | "DECLINED"
  | "FINALIZED";

export interface TurnFailure {
  readonly kind: "inference" | "tool";
  readonly message: string;
}

export const TurnStateAnnotation = Annotation.Root({
  utterance: Annotation<string>,
  snapshot: Annotation<SessionStateMap>,
  stage: Annotation<TurnStage>,
  routeResult: Annotation<RouteResult | undefined>,
  toolResult: Annotation<ToolResult | undefined>,
  failure: Annotation<TurnFailure | undefined>,
  finalText: Annotation<string | undefined>,
  pendingWrite: Annotation<StateWrite | undefined>,
});

export type TurnState = typeof TurnStateAnnotation.State;
type TurnUpdate = typeof TurnStateAnnotation.Update;

export interface TurnGraphDeps {
  readonly router: CoordinatorRouter;
  readonly tools: ToolRegistry;
}

function responseText(payload: ToolPayload, field: string | undefined): string {
  const value: StateValue | undefined = field ? payload[field] : undefined;
  if (typeof value === "string") {
    return value;
  }
  return typeof value === "undefined" ? JSON.stringify(payload) : String(value);
}

function routeNext(state: TurnState): "self_tool" | "delegated_tool" | "declined" | "finalize" {
  if (state.failure || !state.routeResult) {
    return "finalize";
  }
  switch (state.routeResult.decision.kind) {
    case "handle_self":
      return "self_tool";
    case "delegate":
      return "delegated_tool";
    case "decline":
      return "declined";
  }
}

/**
 * route -> {self_tool | delegated_tool | declined} -> finalize. Node names
 * must not reuse a state channel name. The graph
 * computes the final text and the pending state write; committing the write
 * is left to the caller.
 */
export function buildTurnGraph(deps: TurnGraphDeps) {
  const runTool =
    (stage: "SELF_TOOL" | "DELEGATED_TOOL") =>
    async (state: TurnState): Promise<TurnUpdate> => {
      if (!state.routeResult || !("call" in state.routeResult)) {
        throw new Error(`TURN_GRAPH_ERROR ${stage} reached without a tool call`);
      }
      const { call } = state.routeResult;
      const toolResult = await deps.tools.execute(call.toolName, call.arguments, state.snapshot);
      if (toolResult.kind === "failure") {
        return { stage, toolResult, failure: { kind: "tool", message: toolResult.error.message } };
      }
      return { stage, toolResult };
    };

  const graph = new StateGraph(TurnStateAnnotation)
    .addNode("route", async (state: TurnState): Promise<TurnUpdate> => {
      try {
        const routeResult = await deps.router.route(state.utterance, state.snapshot);
        return { stage: "ROUTED", routeResult };
      } catch (error) {
        if (error instanceof InferenceError) {
          return { stage: "ROUTED", failure: { kind: "inference", message: error.message } };
        }
        throw error;
      }
    })
    .addNode("self_tool", runTool("SELF_TOOL"))
    .addNode("delegated_tool", runTool("DELEGATED_TOOL"))
    .addNode("declined", async (): Promise<TurnUpdate> => ({ stage: "DECLINED" }))
    .addNode("finalize", async (state: TurnState): Promise<TurnUpdate> => {
      if (state.failure?.kind === "inference") {
        return { stage: "FINALIZED", finalText: TURN_REPLIES.inferenceFailure };
      }
      if (state.failure?.kind === "tool") {
        return { stage: "FINALIZED", finalText: TURN_REPLIES.toolFailure(state.failure.message) };
      }
      const result = state.toolResult;
      if (!state.routeResult || !("call" in state.routeResult) || !result || result.kind !== "success") {
        return { stage: "FINALIZED", finalText: TURN_REPLIES.declined };
      }

      const { call } = state.routeResult;
      const finalText = responseText(result.payload, deps.tools.get(call.toolName)?.responseField);
      const write: Record<string, StateValue> = { ...(result.stateWrite ?? {}) };
      if (call.handler.outputKey) {
        write[call.handler.outputKey] = finalText;
      }
      return {
        stage: "FINALIZED",
        finalText,
        pendingWrite: Object.keys(write).length > 0 ? Object.freeze(write) : undefined,
      };
    })
    .addEdge(START, "route")
    .addConditionalEdges("route", routeNext, [
      "self_tool",
      "delegated_tool",
      "declined",
      "finalize",
    ])
    .addEdge("self_tool", "finalize")
    .addEdge("delegated_tool", "finalize")
    .addEdge("declined", "finalize")
    .addEdge("finalize", END);

  return graph.compile();
}

export type TurnGraph = ReturnType<typeof buildTurnGraph>;

export async function runTurnGraph(
  graph: TurnGraph,
  input: { utterance: string; snapshot: SessionStateMap }
): Promise<TurnState> {
  return graph.invoke({
    utterance: input.utterance,
    snapshot: input.snapshot,
    stage: "START",
    routeResult: undefined,
    toolResult: undefined,
    failure: undefined,
    finalText: undefined,
    pendingWrite: undefined,
  });
}
