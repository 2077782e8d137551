import type { SessionStateMap } from "../../session/session.types";
import type { ToolArguments, ToolParameter } from "../tools/tool.types";

/** One row of the capability table: a handler and the tools it may invoke. */
export interface HandlerDefinition {
  readonly id: string;
  readonly description: string;
  readonly intent: string;
  readonly tools: readonly string[];
  /** State key that captures the handler's final text after a successful turn. */
  readonly outputKey?: string;
}

export interface TeamDefinition {
  readonly appName: string;
  readonly coordinator: HandlerDefinition;
  readonly specialists: readonly HandlerDefinition[];
  readonly initialState: SessionStateMap;
}

export type RoutingDecision =
  | { readonly kind: "handle_self"; readonly toolName: string }
  | { readonly kind: "delegate"; readonly handlerId: string }
  | { readonly kind: "decline" };

export interface ToolCall {
  readonly handler: HandlerDefinition;
  readonly toolName: string;
  readonly arguments: ToolArguments;
}

export type RouteResult =
  | {
      readonly decision: Extract<RoutingDecision, { kind: "handle_self" | "delegate" }>;
      readonly call: ToolCall;
    }
  | { readonly decision: Extract<RoutingDecision, { kind: "decline" }> };

export interface ToolSchema {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ToolParameter[];
}

export interface HandlerSchema {
  readonly id: string;
  readonly description: string;
  readonly intent: string;
  readonly tools: readonly ToolSchema[];
}

export interface TeamSchema {
  readonly coordinator: HandlerSchema;
  readonly specialists: readonly HandlerSchema[];
}

export interface InferenceRequest {
  readonly utterance: string;
  readonly state: SessionStateMap;
  readonly team: TeamSchema;
}

export type InferenceOutcome =
  | { readonly kind: "self"; readonly toolName: string; readonly arguments: ToolArguments }
  | {
      readonly kind: "delegate";
      readonly handlerId: string;
      readonly toolName: string;
      readonly arguments: ToolArguments;
    }
  | { readonly kind: "decline" }
  | { readonly kind: "malformed"; readonly reason: string };

/** The collaborator that decides which handler and tool a turn uses. */
export interface InferenceEngine {
  infer(request: InferenceRequest): Promise<InferenceOutcome>;
}
