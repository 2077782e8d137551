import type { SessionStateMap, StateValue, StateWrite } from "../../session/session.types";

export const TOOL_ERROR_KINDS = Object.freeze({
  VALIDATION: "VALIDATION_ERROR",
  NOT_FOUND: "NOT_FOUND",
  INTERNAL: "TOOL_INTERNAL_ERROR",
} as const);

export type ToolErrorKind = (typeof TOOL_ERROR_KINDS)[keyof typeof TOOL_ERROR_KINDS];

export type ToolArguments = Readonly<Record<string, StateValue>>;

export type ToolPayload = Readonly<Record<string, StateValue>>;

export type ToolResult =
  | {
      readonly kind: "success";
      readonly payload: ToolPayload;
      readonly stateWrite?: StateWrite;
    }
  | {
      readonly kind: "failure";
      readonly error: {
        readonly kind: ToolErrorKind;
        readonly message: string;
      };
    };

export type ToolFn = (args: ToolArguments, state: SessionStateMap) => ToolResult;

export interface ToolParameter {
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
}

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: readonly ToolParameter[];
  /** Payload field whose text becomes the turn's final response. */
  readonly responseField: string;
  readonly run: ToolFn;
}

export function toolSuccess(payload: ToolPayload, stateWrite?: StateWrite): ToolResult {
  return stateWrite ? { kind: "success", payload, stateWrite } : { kind: "success", payload };
}

export function toolFailure(kind: ToolErrorKind, message: string): ToolResult {
  return { kind: "failure", error: { kind, message } };
}
