import type { TeamDefinition } from "../../core/routing/routing.types";
import type { StateWrite } from "../../session/session.types";

export interface TriggerDefinition {
  /** `re:<pattern>` (case-insensitive, named groups become arguments) or a plain substring. */
  readonly condition: string;
  readonly intent: string;
  readonly tool: string;
}

export type DemoStep =
  | { readonly kind: "say"; readonly utterance: string }
  | { readonly kind: "set"; readonly write: StateWrite };

export interface TeamProfile {
  readonly name: string;
  readonly team: TeamDefinition;
  readonly triggers: readonly TriggerDefinition[];
  readonly demo: readonly DemoStep[];
}
