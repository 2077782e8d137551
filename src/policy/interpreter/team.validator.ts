import { ConfigurationError } from "../../core/errors/configuration.error";
import type { HandlerDefinition, TeamDefinition } from "../../core/routing/routing.types";
import type { StateValue } from "../../session/session.types";
import type { DemoStep, TriggerDefinition } from "../schema/team.types";

const SUPPORTED_VERSION = "1.0";

function fail(absPath: string, message: string): never {
  throw new ConfigurationError(`CONFIGURATION_ERROR ${absPath}: ${message}`);
}

function assertVersion(absPath: string, value: unknown): void {
  if (typeof value !== "string" || value.trim() === "") {
    fail(absPath, "version must be a non-empty string");
  }
  if (value !== SUPPORTED_VERSION) {
    fail(absPath, `unsupported version '${value}', expected '${SUPPORTED_VERSION}'`);
  }
}

function assertObject(value: unknown, absPath: string, where: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    fail(absPath, `${where} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function assertName(value: unknown, absPath: string, where: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    fail(absPath, `${where} must be a non-empty string`);
  }
  return value.trim();
}

function assertNameList(value: unknown, absPath: string, where: string): string[] {
  if (!Array.isArray(value)) {
    fail(absPath, `${where} must be an array`);
  }
  return value.map((item, idx) => assertName(item, absPath, `${where}[${idx}]`));
}

function assertStateMap(
  value: unknown,
  absPath: string,
  where: string
): Record<string, StateValue> {
  if (typeof value === "undefined") {
    return {};
  }
  const row = assertObject(value, absPath, where);
  const out: Record<string, StateValue> = {};
  for (const [key, entry] of Object.entries(row)) {
    if (
      entry !== null &&
      typeof entry !== "string" &&
      typeof entry !== "number" &&
      typeof entry !== "boolean"
    ) {
      fail(absPath, `${where}.${key} must be a scalar value`);
    }
    out[key] = entry;
  }
  return out;
}

function assertHandler(value: unknown, absPath: string, where: string): HandlerDefinition {
  const row = assertObject(value, absPath, where);
  const tools = assertNameList(row.tools, absPath, `${where}.tools`);
  if (tools.length === 0) {
    fail(absPath, `${where}.tools must list at least one tool`);
  }
  if (new Set(tools).size !== tools.length) {
    fail(absPath, `${where}.tools must not repeat a tool`);
  }

  const handler: HandlerDefinition = {
    id: assertName(row.id, absPath, `${where}.id`),
    description: assertName(row.description, absPath, `${where}.description`),
    intent: assertName(row.intent, absPath, `${where}.intent`),
    tools,
  };
  if (typeof row.output_key === "undefined") {
    return handler;
  }
  return { ...handler, outputKey: assertName(row.output_key, absPath, `${where}.output_key`) };
}

export function validateTeamFile(value: unknown, absPath: string): TeamDefinition {
  const root = assertObject(value, absPath, "root");
  assertVersion(absPath, root.version);

  const appName = assertName(root.app_name, absPath, "app_name");
  const coordinator = assertHandler(root.coordinator, absPath, "coordinator");

  const specialistsRaw = typeof root.specialists === "undefined" ? [] : root.specialists;
  if (!Array.isArray(specialistsRaw)) {
    fail(absPath, "specialists must be an array");
  }
  const specialists = specialistsRaw.map((entry, idx) => {
    const where = `specialists[${idx}]`;
    const row = assertObject(entry, absPath, where);
    if (typeof row.sub_agents !== "undefined" || typeof row.specialists !== "undefined") {
      fail(absPath, `${where} declares sub-agents; delegation is single level`);
    }
    return assertHandler(row, absPath, where);
  });

  const coordinatorRow = assertObject(root.coordinator, absPath, "coordinator");
  if (typeof coordinatorRow.sub_agents !== "undefined") {
    const subAgents = new Set(
      assertNameList(coordinatorRow.sub_agents, absPath, "coordinator.sub_agents")
    );
    const specialistIds = new Set(specialists.map((handler) => handler.id));
    for (const id of subAgents) {
      if (!specialistIds.has(id)) {
        fail(absPath, `coordinator.sub_agents names undeclared specialist '${id}'`);
      }
    }
    for (const id of specialistIds) {
      if (!subAgents.has(id)) {
        fail(absPath, `specialist '${id}' is not listed in coordinator.sub_agents`);
      }
    }
  }

  return {
    appName,
    coordinator,
    specialists,
    initialState: assertStateMap(root.initial_state, absPath, "initial_state"),
  };
}

export function validateTriggersFile(value: unknown, absPath: string): TriggerDefinition[] {
  const root = assertObject(value, absPath, "root");
  assertVersion(absPath, root.version);

  if (!Array.isArray(root.triggers)) {
    fail(absPath, "triggers must be an array");
  }

  return root.triggers.map((triggerRaw, idx) => {
    const trigger = assertObject(triggerRaw, absPath, `triggers[${idx}]`);
    return {
      condition: assertName(trigger.condition, absPath, `triggers[${idx}].condition`),
      intent: assertName(trigger.intent, absPath, `triggers[${idx}].intent`),
      tool: assertName(trigger.tool, absPath, `triggers[${idx}].tool`),
    };
  });
}

export function validateDemoFile(value: unknown, absPath: string): DemoStep[] {
  const root = assertObject(value, absPath, "root");
  assertVersion(absPath, root.version);

  if (!Array.isArray(root.steps)) {
    fail(absPath, "steps must be an array");
  }

  return root.steps.map((stepRaw, idx): DemoStep => {
    const where = `steps[${idx}]`;
    const step = assertObject(stepRaw, absPath, where);
    const keys = Object.keys(step);
    if (keys.length !== 1) {
      fail(absPath, `${where} must have exactly one of 'say' or 'set'`);
    }
    if (typeof step.say !== "undefined") {
      return { kind: "say", utterance: assertName(step.say, absPath, `${where}.say`) };
    }
    if (typeof step.set !== "undefined") {
      const write = assertStateMap(step.set, absPath, `${where}.set`);
      if (Object.keys(write).length === 0) {
        fail(absPath, `${where}.set must not be empty`);
      }
      return { kind: "set", write };
    }
    fail(absPath, `${where} must have exactly one of 'say' or 'set'`);
  });
}
