import type { SessionStateMap } from "../../session/session.types";
import {
  TOOL_ERROR_KINDS,
  toolFailure,
  type ToolArguments,
  type ToolDefinition,
  type ToolResult,
} from "./tool.types";

export interface ToolRegistry {
  register(definition: ToolDefinition): this;
  get(name: string): ToolDefinition | undefined;
  list(): readonly ToolDefinition[];
  execute(name: string, args: ToolArguments, state: SessionStateMap): Promise<ToolResult>;
}

class DefaultToolRegistry implements ToolRegistry {
  private readonly tools = new Map<string, ToolDefinition>();

  register(definition: ToolDefinition): this {
    if (this.tools.has(definition.name)) {
      throw new Error(`TOOL_REGISTRY_ERROR duplicate tool '${definition.name}'`);
    }
    this.tools.set(definition.name, definition);
    return this;
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  list(): readonly ToolDefinition[] {
    return [...this.tools.values()];
  }

  async execute(name: string, args: ToolArguments, state: SessionStateMap): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return toolFailure(TOOL_ERROR_KINDS.NOT_FOUND, `tool '${name}' is not registered`);
    }

    try {
      return tool.run(args, state);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return toolFailure(TOOL_ERROR_KINDS.INTERNAL, `tool '${name}' failed: ${message}`);
    }
  }
}

export function createToolRegistry(): ToolRegistry {
  return new DefaultToolRegistry();
}
