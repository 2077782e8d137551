import { sayGoodbyeTool, sayHelloTool } from "./greeting.tools";
import { createToolRegistry, type ToolRegistry } from "./tool.registry";
import { getWeatherStatefulTool, getWeatherTool } from "./weather.tools";

export const BUILTIN_TOOLS = Object.freeze([
  getWeatherTool,
  getWeatherStatefulTool,
  sayHelloTool,
  sayGoodbyeTool,
]);

export function createBuiltinToolRegistry(): ToolRegistry {
  const registry = createToolRegistry();
  for (const tool of BUILTIN_TOOLS) {
    registry.register(tool);
  }
  return registry;
}
