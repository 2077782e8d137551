import { toolSuccess, type ToolArguments, type ToolDefinition, type ToolResult } from "./tool.types";

export const GENERIC_GREETING = "Hello there!";
export const FAREWELL_MESSAGE = "Goodbye! Have a great day.";

export function sayHello(args: ToolArguments): ToolResult {
  const name = typeof args.name === "string" ? args.name.trim() : "";
  return toolSuccess({ greeting: name === "" ? GENERIC_GREETING : `Hello, ${name}!` });
}

export function sayGoodbye(): ToolResult {
  return toolSuccess({ farewell: FAREWELL_MESSAGE });
}

export const sayHelloTool: ToolDefinition = {
  name: "say_hello",
  description: "Provides a simple greeting. Pass the user's name when they gave one.",
  parameters: [{ name: "name", description: "The user's name, if provided.", required: false }],
  responseField: "greeting",
  run: (args) => sayHello(args),
};

export const sayGoodbyeTool: ToolDefinition = {
  name: "say_goodbye",
  description: "Provides a simple farewell message to conclude the conversation.",
  parameters: [],
  responseField: "farewell",
  run: () => sayGoodbye(),
};
