/**
 * Local tool sets, addressed by name from in-process backend configuration
 */
import { ConfigError } from "../services/errors.js";
import type { LocalTool } from "./defineTool.js";
import { createSendEmailTool } from "./sendEmail.js";

export { defineTool, ToolInputError } from "./defineTool.js";
export type { LocalTool, ToolDefinition } from "./defineTool.js";
export { createSendEmailTool } from "./sendEmail.js";

type ToolSetFactory = () => LocalTool[];

const toolSets = new Map<string, ToolSetFactory>([["email", () => [createSendEmailTool()]]]);

/**
 * Make a tool set available to `{ "type": "in-process", "handler": name }`
 */
export function registerToolSet(name: string, factory: ToolSetFactory): void {
  toolSets.set(name, factory);
}

export function getToolSet(name: string): LocalTool[] {
  const factory = toolSets.get(name);
  if (!factory) {
    throw new ConfigError(
      `Unknown in-process tool set '${name}'. Registered: ${Array.from(toolSets.keys()).join(", ")}`
    );
  }
  return factory();
}
