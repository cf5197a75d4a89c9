import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { isRecord, type ToolCallResult } from "../types/index.js";

/**
 * A tool served from this process
 */
export interface LocalTool {
  name: string;
  description: string;
  /** JSON Schema shown to the model */
  inputSchema: Record<string, unknown>;
  execute(args: unknown, signal?: AbortSignal): Promise<ToolCallResult>;
}

/**
 * Arguments did not match the tool's declared input
 */
export class ToolInputError extends Error {
  constructor(
    message: string,
    public issues: z.ZodIssue[]
  ) {
    super(message);
    this.name = "ToolInputError";
  }
}

export interface ToolDefinition<Shape extends z.ZodRawShape> {
  name: string;
  description: string;
  input: Shape;
  handler: (args: z.infer<z.ZodObject<Shape>>, signal?: AbortSignal) => Promise<string | ToolCallResult>;
}

function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const converted: unknown = zodToJsonSchema(schema, { $refStrategy: "none" });
  if (!isRecord(converted)) {
    return { type: "object", properties: {} };
  }
  const { $schema: _draft, ...inputSchema } = converted;
  return inputSchema;
}

/**
 * Declare a tool from a zod shape, the way MCP servers declare them
 */
export function defineTool<Shape extends z.ZodRawShape>(definition: ToolDefinition<Shape>): LocalTool {
  const schema = z.object(definition.input);

  return {
    name: definition.name,
    description: definition.description,
    inputSchema: toInputSchema(schema),
    async execute(args: unknown, signal?: AbortSignal): Promise<ToolCallResult> {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        const summary = parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
          .join("; ");
        throw new ToolInputError(`Invalid arguments for '${definition.name}': ${summary}`, parsed.error.issues);
      }

      const result = await definition.handler(parsed.data, signal);
      return typeof result === "string" ? { content: [{ type: "text", text: result }] } : result;
    },
  };
}
