import {
  JsonRpcErrorCode,
  isNotification,
  isRecord,
  type JsonRpcId,
  type JsonRpcResponse,
  type ToolListing,
} from "../types/index.js";
import { ToolInputError, type LocalTool } from "../tools/index.js";
import { errorMessage } from "./errors.js";

export const MCP_PROTOCOL_VERSION = "2024-11-05";

export interface ServerInfo {
  name: string;
  version: string;
}

function errorResponse(id: JsonRpcId | null, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

function resultResponse(id: JsonRpcId, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

/**
 * Answers the MCP JSON-RPC dialect for a fixed set of local tools.
 *
 * Messages without an id are notifications: `handle` returns undefined for
 * them whatever their method, and callers must then write nothing.
 */
export class JsonRpcResponder {
  private tools: Map<string, LocalTool>;

  constructor(
    tools: LocalTool[],
    private info: ServerInfo
  ) {
    this.tools = new Map(tools.map((tool) => [tool.name, tool]));
  }

  listTools(): ToolListing[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  async handle(message: unknown, signal?: AbortSignal): Promise<JsonRpcResponse | undefined> {
    if (!isRecord(message)) {
      return errorResponse(null, JsonRpcErrorCode.InvalidRequest, "Invalid Request");
    }

    // No id, no response, even for a malformed envelope
    if (isNotification(message)) {
      console.log(`[${this.info.name}] Notification '${String(message.method)}' received, no response`);
      return undefined;
    }

    if (message.jsonrpc !== "2.0" || typeof message.method !== "string") {
      return errorResponse(null, JsonRpcErrorCode.InvalidRequest, "Invalid Request");
    }

    const method = message.method;

    const id = message.id;
    if (typeof id !== "string" && typeof id !== "number") {
      return errorResponse(null, JsonRpcErrorCode.InvalidRequest, "Invalid Request: id must be a string or number");
    }

    const params = isRecord(message.params) ? message.params : {};

    switch (method) {
      case "initialize":
        return resultResponse(id, {
          protocolVersion: MCP_PROTOCOL_VERSION,
          serverInfo: this.info,
          capabilities: { tools: {} },
        });

      case "ping":
        return resultResponse(id, {});

      case "tools/list":
        return resultResponse(id, { tools: this.listTools() });

      case "tools/call":
        return this.callTool(id, params, signal);

      default:
        return errorResponse(id, JsonRpcErrorCode.MethodNotFound, `Method not found: ${method}`);
    }
  }

  private async callTool(
    id: JsonRpcId,
    params: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<JsonRpcResponse> {
    const name = params.name;
    if (typeof name !== "string") {
      return errorResponse(id, JsonRpcErrorCode.InvalidParams, "tools/call requires a string 'name'");
    }

    const tool = this.tools.get(name);
    if (!tool) {
      return errorResponse(id, JsonRpcErrorCode.MethodNotFound, `Tool not found: ${name}`);
    }

    const startTime = Date.now();
    try {
      const result = await tool.execute(params.arguments ?? {}, signal);
      console.log(`[${this.info.name}] Tool '${name}' executed in ${Date.now() - startTime}ms`);
      return resultResponse(id, result);
    } catch (error) {
      if (error instanceof ToolInputError) {
        return errorResponse(id, JsonRpcErrorCode.InvalidParams, error.message);
      }
      console.error(`[${this.info.name}] Tool '${name}' failed:`, errorMessage(error));
      return errorResponse(id, JsonRpcErrorCode.ExecutionFailed, `${name} failed: ${errorMessage(error)}`);
    }
  }
}
