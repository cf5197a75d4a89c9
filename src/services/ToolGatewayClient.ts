import {
  isRecord,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type ToolContentBlock,
  type ToolListing,
} from "../types/index.js";
import { ProtocolError, ToolCallError } from "./errors.js";
import { MCP_PROTOCOL_VERSION } from "./JsonRpcResponder.js";
import type { RequestOptions, ToolTransport } from "./transports/index.js";

const DEFAULT_INPUT_SCHEMA = { type: "object", properties: {} };

export interface GatewayCallResult {
  /** First text block, "" when there is none */
  text: string;
  content: ToolContentBlock[];
}

export interface ToolGatewayClientOptions {
  /** Perform the initialize handshake before the first call */
  initialize?: boolean;
  clientInfo?: { name: string; version: string };
}

/**
 * Validate a raw response body as JSON-RPC 2.0 for the given request id
 */
export function parseResponse(body: unknown, expectedId: JsonRpcRequest["id"]): JsonRpcResponse {
  if (!isRecord(body) || body.jsonrpc !== "2.0") {
    throw new ProtocolError("Response is not a JSON-RPC 2.0 object", { body });
  }
  if (body.id !== expectedId) {
    throw new ProtocolError(`Response id ${String(body.id)} does not match request id ${expectedId}`, { body });
  }

  if ("error" in body && body.error !== undefined) {
    const error = body.error;
    if (!isRecord(error) || typeof error.code !== "number" || typeof error.message !== "string") {
      throw new ProtocolError("Malformed JSON-RPC error object", { body });
    }
    return { jsonrpc: "2.0", id: expectedId, error: { code: error.code, message: error.message, data: error.data } };
  }

  if (!("result" in body)) {
    throw new ProtocolError("JSON-RPC response carries neither result nor error", { body });
  }
  return { jsonrpc: "2.0", id: expectedId, result: body.result };
}

function toContentBlocks(value: unknown): ToolContentBlock[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const blocks: ToolContentBlock[] = [];
  for (const item of value) {
    if (isRecord(item) && typeof item.type === "string") {
      blocks.push({ ...item, type: item.type });
    }
  }
  return blocks;
}

/**
 * Text of the first text block; anything else degrades to ""
 */
export function firstText(content: ToolContentBlock[]): string {
  for (const block of content) {
    if (block.type === "text" && typeof block.text === "string") {
      return block.text;
    }
  }
  return "";
}

/**
 * ToolGatewayClient - the two JSON-RPC methods the agent depends on,
 * `tools/list` and `tools/call`, against one backend.
 *
 * The client never knows which transport it is talking through.
 */
export class ToolGatewayClient {
  private nextId = 1;
  private initialized: Promise<void> | null = null;

  constructor(
    private transport: ToolTransport,
    private options: ToolGatewayClientOptions = {}
  ) {}

  describe(): string {
    return this.transport.describe();
  }

  async listTools(options: RequestOptions = {}): Promise<ToolListing[]> {
    await this.ensureInitialized(options);

    const response = await this.send("tools/list", {}, options);
    if ("error" in response) {
      throw new ProtocolError(`tools/list failed: ${response.error.message}`, response.error);
    }

    const result = response.result;
    if (!isRecord(result) || !Array.isArray(result.tools)) {
      throw new ProtocolError("tools/list result has no 'tools' array", { result });
    }

    return result.tools.map((tool, index) => {
      if (!isRecord(tool) || typeof tool.name !== "string") {
        throw new ProtocolError(`tools/list entry ${index} has no name`, { tool });
      }
      return {
        name: tool.name,
        description: typeof tool.description === "string" ? tool.description : "",
        inputSchema: isRecord(tool.inputSchema) ? tool.inputSchema : DEFAULT_INPUT_SCHEMA,
      };
    });
  }

  async callTool(name: string, args: Record<string, unknown>, options: RequestOptions = {}): Promise<GatewayCallResult> {
    await this.ensureInitialized(options);

    const response = await this.send("tools/call", { name, arguments: args }, options);
    if ("error" in response) {
      throw new ToolCallError(response.error.message, response.error.code, response.error.data);
    }

    const result = response.result;
    const content = isRecord(result) ? toContentBlocks(result.content) : [];
    const text = firstText(content);

    if (isRecord(result) && result.isError === true) {
      throw new ToolCallError(text || `Tool '${name}' reported an error`);
    }
    return { text, content };
  }

  /**
   * initialize + notifications/initialized, once per client
   */
  private ensureInitialized(options: RequestOptions): Promise<void> {
    if (!this.options.initialize) {
      return Promise.resolve();
    }
    if (!this.initialized) {
      this.initialized = this.handshake(options).catch((error: unknown) => {
        this.initialized = null;
        throw error;
      });
    }
    return this.initialized;
  }

  private async handshake(options: RequestOptions): Promise<void> {
    const response = await this.send(
      "initialize",
      {
        protocolVersion: MCP_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: this.options.clientInfo ?? { name: "mcp-tool-agent-gateway", version: "1.0.0" },
      },
      options
    );
    if ("error" in response) {
      throw new ProtocolError(`initialize failed: ${response.error.message}`, response.error);
    }
    await this.transport.notify({ jsonrpc: "2.0", method: "notifications/initialized" });
  }

  private async send(method: string, params: Record<string, unknown>, options: RequestOptions): Promise<JsonRpcResponse> {
    const request: JsonRpcRequest = { jsonrpc: "2.0", method, params, id: this.nextId++ };
    const body = await this.transport.request(request, options);
    return parseResponse(body, request.id);
  }
}
