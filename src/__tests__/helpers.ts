import { once } from "node:events";
import type { Express } from "express";
import { vi } from "vitest";
import { z } from "zod";
import type { RequestOptions, ToolTransport } from "../services/transports/index.js";
import { defineTool, type LocalTool } from "../tools/index.js";
import {
  isRecord,
  type BackendDescriptor,
  type InvocationRequest,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type ModelClient,
  type ModelRequest,
  type ModelTurn,
  type TransportSpec,
} from "../types/index.js";

export function textTurn(text: string, usage = { inputTokens: 10, outputTokens: 5 }): ModelTurn {
  return { stopReason: "end_turn", text, content: [{ type: "text", text }], toolRequests: [], usage };
}

export function toolTurn(requests: InvocationRequest[], text = ""): ModelTurn {
  return {
    stopReason: "tool_use",
    text,
    content: [
      ...(text ? [{ type: "text" as const, text }] : []),
      ...requests.map((r) => ({ type: "tool_use" as const, id: r.id, name: r.name, input: r.arguments })),
    ],
    toolRequests: requests,
    usage: { inputTokens: 10, outputTokens: 5 },
  };
}

/**
 * Model client that answers from a fixed script and records every request
 */
export function scriptedModel(turns: ModelTurn[]) {
  const requests: ModelRequest[] = [];
  let index = 0;
  const converse = vi.fn(async (request: ModelRequest): Promise<ModelTurn> => {
    requests.push(request);
    const turn = turns[Math.min(index, turns.length - 1)];
    index++;
    if (!turn) {
      throw new Error("script is empty");
    }
    return turn;
  });
  const model: ModelClient = { modelId: "scripted", converse };
  return { model, converse, requests };
}

export function backend(name: string, transport: TransportSpec, initialize = false): BackendDescriptor {
  return { name, description: `${name} backend`, enabled: true, transport, initialize };
}

export function echoTool(name = "echo"): LocalTool {
  return defineTool({
    name,
    description: "Echo the text back",
    input: { text: z.string() },
    handler: async ({ text }) => `echo: ${text}`,
  });
}

export function failingTool(name: string, message: string): LocalTool {
  return defineTool({
    name,
    description: "Always fails",
    input: {},
    handler: async () => {
      throw new Error(message);
    },
  });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

/**
 * Silence the component logs for a test file
 */
export function quietConsole(): void {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
}

/**
 * Transport whose backend is a plain function over the request message
 */
export class FakeTransport implements ToolTransport {
  readonly kind = "http" as const;
  readonly requests: JsonRpcRequest[] = [];
  readonly notifications: JsonRpcNotification[] = [];
  readonly requestOptions: RequestOptions[] = [];
  closed = 0;

  constructor(
    private answer: (request: JsonRpcRequest) => unknown,
    private label = "fake://backend"
  ) {}

  describe(): string {
    return this.label;
  }

  async request(message: JsonRpcRequest, options: RequestOptions = {}): Promise<unknown> {
    this.requests.push(message);
    this.requestOptions.push(options);
    return this.answer(message);
  }

  async notify(message: JsonRpcNotification): Promise<void> {
    this.notifications.push(message);
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

/**
 * Answers tools/list with the given tools and tools/call with `call`
 */
export function toolServer(
  tools: Array<{ name: string; description?: string; inputSchema?: Record<string, unknown> }>,
  call: (name: string, args: unknown) => unknown = (name) => ({ content: [{ type: "text", text: `${name} ok` }] })
): (request: JsonRpcRequest) => unknown {
  return (request) => {
    switch (request.method) {
      case "initialize":
        return { jsonrpc: "2.0", id: request.id, result: { protocolVersion: "2024-11-05", capabilities: {} } };
      case "tools/list":
        return { jsonrpc: "2.0", id: request.id, result: { tools } };
      case "tools/call": {
        const outcome = call(String(request.params?.name), request.params?.arguments);
        return isRecord(outcome) && "code" in outcome
          ? { jsonrpc: "2.0", id: request.id, error: outcome }
          : { jsonrpc: "2.0", id: request.id, result: outcome };
      }
      default:
        return { jsonrpc: "2.0", id: request.id, error: { code: -32601, message: `Method not found: ${request.method}` } };
    }
  };
}

export interface RunningServer {
  url: string;
  close(): Promise<void>;
}

/**
 * Listen on an ephemeral loopback port
 */
export async function listen(app: Express): Promise<RunningServer> {
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("server has no port");
  }
  return {
    url: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export interface ServerSentEvent {
  event: string;
  data: unknown;
}

/**
 * Split a complete text/event-stream body into events
 */
export function parseEventStream(body: string): ServerSentEvent[] {
  return body
    .split("\n\n")
    .filter((chunk) => chunk.trim() !== "")
    .map((chunk) => {
      let event = "message";
      let data = "";
      for (const line of chunk.split("\n")) {
        if (line.startsWith("event: ")) event = line.slice("event: ".length);
        if (line.startsWith("data: ")) data += line.slice("data: ".length);
      }
      return { event, data: JSON.parse(data) };
    });
}
