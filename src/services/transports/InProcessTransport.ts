import type { JsonRpcNotification, JsonRpcRequest } from "../../types/index.js";
import { JsonRpcResponder } from "../JsonRpcResponder.js";
import { ProtocolError } from "../errors.js";
import type { LocalTool } from "../../tools/index.js";
import type { RequestOptions, ToolTransport } from "./types.js";

/**
 * Calls local handlers directly. Results come back in the same
 * `{ content: [...] }` envelope a remote backend would send.
 */
export class InProcessTransport implements ToolTransport {
  readonly kind = "in-process" as const;
  private responder: JsonRpcResponder;

  constructor(
    private handler: string,
    tools: LocalTool[]
  ) {
    this.responder = new JsonRpcResponder(tools, { name: `in-process:${handler}`, version: "1.0.0" });
  }

  describe(): string {
    return `in-process://${this.handler}`;
  }

  async request(message: JsonRpcRequest, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.responder.handle(message, options.signal);
    if (!response) {
      throw new ProtocolError(`No response for request '${message.method}' (id ${message.id})`);
    }
    return response;
  }

  async notify(message: JsonRpcNotification): Promise<void> {
    await this.responder.handle(message);
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
