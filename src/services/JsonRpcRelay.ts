import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { JsonRpcErrorCode, isRecord, type JsonRpcId } from "../types/index.js";
import { errorMessage } from "./errors.js";

/**
 * Sends one raw JSON-RPC message downstream and returns the raw reply body
 */
export type Forwarder = (body: string) => Promise<string>;

export function createHttpForwarder(url: string, timeoutMs: number): Forwarder {
  return async (body) => {
    const response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });
    return response.text();
  };
}

function requestId(message: unknown): JsonRpcId | undefined {
  if (!isRecord(message)) return undefined;
  const id = message.id;
  return typeof id === "string" || typeof id === "number" ? id : undefined;
}

/**
 * JsonRpcRelay - line-delimited JSON-RPC in, one HTTP backend behind.
 *
 * Messages without an id never produce output, even when forwarding fails.
 * Everything this class logs goes to stderr; the output stream carries
 * protocol lines only.
 */
export class JsonRpcRelay {
  constructor(
    private forward: Forwarder,
    private output: Writable
  ) {}

  /**
   * Relay one input line. Resolves to the line written, or undefined when
   * nothing was written.
   */
  async handleLine(raw: string): Promise<string | undefined> {
    const line = raw.trim();
    if (!line) {
      return undefined;
    }

    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch {
      console.error(`[JsonRpcRelay] Skipping malformed line: ${line.slice(0, 100)}`);
      return undefined;
    }

    const id = requestId(message);
    const method = isRecord(message) && typeof message.method === "string" ? message.method : "(response)";

    let reply: unknown;
    try {
      const body = await this.forward(line);
      reply = JSON.parse(body);
    } catch (error) {
      if (id === undefined) {
        console.error(`[JsonRpcRelay] Notification '${method}' failed downstream: ${errorMessage(error)}`);
        return undefined;
      }
      console.error(`[JsonRpcRelay] '${method}' (id ${id}) failed downstream: ${errorMessage(error)}`);
      reply = { jsonrpc: "2.0", id, error: { code: JsonRpcErrorCode.InternalError, message: errorMessage(error) } };
    }

    if (id === undefined) {
      return undefined;
    }

    const out = JSON.stringify(reply);
    this.output.write(`${out}\n`);
    return out;
  }

  /**
   * Process input until it ends, one message at a time
   */
  async run(input: Readable): Promise<void> {
    const lines = createInterface({ input, crlfDelay: Infinity });
    for await (const line of lines) {
      await this.handleLine(line);
    }
  }
}
