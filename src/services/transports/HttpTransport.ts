import type { HttpTransportSpec, JsonRpcMessage, JsonRpcNotification, JsonRpcRequest } from "../../types/index.js";
import { GatewayError, ProtocolError, RunCancelledError, TransportError, errorMessage } from "../errors.js";
import type { RequestOptions, ToolTransport } from "./types.js";

/**
 * One HTTP POST per JSON-RPC message
 */
export class HttpTransport implements ToolTransport {
  readonly kind = "http" as const;
  private timeoutMs: number;

  constructor(
    private spec: HttpTransportSpec,
    defaultTimeoutMs: number
  ) {
    this.timeoutMs = spec.timeoutMs ?? defaultTimeoutMs;
  }

  describe(): string {
    return this.spec.url;
  }

  async request(message: JsonRpcRequest, options: RequestOptions = {}): Promise<unknown> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const timeout = AbortSignal.timeout(timeoutMs);

    // The timeout covers the body as well as the headers
    let body: string;
    try {
      const response = await this.post(message, signal ? AbortSignal.any([signal, timeout]) : timeout);
      if (!response.ok) {
        await response.body?.cancel();
        throw new TransportError(`HTTP ${response.status} ${response.statusText} from ${this.spec.url}`, {
          status: response.status,
        });
      }
      body = await response.text();
    } catch (error) {
      throw this.failure(error, signal, timeout, timeoutMs);
    }

    try {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    } catch {
      throw new ProtocolError(`Response from ${this.spec.url} is not valid JSON`, { body: body.slice(0, 200) });
    }
  }

  async notify(message: JsonRpcNotification): Promise<void> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    try {
      const response = await this.post(message, timeout);
      // Whatever a backend answers to a notification is discarded
      await response.body?.cancel();
    } catch (error) {
      throw this.failure(error, undefined, timeout, this.timeoutMs);
    }
  }

  async close(): Promise<void> {
    // Stateless
  }

  private post(message: JsonRpcMessage, signal: AbortSignal): Promise<Response> {
    return fetch(this.spec.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.spec.headers },
      body: JSON.stringify(message),
      signal,
    });
  }

  private failure(error: unknown, signal: AbortSignal | undefined, timeout: AbortSignal, timeoutMs: number): Error {
    if (signal?.aborted) {
      return new RunCancelledError();
    }
    if (error instanceof GatewayError) {
      return error;
    }
    if (timeout.aborted) {
      return new TransportError(`Request to ${this.spec.url} timed out after ${timeoutMs}ms`);
    }
    return new TransportError(`Request to ${this.spec.url} failed: ${errorMessage(error)}`, error);
  }
}
