import type { JsonRpcNotification, JsonRpcRequest, TransportKind } from "../../types/index.js";

export interface RequestOptions {
  signal?: AbortSignal;
  /** Overrides the transport's default timeout for this call */
  timeoutMs?: number;
}

/**
 * Uniform way of reaching one backend.
 *
 * `request` resolves with the raw, unvalidated response body; validating it
 * as JSON-RPC is the gateway client's job. `notify` never waits for or
 * surfaces a response.
 */
export interface ToolTransport {
  readonly kind: TransportKind;
  describe(): string;
  request(message: JsonRpcRequest, options?: RequestOptions): Promise<unknown>;
  notify(message: JsonRpcNotification): Promise<void>;
  close(): Promise<void>;
}
