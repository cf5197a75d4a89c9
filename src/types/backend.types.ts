/**
 * Backend and tool descriptors
 */

/**
 * Plain HTTP JSON-RPC endpoint (one POST per message)
 */
export interface HttpTransportSpec {
  type: "http";
  url: string;
  /** Per-call timeout, overrides the gateway default */
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * Local process speaking line-delimited JSON-RPC over stdin/stdout
 */
export interface StdioTransportSpec {
  type: "stdio";
  command: string;
  args?: string[];
  env?: Record<string, string>;
  cwd?: string;
  timeoutMs?: number;
}

/**
 * Tools served by a handler set registered in this process
 */
export interface InProcessTransportSpec {
  type: "in-process";
  /** Name of a registered local tool set, e.g. "email" */
  handler: string;
}

export type TransportSpec = HttpTransportSpec | StdioTransportSpec | InProcessTransportSpec;

export type TransportKind = TransportSpec["type"];

export interface BackendDescriptor {
  name: string;
  description: string;
  enabled: boolean;
  transport: TransportSpec;
  /** Run the `initialize` handshake before the first call */
  initialize: boolean;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Readonly<Record<string, unknown>>;
  readonly backend: BackendDescriptor;
}

/**
 * What the model sees: no backend linkage
 */
export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCollision {
  name: string;
  /** Backend whose tool is served under this name */
  kept: string;
  /** Backend whose tool was dropped */
  dropped: string;
}

export type CollisionPolicy = "last-wins" | "first-wins" | "error";
