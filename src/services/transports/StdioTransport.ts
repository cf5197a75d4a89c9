import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import { JSONRPCMessageSchema, type JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";
import type {
  JsonRpcId,
  JsonRpcMessage,
  JsonRpcNotification,
  JsonRpcRequest,
  StdioTransportSpec,
} from "../../types/index.js";
import { RunCancelledError, TransportError, errorMessage, throwIfCancelled } from "../errors.js";
import type { RequestOptions, ToolTransport } from "./types.js";

interface PendingCall {
  resolve: (response: unknown) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

/**
 * Line-delimited JSON-RPC over a child process's stdin/stdout.
 *
 * The process is launched on first use and reused for later calls; if it
 * exits, every pending call fails and the next call launches it again.
 */
export class StdioTransport implements ToolTransport {
  readonly kind = "stdio" as const;
  private transport: StdioClientTransport | null = null;
  private starting: Promise<StdioClientTransport> | null = null;
  private pending = new Map<JsonRpcId, PendingCall>();
  private timeoutMs: number;

  constructor(
    private spec: StdioTransportSpec,
    defaultTimeoutMs: number
  ) {
    this.timeoutMs = spec.timeoutMs ?? defaultTimeoutMs;
  }

  describe(): string {
    return `${this.spec.command} ${(this.spec.args ?? []).join(" ")}`.trim();
  }

  async request(message: JsonRpcRequest, options: RequestOptions = {}): Promise<unknown> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    throwIfCancelled(signal);
    const transport = await this.ensureStarted();
    // The signal may have fired while the process was launching
    throwIfCancelled(signal);

    if (this.pending.has(message.id)) {
      throw new TransportError(`Request id ${message.id} is already in flight on ${this.describe()}`);
    }

    const response = new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.settle(
          message.id,
          new TransportError(`'${message.method}' on ${this.describe()} timed out after ${timeoutMs}ms`)
        );
      }, timeoutMs);

      const onAbort = () => this.settle(message.id, new RunCancelledError());
      signal?.addEventListener("abort", onAbort, { once: true });

      this.pending.set(message.id, {
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
        },
      });
    });

    try {
      await transport.send(this.toSdkMessage(message));
    } catch (error) {
      this.settle(message.id, new TransportError(`Failed to write to ${this.describe()}: ${errorMessage(error)}`, error));
    }

    return response;
  }

  async notify(message: JsonRpcNotification): Promise<void> {
    const transport = await this.ensureStarted();
    try {
      await transport.send(this.toSdkMessage(message));
    } catch (error) {
      throw new TransportError(`Failed to write to ${this.describe()}: ${errorMessage(error)}`, error);
    }
  }

  async close(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    this.starting = null;
    this.failPending(new TransportError(`Transport to ${this.describe()} closed`));
    if (transport) {
      console.log(`[StdioTransport] Stopping ${this.describe()}`);
      await transport.close();
    }
  }

  private ensureStarted(): Promise<StdioClientTransport> {
    if (this.transport) {
      return Promise.resolve(this.transport);
    }
    if (!this.starting) {
      this.starting = this.start().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async start(): Promise<StdioClientTransport> {
    console.log(`[StdioTransport] Launching ${this.describe()}`);

    const transport = new StdioClientTransport({
      command: this.spec.command,
      args: this.spec.args,
      env: { ...getDefaultEnvironment(), ...this.spec.env },
      cwd: this.spec.cwd,
      stderr: "pipe",
    });

    transport.stderr?.on("data", (data: Buffer) => {
      console.log(`[StdioTransport] [${this.spec.command}] stderr: ${data.toString().trim()}`);
    });

    transport.onmessage = (message: JSONRPCMessage) => this.handleMessage(message);
    transport.onerror = (error: Error) => {
      console.error(`[StdioTransport] ${this.describe()} error:`, error.message);
    };
    transport.onclose = () => {
      if (this.transport === transport) {
        console.warn(`[StdioTransport] ${this.describe()} exited`);
        this.transport = null;
      }
      this.failPending(new TransportError(`Process ${this.describe()} exited`));
    };

    try {
      await transport.start();
    } catch (error) {
      throw new TransportError(`Failed to launch ${this.describe()}: ${errorMessage(error)}`, error);
    }

    console.log(`[StdioTransport] Process PID: ${transport.pid ?? "unknown"}`);
    this.transport = transport;
    return transport;
  }

  private handleMessage(message: JSONRPCMessage): void {
    const id = "id" in message ? message.id : undefined;
    if (typeof id !== "string" && typeof id !== "number") {
      // Server-initiated notification; nothing waits for it
      return;
    }
    const call = this.pending.get(id);
    if (!call) {
      console.warn(`[StdioTransport] Dropping message with unknown id ${id}`);
      return;
    }
    this.pending.delete(id);
    call.cleanup();
    call.resolve(message);
  }

  private settle(id: JsonRpcId, error: Error): void {
    const call = this.pending.get(id);
    if (call) {
      this.pending.delete(id);
      call.cleanup();
      call.reject(error);
    }
  }

  private failPending(error: Error): void {
    for (const id of Array.from(this.pending.keys())) {
      this.settle(id, error);
    }
  }

  private toSdkMessage(message: JsonRpcMessage): JSONRPCMessage {
    return JSONRPCMessageSchema.parse(message);
  }
}
