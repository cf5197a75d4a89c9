import { describe, it, expect, vi, beforeEach } from "vitest";
import { RunCancelledError, TransportError } from "../services/errors.js";
import { StdioTransport } from "../services/transports/index.js";
import type { JsonRpcRequest } from "../types/index.js";
import { quietConsole } from "./helpers.js";

const stdio = vi.hoisted(() => {
  /**
   * Stands in for the SDK's child process transport; the test plays the process
   */
  class FakeProcess {
    static launched: FakeProcess[] = [];
    onmessage?: (message: unknown) => void;
    onclose?: () => void;
    onerror?: (error: Error) => void;
    readonly sent: unknown[] = [];
    readonly stderr = null;
    readonly pid = 4242;
    closed = false;

    constructor(readonly params: unknown) {
      FakeProcess.launched.push(this);
    }

    async start(): Promise<void> {}

    async send(message: unknown): Promise<void> {
      this.sent.push(message);
    }

    async close(): Promise<void> {
      this.closed = true;
      this.onclose?.();
    }

    reply(message: unknown): void {
      this.onmessage?.(message);
    }

    exit(): void {
      this.onclose?.();
    }
  }
  return { FakeProcess };
});

vi.mock("@modelcontextprotocol/sdk/client/stdio.js", () => ({
  StdioClientTransport: stdio.FakeProcess,
  getDefaultEnvironment: () => ({ PATH: "/usr/bin" }),
}));

function listRequest(id: number): JsonRpcRequest {
  return { jsonrpc: "2.0", method: "tools/list", params: {}, id };
}

function launched(index: number) {
  const child = stdio.FakeProcess.launched[index];
  if (!child) throw new Error(`no process #${index}`);
  return child;
}

describe("StdioTransport", () => {
  let transport: StdioTransport;

  beforeEach(() => {
    quietConsole();
    stdio.FakeProcess.launched.length = 0;
    transport = new StdioTransport(
      { type: "stdio", command: "node", args: ["server.js"], env: { MCP_TOKEN: "test-secret" } },
      1000
    );
  });

  it("launches the command once, with the configured environment", async () => {
    const first = transport.request(listRequest(1));
    await vi.waitFor(() => expect(launched(0).sent).toHaveLength(1));
    launched(0).reply({ jsonrpc: "2.0", id: 1, result: { tools: [] } });
    await first;

    const second = transport.request(listRequest(2));
    await vi.waitFor(() => expect(launched(0).sent).toHaveLength(2));
    launched(0).reply({ jsonrpc: "2.0", id: 2, result: { tools: [] } });
    await second;

    expect(stdio.FakeProcess.launched).toHaveLength(1);
    expect(launched(0).params).toEqual({
      command: "node",
      args: ["server.js"],
      env: { PATH: "/usr/bin", MCP_TOKEN: "test-secret" },
      cwd: undefined,
      stderr: "pipe",
    });
    expect(launched(0).sent[0]).toMatchObject({ jsonrpc: "2.0", method: "tools/list", id: 1 });
  });

  it("matches responses to requests by id", async () => {
    const first = transport.request(listRequest(1));
    const second = transport.request(listRequest(2));
    await vi.waitFor(() => expect(launched(0).sent).toHaveLength(2));

    launched(0).reply({ jsonrpc: "2.0", id: 2, result: { answer: "two" } });
    launched(0).reply({ jsonrpc: "2.0", id: 1, result: { answer: "one" } });

    expect(await first).toEqual({ jsonrpc: "2.0", id: 1, result: { answer: "one" } });
    expect(await second).toEqual({ jsonrpc: "2.0", id: 2, result: { answer: "two" } });
  });

  it("drops responses nobody is waiting for", async () => {
    const pending = transport.request(listRequest(1));
    await vi.waitFor(() => expect(launched(0).sent).toHaveLength(1));

    launched(0).reply({ jsonrpc: "2.0", id: 99, result: {} });
    launched(0).reply({ jsonrpc: "2.0", method: "notifications/progress", params: {} });
    launched(0).reply({ jsonrpc: "2.0", id: 1, result: { ok: true } });

    expect(await pending).toEqual({ jsonrpc: "2.0", id: 1, result: { ok: true } });
    expect(console.warn).toHaveBeenCalledWith("[StdioTransport] Dropping message with unknown id 99");
  });

  it("fails a call that outlives its timeout", async () => {
    const pending = transport.request(listRequest(1), { timeoutMs: 20 });

    await expect(pending).rejects.toBeInstanceOf(TransportError);
    await expect(pending).rejects.toThrow("'tools/list' on node server.js timed out after 20ms");
  });

  it("fails pending calls when the process exits and relaunches on the next call", async () => {
    const pending = transport.request(listRequest(1));
    await vi.waitFor(() => expect(launched(0).sent).toHaveLength(1));

    launched(0).exit();
    await expect(pending).rejects.toThrow("Process node server.js exited");

    const next = transport.request(listRequest(2));
    await vi.waitFor(() => expect(launched(1).sent).toHaveLength(1));
    launched(1).reply({ jsonrpc: "2.0", id: 2, result: {} });

    expect(await next).toEqual({ jsonrpc: "2.0", id: 2, result: {} });
    expect(stdio.FakeProcess.launched).toHaveLength(2);
  });

  it("rejects pending calls and stops the process on close", async () => {
    const pending = transport.request(listRequest(1));
    await vi.waitFor(() => expect(launched(0).sent).toHaveLength(1));

    await transport.close();

    await expect(pending).rejects.toThrow("Transport to node server.js closed");
    expect(launched(0).closed).toBe(true);
  });

  it("does not send once the caller has cancelled", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(transport.request(listRequest(1), { signal: controller.signal })).rejects.toBeInstanceOf(
      RunCancelledError
    );
    expect(stdio.FakeProcess.launched).toHaveLength(0);
  });

  it("honours a cancellation that lands while the process is launching", async () => {
    const controller = new AbortController();
    vi.spyOn(stdio.FakeProcess.prototype, "start").mockImplementation(async () => {
      controller.abort();
    });

    await expect(transport.request(listRequest(1), { signal: controller.signal })).rejects.toBeInstanceOf(
      RunCancelledError
    );
    expect(launched(0).sent).toEqual([]);
  });

  it("stops waiting when the caller cancels a call in flight", async () => {
    const controller = new AbortController();
    const pending = transport.request(listRequest(1), { signal: controller.signal });
    await vi.waitFor(() => expect(launched(0).sent).toHaveLength(1));

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });

  it("refuses a second call with an id already in flight", async () => {
    const first = transport.request(listRequest(1));
    await vi.waitFor(() => expect(launched(0).sent).toHaveLength(1));

    await expect(transport.request(listRequest(1))).rejects.toThrow(
      "Request id 1 is already in flight on node server.js"
    );

    launched(0).reply({ jsonrpc: "2.0", id: 1, result: {} });
    await first;
  });
});
