import { describe, it, expect, vi, beforeEach } from "vitest";
import { AgentService } from "../services/AgentService.js";
import type { BackendDescriptor } from "../types/index.js";
import { FakeTransport, backend, quietConsole, scriptedModel, textTurn, toolServer, toolTurn } from "./helpers.js";

describe("AgentService", () => {
  let transports: Map<string, FakeTransport>;
  let backends: BackendDescriptor[];

  beforeEach(() => {
    quietConsole();
    transports = new Map([
      ["alpha", new FakeTransport(toolServer([{ name: "ping" }, { name: "lookup" }]), "fake://alpha")],
      [
        "beta",
        new FakeTransport(
          toolServer([{ name: "ping" }], () => ({ content: [{ type: "text", text: "beta pong" }] })),
          "fake://beta"
        ),
      ],
    ]);
    backends = [
      backend("alpha", { type: "http", url: "http://alpha.test" }),
      backend("beta", { type: "http", url: "http://beta.test" }),
    ];
  });

  function service(turns = [textTurn("done")]) {
    const scripted = scriptedModel(turns);
    const agent = new AgentService({
      model: scripted.model,
      loadBackends: async () => backends,
      discover: {
        collisionPolicy: "last-wins",
        createTransport: (descriptor) => {
          const transport = transports.get(descriptor.name);
          if (!transport) throw new Error(`no fake for ${descriptor.name}`);
          return transport;
        },
      },
    });
    return { agent, ...scripted };
  }

  it("runs the loop against the merged catalog and releases every transport", async () => {
    const { agent, requests } = service([toolTurn([{ id: "t1", name: "ping", arguments: {} }]), textTurn("pong!")]);

    const result = await agent.run({ prompt: "Ping please", maxTurns: 4 });

    expect(result).toMatchObject({ status: "completed", response: "pong!", turns: 2, maxTurns: 4, toolsUsed: ["ping"] });
    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(requests[0]?.tools.map((t) => t.name)).toEqual(["lookup", "ping"]);
    expect(result.toolCalls[0]?.result).toBe("beta pong");
    expect(transports.get("alpha")?.closed).toBe(1);
    expect(transports.get("beta")?.closed).toBe(1);
  });

  it("reports progress for each tool call", async () => {
    const { agent } = service([toolTurn([{ id: "t1", name: "lookup", arguments: {} }]), textTurn("found")]);
    const onProgress = vi.fn();

    await agent.run({ prompt: "Look it up", onProgress });

    expect(onProgress).toHaveBeenCalledWith({ message: "Calling tool: lookup", icon: "⚙️", tool: "lookup" });
  });

  it("discovers fresh for every run", async () => {
    const { agent } = service();

    await agent.run({ prompt: "one" });
    await agent.run({ prompt: "two" });

    const listCalls = transports.get("alpha")?.requests.filter((r) => r.method === "tools/list");
    expect(listCalls).toHaveLength(2);
  });

  it("lists the catalog with owners, backend summaries and collisions", async () => {
    const { agent } = service();

    const response = await agent.listTools();

    expect(response.count).toBe(2);
    expect(response.tools.map((t) => [t.name, t.backend])).toEqual([
      ["lookup", "alpha"],
      ["ping", "beta"],
    ]);
    expect(response.backends).toEqual([
      { name: "alpha", description: "alpha backend", transport: "http", enabled: true, available: true, toolCount: 2 },
      { name: "beta", description: "beta backend", transport: "http", enabled: true, available: true, toolCount: 1 },
    ]);
    expect(response.collisions).toEqual([{ name: "ping", kept: "beta", dropped: "alpha" }]);
    expect(transports.get("alpha")?.closed).toBe(1);
  });
});
