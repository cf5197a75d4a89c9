import { config } from "../config/index.js";
import type {
  BackendDescriptor,
  BackendSummary,
  CollisionPolicy,
  InvocationRequest,
  InvocationResult,
  ToolCollision,
  ToolDescriptor,
  ToolListing,
  ToolSpec,
} from "../types/index.js";
import { ConfigError, ToolCallError, ToolNotFoundError, errorMessage, throwIfCancelled } from "./errors.js";
import { ToolGatewayClient } from "./ToolGatewayClient.js";
import { createTransport, type TransportFactory, type ToolTransport } from "./transports/index.js";

/**
 * Tools one backend published during discovery
 */
export interface CatalogSource {
  backend: BackendDescriptor;
  tools: ToolListing[];
}

export interface MergedCatalog {
  tools: Map<string, ToolDescriptor>;
  collisions: ToolCollision[];
}

/**
 * Merge per-backend catalogs in order. On a name clash the later backend
 * replaces the earlier one, unless `policy` says otherwise; every clash is
 * reported either way.
 */
export function mergeCatalogs(sources: CatalogSource[], policy: CollisionPolicy = "last-wins"): MergedCatalog {
  const tools = new Map<string, ToolDescriptor>();
  const collisions: ToolCollision[] = [];

  for (const { backend, tools: listings } of sources) {
    for (const listing of listings) {
      const existing = tools.get(listing.name);
      const descriptor: ToolDescriptor = Object.freeze({
        name: listing.name,
        description: listing.description,
        inputSchema: Object.freeze({ ...listing.inputSchema }),
        backend,
      });

      if (!existing) {
        tools.set(listing.name, descriptor);
        continue;
      }

      if (policy === "first-wins") {
        collisions.push({ name: listing.name, kept: existing.backend.name, dropped: backend.name });
        continue;
      }

      collisions.push({ name: listing.name, kept: backend.name, dropped: existing.backend.name });
      // Delete first so the tool moves to the position of its new owner
      tools.delete(listing.name);
      tools.set(listing.name, descriptor);
    }
  }

  if (policy === "error" && collisions.length > 0) {
    const names = collisions.map((c) => `'${c.name}' (${c.dropped}, ${c.kept})`).join(", ");
    throw new ConfigError(`Duplicate tool names across backends: ${names}`, collisions);
  }

  return { tools, collisions };
}

/**
 * Names listed in the schema's `required` array that `args` lacks
 */
export function missingRequiredArguments(
  inputSchema: Readonly<Record<string, unknown>>,
  args: Record<string, unknown>
): string[] {
  const required = inputSchema.required;
  if (!Array.isArray(required)) {
    return [];
  }
  return required.filter((key): key is string => typeof key === "string" && args[key] === undefined);
}

export interface DiscoverOptions {
  signal?: AbortSignal;
  collisionPolicy?: CollisionPolicy;
  createTransport?: TransportFactory;
  /** Per-call timeout for tools/list */
  discoveryTimeoutMs?: number;
}

interface Connection {
  backend: BackendDescriptor;
  transport: ToolTransport;
  client: ToolGatewayClient;
  available: boolean;
  toolCount: number;
}

/**
 * ToolRegistry - the merged tool catalog of one run.
 *
 * Built once by `discover` and read-only afterwards. Owns the transports it
 * opened; `close` releases them.
 */
export class ToolRegistry {
  private closed = false;

  private constructor(
    private tools: Map<string, ToolDescriptor>,
    private connections: Map<string, Connection>,
    readonly collisions: ToolCollision[]
  ) {}

  /**
   * Discover tools from every enabled backend. A backend that fails is
   * logged and left out; discovery itself only fails on cancellation or on
   * a collision under the "error" policy.
   */
  static async discover(backends: BackendDescriptor[], options: DiscoverOptions = {}): Promise<ToolRegistry> {
    const factory = options.createTransport ?? createTransport;
    const timeoutMs = options.discoveryTimeoutMs ?? config.gateway.discoveryTimeoutMs;
    const connections = new Map<string, Connection>();
    const sources: CatalogSource[] = [];

    try {
      for (const backend of backends) {
        throwIfCancelled(options.signal);

        if (!backend.enabled) {
          console.log(`[ToolRegistry] Skipping disabled backend '${backend.name}'`);
          continue;
        }

        let transport: ToolTransport;
        try {
          transport = factory(backend);
        } catch (error) {
          console.error(`[ToolRegistry] Cannot build transport for '${backend.name}':`, errorMessage(error));
          continue;
        }

        const connection: Connection = {
          backend,
          transport,
          client: new ToolGatewayClient(transport, { initialize: backend.initialize }),
          available: false,
          toolCount: 0,
        };
        connections.set(backend.name, connection);

        console.log(`[ToolRegistry] Discovering tools on '${backend.name}' (${backend.transport.type}: ${transport.describe()})`);

        try {
          const tools = await connection.client.listTools({ signal: options.signal, timeoutMs });
          connection.available = true;
          connection.toolCount = tools.length;
          sources.push({ backend, tools });
          console.log(`[ToolRegistry] '${backend.name}': ${tools.length} tools (${tools.map((t) => t.name).join(", ")})`);
        } catch (error) {
          await closeQuietly(transport, backend.name);
          throwIfCancelled(options.signal);
          console.error(`[ToolRegistry] Discovery failed for '${backend.name}':`, errorMessage(error));
        }
      }

      const { tools, collisions } = mergeCatalogs(sources, options.collisionPolicy ?? config.gateway.collisionPolicy);
      for (const collision of collisions) {
        console.warn(
          `[ToolRegistry] Tool '${collision.name}' published by both '${collision.dropped}' and '${collision.kept}'; using '${collision.kept}'`
        );
      }

      console.log(`[ToolRegistry] Catalog ready: ${tools.size} tools from ${sources.length} backend(s)`);
      return new ToolRegistry(tools, connections, collisions);
    } catch (error) {
      await Promise.all(
        Array.from(connections.values())
          .filter((c) => c.available)
          .map((c) => closeQuietly(c.transport, c.backend.name))
      );
      throw error;
    }
  }

  /**
   * Name/description/schema triples for the model, no backend linkage
   */
  catalog(): ToolSpec[] {
    return Array.from(this.tools.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: { ...tool.inputSchema },
    }));
  }

  descriptors(): ToolDescriptor[] {
    return Array.from(this.tools.values());
  }

  toolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  resolve(toolName: string): BackendDescriptor {
    const tool = this.tools.get(toolName);
    if (!tool) {
      throw new ToolNotFoundError(toolName, this.toolNames());
    }
    return tool.backend;
  }

  /**
   * Execute one invocation. Throws on any failure; the caller turns that
   * into a failure-tagged result.
   */
  async invoke(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResult> {
    const backend = this.resolve(request.name);
    const tool = this.tools.get(request.name);
    const connection = this.connections.get(backend.name);
    if (!tool || !connection || this.closed) {
      throw new ToolNotFoundError(request.name, this.toolNames());
    }

    const missing = missingRequiredArguments(tool.inputSchema, request.arguments);
    if (missing.length > 0) {
      throw new ToolCallError(`Missing required argument(s) for '${request.name}': ${missing.join(", ")}`);
    }

    const { text, content } = await connection.client.callTool(request.name, request.arguments, { signal });
    return { toolUseId: request.id, isError: false, text, content };
  }

  backends(): BackendSummary[] {
    return Array.from(this.connections.values()).map((c) => ({
      name: c.backend.name,
      description: c.backend.description,
      transport: c.backend.transport.type,
      enabled: c.backend.enabled,
      available: c.available,
      toolCount: c.toolCount,
    }));
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await Promise.all(
      Array.from(this.connections.values())
        .filter((c) => c.available)
        .map((c) => closeQuietly(c.transport, c.backend.name))
    );
  }
}

async function closeQuietly(transport: ToolTransport, backendName: string): Promise<void> {
  try {
    await transport.close();
  } catch (error) {
    console.error(`[ToolRegistry] Error closing transport for '${backendName}':`, errorMessage(error));
  }
}
