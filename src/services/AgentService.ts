import { v4 as uuidv4 } from "uuid";
import { config } from "../config/index.js";
import { loadBackends, type LoadBackendsOptions } from "../config/backends.js";
import type { BackendDescriptor, ModelClient, ProgressEvent, SessionResult, ToolsResponse } from "../types/index.js";
import { BedrockService, BedrockStreamingService } from "./BedrockService.js";
import { ConversationLoop } from "./ConversationLoop.js";
import { ToolRegistry, type DiscoverOptions } from "./ToolRegistry.js";

export interface RunOptions {
  prompt: string;
  maxTurns?: number;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
  /** Use the streaming model client for this run */
  stream?: boolean;
}

export interface AgentServiceOptions {
  /** Fixed model client; otherwise one is built per run */
  model?: ModelClient;
  backends?: LoadBackendsOptions;
  /** Skip configuration loading and use these descriptors */
  loadBackends?: () => Promise<BackendDescriptor[]>;
  discover?: Omit<DiscoverOptions, "signal">;
}

/**
 * AgentService - one run per call: load backends, discover a fresh
 * registry, run the conversation loop, release every transport.
 */
export class AgentService {
  private models = new Map<boolean, ModelClient>();

  constructor(private options: AgentServiceOptions = {}) {}

  async run(options: RunOptions): Promise<SessionResult> {
    const runId = uuidv4();
    console.log(`[AgentService] Run ${runId}: "${options.prompt.slice(0, 100)}"`);

    const backends = await this.loadBackends();
    const registry = await ToolRegistry.discover(backends, { ...this.options.discover, signal: options.signal });

    try {
      const loop = new ConversationLoop({
        model: this.modelFor(options.stream),
        tools: registry,
        maxTurns: options.maxTurns ?? config.agent.maxTurns,
        signal: options.signal,
        onProgress: options.onProgress,
        runId,
      });
      const result = await loop.run(options.prompt);
      console.log(
        `[AgentService] Run ${runId} ${result.status}: turns=${result.turns}, tools=[${result.toolsUsed.join(", ")}]`
      );
      return result;
    } finally {
      await registry.close();
    }
  }

  /**
   * One discovery pass, for catalog inspection
   */
  async listTools(signal?: AbortSignal): Promise<ToolsResponse> {
    const registry = await ToolRegistry.discover(await this.loadBackends(), { ...this.options.discover, signal });
    try {
      const tools = registry.descriptors().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: { ...tool.inputSchema },
        backend: tool.backend.name,
      }));
      return {
        tools,
        count: tools.length,
        backends: registry.backends(),
        collisions: registry.collisions,
      };
    } finally {
      await registry.close();
    }
  }

  private loadBackends(): Promise<BackendDescriptor[]> {
    return this.options.loadBackends ? this.options.loadBackends() : loadBackends(this.options.backends);
  }

  private modelFor(stream: boolean = config.bedrock.streaming): ModelClient {
    if (this.options.model) {
      return this.options.model;
    }
    let model = this.models.get(stream);
    if (!model) {
      model = stream ? new BedrockStreamingService() : new BedrockService();
      this.models.set(stream, model);
    }
    return model;
  }
}

export const agentService = new AgentService();
