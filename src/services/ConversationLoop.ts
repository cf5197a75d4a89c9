import { v4 as uuidv4 } from "uuid";
import { config } from "../config/index.js";
import type {
  ContentPart,
  ConversationMessage,
  InvocationRequest,
  InvocationResult,
  LoopState,
  ModelClient,
  ProgressEvent,
  SessionResult,
  SessionStatus,
  TokenUsage,
  ToolCallRecord,
  ToolSpec,
} from "../types/index.js";
import { ModelError, errorMessage, throwIfCancelled } from "./errors.js";

export const BUDGET_EXHAUSTED_RESPONSE = "Task incomplete - max turns reached";

/**
 * The part of the registry the loop needs
 */
export interface ToolExecutor {
  catalog(): ToolSpec[];
  invoke(request: InvocationRequest, signal?: AbortSignal): Promise<InvocationResult>;
}

export interface TokenPricing {
  /** USD per 1000 input tokens */
  inputCostPer1k?: number;
  outputCostPer1k?: number;
}

export interface ConversationLoopOptions {
  model: ModelClient;
  tools: ToolExecutor;
  maxTurns?: number;
  systemPrompt?: string;
  maxTokens?: number;
  signal?: AbortSignal;
  onProgress?: (event: ProgressEvent) => void;
  runId?: string;
  pricing?: TokenPricing;
}

export function estimateCost(usage: TokenUsage, pricing: TokenPricing): number | undefined {
  if (pricing.inputCostPer1k === undefined || pricing.outputCostPer1k === undefined) {
    return undefined;
  }
  const cost =
    (usage.inputTokens / 1000) * pricing.inputCostPer1k + (usage.outputTokens / 1000) * pricing.outputCostPer1k;
  return Math.round(cost * 1_000_000) / 1_000_000;
}

function progressFor(request: InvocationRequest): ProgressEvent {
  return {
    message: `Calling tool: ${request.name}`,
    icon: request.name.includes("email") ? "📧" : "⚙️",
    tool: request.name,
  };
}

/**
 * ConversationLoop - drives one run: model turn, tool execution, repeat,
 * until a final answer, the turn budget, cancellation or an error.
 *
 * A loop instance is single-use.
 */
export class ConversationLoop {
  private state: LoopState = "AWAITING_MODEL";
  private messages: ConversationMessage[] = [];
  private toolsUsed: string[] = [];
  private toolCalls: ToolCallRecord[] = [];
  private usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };
  private turns = 0;
  private announced = new Set<string>();
  private readonly maxTurns: number;
  private readonly runId: string;

  constructor(private options: ConversationLoopOptions) {
    this.maxTurns = options.maxTurns ?? config.agent.maxTurns;
    this.runId = options.runId ?? uuidv4();
    if (!Number.isInteger(this.maxTurns) || this.maxTurns < 1) {
      throw new RangeError(`maxTurns must be a positive integer, got ${this.maxTurns}`);
    }
  }

  async run(prompt: string): Promise<SessionResult> {
    if (this.state !== "AWAITING_MODEL" || this.messages.length > 0) {
      throw new Error("ConversationLoop instances are single-use");
    }

    const startTime = Date.now();
    const { model, tools, signal } = this.options;
    const catalog = tools.catalog();
    let response = "";
    let error: string | undefined;

    this.messages.push({ role: "user", content: [{ type: "text", text: prompt }] });
    console.log(`[ConversationLoop] Run ${this.runId}: ${catalog.length} tools, max ${this.maxTurns} turns`);

    try {
      while (this.state === "AWAITING_MODEL") {
        throwIfCancelled(signal);

        const turn = await model.converse({
          system: this.options.systemPrompt ?? config.agent.systemPrompt,
          messages: [...this.messages],
          tools: catalog,
          maxTokens: this.options.maxTokens,
          signal,
          onToolRequest: (request) => this.announce(request),
        });
        this.turns++;
        this.state = "MODEL_RESPONDED";
        if (turn.usage) {
          this.usage.inputTokens += turn.usage.inputTokens;
          this.usage.outputTokens += turn.usage.outputTokens;
        }
        console.log(`[ConversationLoop] Turn ${this.turns}/${this.maxTurns}: ${turn.stopReason}`);

        if (turn.stopReason === "end_turn") {
          this.messages.push({ role: "assistant", content: turn.content });
          response = turn.text;
          this.state = "DONE";
          break;
        }

        if (turn.stopReason !== "tool_use") {
          throw new ModelError(`Unexpected stop reason: ${turn.stopReason}`);
        }
        if (turn.toolRequests.length === 0) {
          throw new ModelError("Model asked for tool use without any tool request");
        }

        this.messages.push({ role: "assistant", content: turn.content });
        this.state = "AWAITING_TOOL_RESULTS";

        const results = await this.executeTools(turn.toolRequests);
        this.messages.push({
          role: "user",
          content: results.map(
            (result): ContentPart => ({
              type: "tool_result",
              toolUseId: result.toolUseId,
              text: result.text,
              isError: result.isError,
            })
          ),
        });

        if (this.turns >= this.maxTurns) {
          console.warn(`[ConversationLoop] Max turns (${this.maxTurns}) reached`);
          response = BUDGET_EXHAUSTED_RESPONSE;
          this.state = "BUDGET_EXHAUSTED";
        } else {
          this.state = "AWAITING_MODEL";
        }
      }
    } catch (caught) {
      console.error(`[ConversationLoop] Run ${this.runId} failed:`, errorMessage(caught));
      this.state = "FAILED";
      error = errorMessage(caught);
    }

    const status: SessionStatus =
      this.state === "DONE" ? "completed" : this.state === "BUDGET_EXHAUSTED" ? "budget_exhausted" : "error";

    return {
      runId: this.runId,
      status,
      response,
      toolsUsed: [...this.toolsUsed],
      toolCalls: [...this.toolCalls],
      turns: this.turns,
      maxTurns: this.maxTurns,
      usage: { ...this.usage },
      costUsd: estimateCost(this.usage, this.options.pricing ?? config.bedrock),
      error,
      elapsedMs: Date.now() - startTime,
    };
  }

  /**
   * Run every request of a turn in order; each yields exactly one result
   */
  private async executeTools(requests: InvocationRequest[]): Promise<InvocationResult[]> {
    const results: InvocationResult[] = [];

    for (const request of requests) {
      throwIfCancelled(this.options.signal);
      this.announce(request);
      this.toolsUsed.push(request.name);
      console.log(`[ConversationLoop]   → Calling tool: ${request.name}`);

      const startTime = Date.now();
      let result: InvocationResult;
      try {
        result = await this.options.tools.invoke(request, this.options.signal);
        console.log(`[ConversationLoop]   ✓ ${request.name}: ${result.text.slice(0, 100)}`);
      } catch (caught) {
        throwIfCancelled(this.options.signal);
        console.error(`[ConversationLoop]   ✗ ${request.name} failed:`, errorMessage(caught));
        result = { toolUseId: request.id, isError: true, text: `Error: ${errorMessage(caught)}`, content: [] };
      }

      this.toolCalls.push({
        toolUseId: request.id,
        name: request.name,
        arguments: request.arguments,
        isError: result.isError,
        result: result.text,
        executionTime: Date.now() - startTime,
      });
      results.push(result);
    }

    return results;
  }

  /**
   * Report a tool request once, whether a streaming client saw it first or not
   */
  private announce(request: InvocationRequest): void {
    if (this.announced.has(request.id)) {
      return;
    }
    this.announced.add(request.id);
    if (!this.options.onProgress) {
      return;
    }
    try {
      this.options.onProgress(progressFor(request));
    } catch (caught) {
      console.error("[ConversationLoop] Progress callback failed:", errorMessage(caught));
    }
  }
}
