import {
  BedrockRuntimeClient,
  ConverseCommand,
  ConverseStreamCommand,
  type ContentBlock,
  type ConverseCommandInput,
  type ConverseCommandOutput,
  type ConverseStreamCommandInput,
  type ConverseStreamOutput,
  type Message,
  type ToolConfiguration,
} from "@aws-sdk/client-bedrock-runtime";
import { v4 as uuidv4 } from "uuid";
import { config } from "../config/index.js";
import {
  isRecord,
  type ContentPart,
  type ConversationMessage,
  type InvocationRequest,
  type ModelClient,
  type ModelRequest,
  type ModelTurn,
  type TokenUsage,
  type ToolSpec,
} from "../types/index.js";
import { ModelError, RunCancelledError, errorMessage } from "./errors.js";

/**
 * JSON value as Bedrock's document type accepts it
 */
type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export type ConverseSender = (input: ConverseCommandInput, signal?: AbortSignal) => Promise<ConverseCommandOutput>;

export type ConverseStreamSender = (
  input: ConverseStreamCommandInput,
  signal?: AbortSignal
) => Promise<AsyncIterable<ConverseStreamOutput>>;

export interface BedrockServiceOptions {
  modelId?: string;
  region?: string;
  maxTokens?: number;
  temperature?: number;
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (isRecord(value)) {
    const object: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        object[key] = toJsonValue(entry);
      }
    }
    return object;
  }
  return null;
}

function toContentBlock(part: ContentPart): ContentBlock | null {
  switch (part.type) {
    case "text":
      // Bedrock rejects empty text blocks
      return part.text ? { text: part.text } : null;
    case "tool_use":
      return { toolUse: { toolUseId: part.id, name: part.name, input: toJsonValue(part.input) } };
    case "tool_result":
      return {
        toolResult: {
          toolUseId: part.toolUseId,
          content: [{ text: part.text }],
          status: part.isError ? "error" : "success",
        },
      };
  }
}

/**
 * Convert conversation history to Bedrock message format
 */
export function toBedrockMessages(messages: ConversationMessage[]): Message[] {
  return messages.map((message) => ({
    role: message.role,
    content: message.content.map(toContentBlock).filter((block): block is ContentBlock => block !== null),
  }));
}

/**
 * Convert the tool catalog to Bedrock tool configuration
 */
export function toToolConfiguration(tools: ToolSpec[]): ToolConfiguration | undefined {
  if (tools.length === 0) {
    return undefined;
  }
  return {
    tools: tools.map((tool) => ({
      toolSpec: {
        name: tool.name,
        description: tool.description || `Tool: ${tool.name}`,
        inputSchema: { json: toJsonValue(tool.inputSchema) },
      },
    })),
  };
}

function toUsage(usage: { inputTokens?: number; outputTokens?: number } | undefined): TokenUsage | undefined {
  return usage ? { inputTokens: usage.inputTokens ?? 0, outputTokens: usage.outputTokens ?? 0 } : undefined;
}

function buildTurn(stopReason: string | undefined, content: ContentPart[], usage?: TokenUsage): ModelTurn {
  const toolRequests: InvocationRequest[] = [];
  let text = "";
  for (const part of content) {
    if (part.type === "text") {
      text += part.text;
    } else if (part.type === "tool_use") {
      toolRequests.push({ id: part.id, name: part.name, arguments: part.input });
    }
  }
  return { stopReason: stopReason ?? "unknown", text, content, toolRequests, usage };
}

/**
 * Convert a Converse response into a model turn
 */
export function fromConverseOutput(output: ConverseCommandOutput): ModelTurn {
  const blocks = output.output?.message?.content ?? [];
  const content: ContentPart[] = [];

  for (const block of blocks) {
    if (block.text !== undefined) {
      content.push({ type: "text", text: block.text });
    }
    if (block.toolUse !== undefined) {
      const toolUse = block.toolUse;
      content.push({
        type: "tool_use",
        id: toolUse.toolUseId ?? uuidv4(),
        name: toolUse.name ?? "unknown",
        input: isRecord(toolUse.input) ? toolUse.input : {},
      });
    }
  }

  return buildTurn(output.stopReason, content, toUsage(output.usage));
}

interface PendingBlock {
  text: string;
  toolUse?: { id: string; name: string; input: string };
}

function parseToolInput(raw: string, toolName: string): Record<string, unknown> {
  if (raw.trim() === "") {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ModelError(`Streamed input for tool '${toolName}' is not valid JSON: ${errorMessage(error)}`);
  }
  return isRecord(parsed) ? parsed : {};
}

/**
 * Fold a ConverseStream event sequence into one model turn.
 * Text deltas and tool input fragments are accumulated per content block
 * index; `onToolRequest` fires as each tool block completes.
 */
export async function accumulateStream(
  events: AsyncIterable<ConverseStreamOutput>,
  onToolRequest?: (request: InvocationRequest) => void
): Promise<ModelTurn> {
  const blocks = new Map<number, PendingBlock>();
  const content: ContentPart[] = [];
  let stopReason: string | undefined;
  let usage: TokenUsage | undefined;

  const blockAt = (index: number): PendingBlock => {
    let block = blocks.get(index);
    if (!block) {
      block = { text: "" };
      blocks.set(index, block);
    }
    return block;
  };

  const finishBlock = (index: number) => {
    const block = blocks.get(index);
    if (!block) return;
    blocks.delete(index);

    if (block.toolUse) {
      const request: InvocationRequest = {
        id: block.toolUse.id,
        name: block.toolUse.name,
        arguments: parseToolInput(block.toolUse.input, block.toolUse.name),
      };
      content.push({ type: "tool_use", id: request.id, name: request.name, input: request.arguments });
      if (onToolRequest) {
        try {
          onToolRequest(request);
        } catch (error) {
          console.error("[BedrockStreamingService] onToolRequest callback failed:", errorMessage(error));
        }
      }
    } else if (block.text) {
      content.push({ type: "text", text: block.text });
    }
  };

  for await (const event of events) {
    const streamError =
      event.internalServerException ??
      event.modelStreamErrorException ??
      event.validationException ??
      event.throttlingException;
    if (streamError) {
      throw new ModelError(`Bedrock stream error: ${streamError.message}`, streamError);
    }

    if (event.contentBlockStart) {
      const start = event.contentBlockStart.start?.toolUse;
      const block = blockAt(event.contentBlockStart.contentBlockIndex ?? 0);
      if (start) {
        block.toolUse = { id: start.toolUseId ?? uuidv4(), name: start.name ?? "unknown", input: "" };
      }
    } else if (event.contentBlockDelta) {
      const delta = event.contentBlockDelta.delta;
      const block = blockAt(event.contentBlockDelta.contentBlockIndex ?? 0);
      if (delta?.text !== undefined) {
        block.text += delta.text;
      }
      if (delta?.toolUse?.input !== undefined && block.toolUse) {
        block.toolUse.input += delta.toolUse.input;
      }
    } else if (event.contentBlockStop) {
      finishBlock(event.contentBlockStop.contentBlockIndex ?? 0);
    } else if (event.messageStop) {
      stopReason = event.messageStop.stopReason;
    } else if (event.metadata) {
      usage = toUsage(event.metadata.usage);
    }
  }

  // Blocks the stream never closed
  for (const index of Array.from(blocks.keys()).sort((a, b) => a - b)) {
    finishBlock(index);
  }

  return buildTurn(stopReason, content, usage);
}

function isAbort(error: unknown, signal?: AbortSignal): boolean {
  return signal?.aborted === true || (error instanceof Error && error.name === "AbortError");
}

/**
 * BedrockService - model client over the Bedrock Converse API
 */
export class BedrockService implements ModelClient {
  readonly modelId: string;
  protected maxTokens: number;
  protected temperature: number;
  private region: string;
  private client: BedrockRuntimeClient | null = null;
  private sender: ConverseSender;

  constructor(options: BedrockServiceOptions = {}, sender?: ConverseSender) {
    this.modelId = options.modelId ?? config.bedrock.modelId;
    this.region = options.region ?? config.bedrock.region;
    this.maxTokens = options.maxTokens ?? config.bedrock.maxTokens;
    this.temperature = options.temperature ?? 0.7;
    this.sender =
      sender ?? ((input, signal) => this.getClient().send(new ConverseCommand(input), { abortSignal: signal }));

    console.log(`[BedrockService] Initialized with model: ${this.modelId}`);
  }

  protected getClient(): BedrockRuntimeClient {
    if (!this.client) {
      this.client = new BedrockRuntimeClient({ region: this.region });
    }
    return this.client;
  }

  protected buildInput(request: ModelRequest): ConverseCommandInput {
    return {
      modelId: this.modelId,
      messages: toBedrockMessages(request.messages),
      system: [{ text: request.system }],
      toolConfig: toToolConfiguration(request.tools),
      inferenceConfig: {
        maxTokens: request.maxTokens ?? this.maxTokens,
        temperature: this.temperature,
      },
    };
  }

  async converse(request: ModelRequest): Promise<ModelTurn> {
    console.log(`[BedrockService] Converse: ${request.messages.length} messages, ${request.tools.length} tools`);

    let output: ConverseCommandOutput;
    try {
      output = await this.sender(this.buildInput(request), request.signal);
    } catch (error) {
      if (isAbort(error, request.signal)) {
        throw new RunCancelledError();
      }
      console.error("[BedrockService] Error:", errorMessage(error));
      throw new ModelError(`Bedrock API error: ${errorMessage(error)}`, error);
    }

    const turn = fromConverseOutput(output);
    console.log(`[BedrockService] Stop reason: ${turn.stopReason} | Tools: ${turn.toolRequests.length}`);
    return turn;
  }
}

/**
 * BedrockStreamingService - same contract over ConverseStream; the turn is
 * returned once the stream reaches messageStop.
 */
export class BedrockStreamingService extends BedrockService {
  private streamSender: ConverseStreamSender;

  constructor(options: BedrockServiceOptions = {}, streamSender?: ConverseStreamSender) {
    super(options);
    this.streamSender =
      streamSender ??
      (async (input, signal) => {
        const response = await this.getClient().send(new ConverseStreamCommand(input), { abortSignal: signal });
        if (!response.stream) {
          throw new ModelError("Bedrock returned no stream");
        }
        return response.stream;
      });
  }

  override async converse(request: ModelRequest): Promise<ModelTurn> {
    console.log(`[BedrockStreamingService] ConverseStream: ${request.messages.length} messages`);

    try {
      const events = await this.streamSender(this.buildInput(request), request.signal);
      const turn = await accumulateStream(events, request.onToolRequest);
      console.log(`[BedrockStreamingService] Stop reason: ${turn.stopReason} | Tools: ${turn.toolRequests.length}`);
      return turn;
    } catch (error) {
      if (isAbort(error, request.signal)) {
        throw new RunCancelledError();
      }
      if (error instanceof ModelError) {
        throw error;
      }
      console.error("[BedrockStreamingService] Error:", errorMessage(error));
      throw new ModelError(`Bedrock API error: ${errorMessage(error)}`, error);
    }
  }
}
