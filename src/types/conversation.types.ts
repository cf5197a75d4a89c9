import type { ToolContentBlock } from "./jsonrpc.types.js";
import type { ToolSpec } from "./backend.types.js";

/**
 * Parts of a conversation message, independent of the model vendor
 */
export type ContentPart =
  | { type: "text"; text: string }
  | { type: "tool_use"; id: string; name: string; input: Record<string, unknown> }
  | { type: "tool_result"; toolUseId: string; text: string; isError: boolean };

export interface ConversationMessage {
  role: "user" | "assistant";
  content: ContentPart[];
}

/**
 * Tool invocation emitted by the model
 */
export interface InvocationRequest {
  /** Correlation id chosen by the model */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * Outcome of one invocation, always tagged with its request id
 */
export interface InvocationResult {
  toolUseId: string;
  isError: boolean;
  /** First text block, or the failure cause */
  text: string;
  /** Every block the backend returned (empty on failure) */
  content: ToolContentBlock[];
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type StopReason = "end_turn" | "tool_use" | (string & {});

/**
 * One complete model response
 */
export interface ModelTurn {
  stopReason: StopReason;
  /** Concatenation of every text part */
  text: string;
  content: ContentPart[];
  toolRequests: InvocationRequest[];
  usage?: TokenUsage;
}

export interface ModelRequest {
  system: string;
  messages: ConversationMessage[];
  tools: ToolSpec[];
  maxTokens?: number;
  signal?: AbortSignal;
  /** Fired once per tool request as it is observed (streaming clients) */
  onToolRequest?: (request: InvocationRequest) => void;
}

/**
 * Anything that can answer one turn of the conversation
 */
export interface ModelClient {
  readonly modelId: string;
  converse(request: ModelRequest): Promise<ModelTurn>;
}

export type LoopState =
  | "AWAITING_MODEL"
  | "MODEL_RESPONDED"
  | "AWAITING_TOOL_RESULTS"
  | "DONE"
  | "BUDGET_EXHAUSTED"
  | "FAILED";

export type SessionStatus = "completed" | "budget_exhausted" | "error";

export interface ToolCallRecord {
  toolUseId: string;
  name: string;
  arguments: Record<string, unknown>;
  isError: boolean;
  result: string;
  executionTime: number;
}

export interface SessionResult {
  runId: string;
  status: SessionStatus;
  response: string;
  /** Tool names in invocation order */
  toolsUsed: string[];
  toolCalls: ToolCallRecord[];
  turns: number;
  maxTurns: number;
  usage: TokenUsage;
  costUsd?: number;
  error?: string;
  elapsedMs: number;
}

export interface ProgressEvent {
  message: string;
  icon: string;
  tool: string;
}
