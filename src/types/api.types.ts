import type { ToolCollision, ToolSpec, TransportKind } from "./backend.types.js";
import type { SessionStatus } from "./conversation.types.js";

/**
 * Request body for running the agent
 */
export interface QueryRequest {
  prompt: string;
  max_turns?: number;
}

/**
 * Response body for a run
 */
export interface QueryResponse {
  success: boolean;
  run_id: string;
  prompt: string;
  response: string;
  status: SessionStatus;
  tools_used: string[];
  turns: number;
  cost_usd: number;
  elapsed_seconds: number;
  error?: string;
}

/**
 * Standard error response
 */
export interface ErrorResponse {
  error: string;
  code: string;
  details?: unknown;
}

/**
 * Health check response
 */
export interface StatusResponse {
  status: string;
  timestamp: string;
}

export interface BackendSummary {
  name: string;
  description: string;
  transport: TransportKind;
  enabled: boolean;
  available: boolean;
  toolCount: number;
}

/**
 * Aggregated catalog response
 */
export interface ToolsResponse {
  tools: Array<ToolSpec & { backend: string }>;
  count: number;
  backends: BackendSummary[];
  collisions: ToolCollision[];
}
