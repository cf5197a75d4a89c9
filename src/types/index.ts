/**
 * Type exports
 * Re-export all types from their respective modules
 */

// JSON-RPC wire types
export type {
  JsonRpcId,
  JsonRpcRequest,
  JsonRpcNotification,
  JsonRpcErrorObject,
  JsonRpcSuccessResponse,
  JsonRpcErrorResponse,
  JsonRpcResponse,
  JsonRpcMessage,
  ToolContentBlock,
  ToolCallResult,
  ToolListing,
} from "./jsonrpc.types.js";
export { JsonRpcErrorCode, isRecord, isNotification } from "./jsonrpc.types.js";

// Backends and tools
export type {
  HttpTransportSpec,
  StdioTransportSpec,
  InProcessTransportSpec,
  TransportSpec,
  TransportKind,
  BackendDescriptor,
  ToolDescriptor,
  ToolSpec,
  ToolCollision,
  CollisionPolicy,
} from "./backend.types.js";

// Conversation
export type {
  ContentPart,
  ConversationMessage,
  InvocationRequest,
  InvocationResult,
  TokenUsage,
  StopReason,
  ModelTurn,
  ModelRequest,
  ModelClient,
  LoopState,
  SessionStatus,
  ToolCallRecord,
  SessionResult,
  ProgressEvent,
} from "./conversation.types.js";

// API types
export type {
  QueryRequest,
  QueryResponse,
  ErrorResponse,
  StatusResponse,
  BackendSummary,
  ToolsResponse,
} from "./api.types.js";
