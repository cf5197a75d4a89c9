/**
 * JSON-RPC 2.0 envelope types for the MCP tool dialect
 */

export type JsonRpcId = number | string;

/**
 * Request with a correlation id. A message without `id` is a notification.
 */
export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccessResponse {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  result: unknown;
}

export interface JsonRpcErrorResponse {
  jsonrpc: "2.0";
  id: JsonRpcId | null;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export type JsonRpcMessage = JsonRpcRequest | JsonRpcNotification;

/**
 * Well-known error codes used across the gateway, the responder and the relay
 */
export const JsonRpcErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  ExecutionFailed: -32000,
} as const;

/**
 * One block of a `tools/call` result
 */
export type ToolContentBlock =
  | { type: "text"; text: string }
  | { type: string; [key: string]: unknown };

export interface ToolCallResult {
  content: ToolContentBlock[];
  isError?: boolean;
}

/**
 * Tool entry as published by `tools/list`
 */
export interface ToolListing {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isNotification(message: Record<string, unknown>): boolean {
  return message.id === undefined || message.id === null;
}
