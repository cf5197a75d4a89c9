/**
 * Base error for everything the gateway raises on purpose.
 * Carries a machine-readable code and the HTTP status the API maps it to.
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = "GatewayError";
  }
}

/**
 * Backend unreachable, timed out, non-2xx, or the subprocess died
 */
export class TransportError extends GatewayError {
  constructor(message: string, details?: unknown) {
    super(message, "TRANSPORT_ERROR", 502, details);
    this.name = "TransportError";
  }
}

/**
 * Payload is not well-formed JSON-RPC
 */
export class ProtocolError extends GatewayError {
  constructor(message: string, details?: unknown) {
    super(message, "PROTOCOL_ERROR", 502, details);
    this.name = "ProtocolError";
  }
}

/**
 * The tool ran but the backend reported a failure
 */
export class ToolCallError extends GatewayError {
  constructor(
    message: string,
    public rpcCode?: number,
    details?: unknown
  ) {
    super(message, "TOOL_CALL_FAILED", 400, details);
    this.name = "ToolCallError";
  }
}

export class ToolNotFoundError extends GatewayError {
  constructor(public toolName: string, available: string[] = []) {
    super(
      `Tool '${toolName}' not found. Available tools: ${available.length > 0 ? available.join(", ") : "(none)"}`,
      "TOOL_NOT_FOUND",
      404
    );
    this.name = "ToolNotFoundError";
  }
}

/**
 * Inference endpoint failure; ends the run
 */
export class ModelError extends GatewayError {
  constructor(message: string, details?: unknown) {
    super(message, "MODEL_ERROR", 503, details);
    this.name = "ModelError";
  }
}

export class ConfigError extends GatewayError {
  constructor(message: string, details?: unknown) {
    super(message, "CONFIG_ERROR", 500, details);
    this.name = "ConfigError";
  }
}

export class RunCancelledError extends GatewayError {
  constructor(message = "Run cancelled by caller") {
    super(message, "RUN_CANCELLED", 499);
    this.name = "RunCancelledError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Throw when the caller has abandoned the run
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RunCancelledError();
  }
}
