/**
 * Service exports
 *
 * Centralized exports for all service modules.
 */

// Errors
export * from "./errors.js";

// Tool backends
export { ToolGatewayClient, parseResponse, firstText } from "./ToolGatewayClient.js";
export type { GatewayCallResult, ToolGatewayClientOptions } from "./ToolGatewayClient.js";
export { ToolRegistry, mergeCatalogs, missingRequiredArguments } from "./ToolRegistry.js";
export type { CatalogSource, DiscoverOptions, MergedCatalog } from "./ToolRegistry.js";
export { HttpTransport, StdioTransport, InProcessTransport, createTransport } from "./transports/index.js";
export type { RequestOptions, ToolTransport, TransportFactory } from "./transports/index.js";

// JSON-RPC serving
export { JsonRpcResponder, MCP_PROTOCOL_VERSION } from "./JsonRpcResponder.js";
export type { ServerInfo } from "./JsonRpcResponder.js";
export { JsonRpcRelay, createHttpForwarder } from "./JsonRpcRelay.js";
export type { Forwarder } from "./JsonRpcRelay.js";

// LLM Services
export { BedrockService, BedrockStreamingService } from "./BedrockService.js";
export type { BedrockServiceOptions } from "./BedrockService.js";

// Agent
export { ConversationLoop, estimateCost, BUDGET_EXHAUSTED_RESPONSE } from "./ConversationLoop.js";
export type { ConversationLoopOptions, TokenPricing, ToolExecutor } from "./ConversationLoop.js";
export { AgentService, agentService } from "./AgentService.js";
export type { AgentServiceOptions, RunOptions } from "./AgentService.js";
