/**
 * Centralized configuration for the MCP Tool Agent Gateway
 */
import type { CollisionPolicy } from "../types/index.js";

function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseCollisionPolicy(value: string | undefined): CollisionPolicy {
  switch (value) {
    case "first-wins":
    case "error":
    case "last-wins":
      return value;
    case undefined:
    case "":
      return "last-wins";
    default:
      console.warn(`[Config] Unknown MCP_COLLISION_POLICY '${value}', using 'last-wins'`);
      return "last-wins";
  }
}

const DEFAULT_SYSTEM_PROMPT = `You are a helpful AI agent with access to tools published by MCP servers.

Use tools when needed to complete the user's request.
Always confirm success or failure clearly in your response.`;

export const config = {
  // Server settings
  server: {
    port: parseInt(process.env.PORT ?? "3000", 10),
    host: process.env.HOST ?? "0.0.0.0",
    env: process.env.NODE_ENV ?? "development",
    corsOrigin: process.env.CORS_ORIGIN ?? "*",
  },

  // AWS Bedrock settings
  bedrock: {
    region: process.env.AWS_REGION ?? "us-east-1",
    modelId: process.env.BEDROCK_MODEL_ID ?? "anthropic.claude-3-sonnet-20240229-v1:0",
    maxTokens: parseInt(process.env.BEDROCK_MAX_TOKENS ?? "4096", 10),
    /** USD per 1000 input tokens; cost is omitted when unset */
    inputCostPer1k: parseOptionalNumber(process.env.BEDROCK_INPUT_COST_PER_1K),
    outputCostPer1k: parseOptionalNumber(process.env.BEDROCK_OUTPUT_COST_PER_1K),
    streaming: process.env.BEDROCK_STREAMING === "true",
  },

  // Conversation loop
  agent: {
    maxTurns: parseInt(process.env.AGENT_MAX_TURNS ?? "10", 10),
    systemPrompt: process.env.AGENT_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
  },

  // Tool backends
  gateway: {
    settingsPath: process.env.MCP_SETTINGS_PATH ?? "mcp-settings.json",
    backendsJson: process.env.MCP_BACKENDS,
    httpTimeoutMs: parseInt(process.env.MCP_HTTP_TIMEOUT_MS ?? "30000", 10),
    discoveryTimeoutMs: parseInt(process.env.MCP_DISCOVERY_TIMEOUT_MS ?? "15000", 10),
    stdioTimeoutMs: parseInt(process.env.MCP_STDIO_TIMEOUT_MS ?? "30000", 10),
    collisionPolicy: parseCollisionPolicy(process.env.MCP_COLLISION_POLICY),
  },

  // stdio -> HTTP relay
  relay: {
    url: process.env.MCP_RELAY_URL,
    timeoutMs: parseInt(process.env.MCP_RELAY_TIMEOUT_MS ?? "30000", 10),
  },

  // Local email tool and its HTTP server
  email: {
    apiUrl: process.env.EMAIL_API_URL,
    timeoutMs: parseInt(process.env.EMAIL_API_TIMEOUT_MS ?? "30000", 10),
    serverPort: parseInt(process.env.EMAIL_MCP_PORT ?? "8081", 10),
  },

  // Feature flags
  features: {
    enableRequestLogging: process.env.ENABLE_REQUEST_LOGGING !== "false",
    enableDetailedErrors: process.env.NODE_ENV === "development",
  },
} as const;

export type Config = typeof config;
