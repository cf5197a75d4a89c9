#!/usr/bin/env node
/**
 * mcp-relay <url>
 *
 * Exposes an HTTP MCP backend as a stdio MCP server. stdout is the protocol
 * channel, so every log line goes to stderr.
 */
import "dotenv/config";
import { config } from "./config/index.js";
import { JsonRpcRelay, createHttpForwarder } from "./services/JsonRpcRelay.js";

const url = process.argv[2] ?? config.relay.url;
if (!url) {
  console.error("Usage: mcp-relay <url>  (or set MCP_RELAY_URL)");
  process.exit(1);
}

console.error(`[JsonRpcRelay] Forwarding stdin to ${url}`);

const relay = new JsonRpcRelay(createHttpForwarder(url, config.relay.timeoutMs), process.stdout);

relay
  .run(process.stdin)
  .then(() => {
    console.error("[JsonRpcRelay] stdin closed");
  })
  .catch((error: unknown) => {
    console.error("[JsonRpcRelay] Fatal:", error);
    process.exit(1);
  });
