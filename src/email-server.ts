#!/usr/bin/env node
/**
 * email-mcp-server - the send_email tool as an HTTP MCP backend
 */
import "dotenv/config";
import { config } from "./config/index.js";
import { createEmailServer } from "./servers/emailServer.js";

const port = config.email.serverPort;
const host = config.server.host;

const server = createEmailServer().listen(port, host, () => {
  console.log(`[EmailMcpServer] Listening on http://${host}:${port}`);
  if (!config.email.apiUrl) {
    console.warn("[EmailMcpServer] EMAIL_API_URL is not set; send_email calls will fail");
  }
});

server.on("error", (error: NodeJS.ErrnoException) => {
  if (error.code === "EADDRINUSE") {
    console.error(`[Error] Port ${port} is already in use`);
  } else {
    console.error("[Error] Server error:", error);
  }
  process.exit(1);
});
