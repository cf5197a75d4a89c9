import type { Express } from "express";
import { config } from "./config/index.js";

/**
 * Start the HTTP server and set up lifecycle handlers
 */
export function startServer(app: Express) {
  const { port, host, env } = config.server;

  const server = app.listen(port, host, () => {
    console.log(`
╔══════════════════════════════════════════════════════════════╗
║          MCP Tool Agent Gateway                              ║
╠══════════════════════════════════════════════════════════════╣
║  Server running at: http://${host}:${port.toString().padEnd(27)}║
║  Environment: ${env.padEnd(45)}║
║  Model: ${config.bedrock.modelId.slice(0, 51).padEnd(51)}║
╠══════════════════════════════════════════════════════════════╣
║  Endpoints:                                                  ║
║    GET    /api/status               Health check             ║
║    GET    /api/tools                Discovered tool catalog  ║
║    POST   /api/query                Run the agent            ║
║    POST   /api/query/stream         Run with live events     ║
╚══════════════════════════════════════════════════════════════╝
    `);
  });

  // Handle server errors
  server.on("error", (error: NodeJS.ErrnoException) => {
    if (error.code === "EADDRINUSE") {
      console.error(`[Error] Port ${port} is already in use`);
    } else {
      console.error("[Error] Server error:", error);
    }
    process.exit(1);
  });

  // Set up graceful shutdown
  setupGracefulShutdown(server);

  return server;
}

/**
 * Set up graceful shutdown handlers
 */
function setupGracefulShutdown(server: ReturnType<Express["listen"]>) {
  function gracefulShutdown(signal: string): void {
    console.log(`\n[Shutdown] Received ${signal}. Starting graceful shutdown...`);

    server.close((error) => {
      if (error) {
        console.error("[Shutdown] Error during shutdown:", error);
        process.exit(1);
      }
      console.log("[Shutdown] Shutdown complete");
      process.exit(0);
    });

    setTimeout(() => {
      console.warn("[Shutdown] Forcing exit");
      process.exit(1);
    }, 10_000).unref();
  }

  // Register signal handlers
  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => gracefulShutdown("SIGINT"));

  // Handle uncaught exceptions
  process.on("uncaughtException", (error) => {
    console.error("[Fatal] Uncaught Exception:", error);
    gracefulShutdown("uncaughtException");
  });

  process.on("unhandledRejection", (reason, promise) => {
    console.error("[Fatal] Unhandled Rejection at:", promise, "reason:", reason);
  });
}
