import express, { type Request, type Response } from "express";
import type { AgentRunner } from "./controllers/agentController.js";
import { createRoutes } from "./routes/index.js";
import {
  corsMiddleware,
  preflightHandler,
  requestLogger,
  errorHandler,
  notFoundHandler,
} from "./middleware/index.js";
import { config } from "./config/index.js";
import { agentService } from "./services/index.js";

export interface AppOptions {
  agent?: AgentRunner;
}

/**
 * Create and configure Express application
 */
export function createApp(options: AppOptions = {}) {
  const app = express();

  // Body parsing middleware
  app.use(express.json());

  // Request logging
  if (config.features.enableRequestLogging) {
    app.use(requestLogger);
  }

  // CORS
  app.use(corsMiddleware);
  app.options("*", preflightHandler);

  // API routes
  app.use("/api", createRoutes(options.agent ?? agentService));

  // Root endpoint - API info
  app.get("/", (_req: Request, res: Response) => {
    res.json({
      name: "MCP Tool Agent Gateway",
      version: "1.0.0",
      description: "Runs a tool-using agent against tools published by MCP backends",
      endpoints: {
        status: "GET /api/status",
        tools: "GET /api/tools",
        query: "POST /api/query",
        queryStream: "POST /api/query/stream",
      },
    });
  });

  // Error handlers (must be last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
