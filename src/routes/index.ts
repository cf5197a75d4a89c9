import { Router } from "express";
import { clientDisconnect } from "../middleware/index.js";
import type { AgentRunner } from "../controllers/agentController.js";
import { createAgentRoutes } from "./agent.routes.js";

/**
 * API routes, mounted under /api
 */
export function createRoutes(agent: AgentRunner): Router {
  const router = Router();

  // Runs stop when the caller goes away
  router.use(clientDisconnect);
  router.use(createAgentRoutes(agent));

  return router;
}
