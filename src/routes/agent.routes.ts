import { Router } from "express";
import { createAgentController, type AgentRunner } from "../controllers/agentController.js";

/**
 * Agent endpoints
 */
export function createAgentRoutes(agent: AgentRunner): Router {
  const router = Router();
  const controller = createAgentController(agent);

  router.get("/status", controller.status);
  router.get("/tools", controller.tools);
  router.post("/query", controller.query);
  router.post("/query/stream", controller.queryStream);

  return router;
}
