/**
 * Serves a local tool set as an HTTP MCP backend: JSON-RPC on POST /,
 * health on GET /.
 */
import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { config } from "../config/index.js";
import { errorHandler, requestLogger } from "../middleware/index.js";
import { JsonRpcResponder } from "../services/JsonRpcResponder.js";
import { JsonRpcErrorCode } from "../types/index.js";
import { getToolSet, type LocalTool } from "../tools/index.js";

export const EMAIL_SERVER_INFO = { name: "email-mcp-server", version: "1.0.0" };

/**
 * Create the Express app for a tool set. Notifications get an empty 204.
 */
export function createEmailServer(tools: LocalTool[] = getToolSet("email")): Express {
  const responder = new JsonRpcResponder(tools, EMAIL_SERVER_INFO);
  const app = express();

  app.use(express.json());
  if (config.features.enableRequestLogging) {
    app.use(requestLogger);
  }

  app.get("/", (_req: Request, res: Response) => {
    res.json({ status: "ok", service: EMAIL_SERVER_INFO.name });
  });

  app.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const response = await responder.handle(req.body);
      if (response === undefined) {
        res.status(204).end();
        return;
      }
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  // Malformed JSON is a JSON-RPC parse error, not an HTTP one
  app.use((err: Error, _req: Request, res: Response, next: NextFunction) => {
    if ("type" in err && err.type === "entity.parse.failed") {
      res.json({ jsonrpc: "2.0", id: null, error: { code: JsonRpcErrorCode.ParseError, message: "Parse error" } });
      return;
    }
    next(err);
  });
  app.use(errorHandler);
  return app;
}
