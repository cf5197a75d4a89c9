import type { Request, Response, NextFunction } from "express";
import { config } from "../config/index.js";

/**
 * CORS for browser clients of the query API, SSE included
 */
export function corsMiddleware(_req: Request, res: Response, next: NextFunction): void {
  res.header("Access-Control-Allow-Origin", config.server.corsOrigin);
  res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
  res.header("Access-Control-Allow-Headers", "Content-Type, Accept, Authorization");
  next();
}

/**
 * Answer preflight requests; browsers may cache the answer for ten minutes
 */
export function preflightHandler(_req: Request, res: Response): void {
  res.header("Access-Control-Max-Age", "600");
  res.sendStatus(204);
}
