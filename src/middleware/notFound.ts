import type { Request, Response } from "express";
import { sendError } from "../utils/index.js";

/**
 * 404 for anything no route matched
 */
export function notFoundHandler(req: Request, res: Response): void {
  sendError(res, `Route not found: ${req.method} ${req.path}`, "NOT_FOUND", 404);
}
