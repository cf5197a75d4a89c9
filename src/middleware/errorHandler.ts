import type { Request, Response, NextFunction } from "express";
import type { ErrorResponse } from "../types/index.js";
import { config } from "../config/index.js";
import { GatewayError } from "../services/errors.js";

/**
 * Global error handler middleware
 * Maps GatewayError to its status and code; anything else is a 500
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof GatewayError) {
    console.error(`[Error] ${err.code}: ${err.message}`);
    const response: ErrorResponse = { error: err.message, code: err.code, details: err.details };
    res.status(err.statusCode).json(response);
    return;
  }

  // Body parser rejects malformed JSON before any controller runs
  if ("type" in err && err.type === "entity.parse.failed") {
    const response: ErrorResponse = { error: "Request body is not valid JSON", code: "INVALID_REQUEST" };
    res.status(400).json(response);
    return;
  }

  console.error("[Error]", err);

  const response: ErrorResponse = {
    error: err.message || "Internal Server Error",
    code: "INTERNAL_ERROR",
    details: config.features.enableDetailedErrors ? err.stack : undefined,
  };

  res.status(500).json(response);
}
