import type { Request, Response, NextFunction } from "express";

/**
 * Request logging middleware
 * Logs method and path on arrival, status and duration on completion
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);

  res.on("finish", () => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path} → ${res.statusCode} (${Date.now() - startTime}ms)`);
  });

  next();
}
