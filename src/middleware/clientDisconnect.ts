import type { Request, Response, NextFunction } from "express";

/**
 * Attaches an AbortSignal to the request that fires when the client goes
 * away before the response is complete. Runs handed this signal stop at
 * their next model or tool call.
 */
export function clientDisconnect(req: Request, res: Response, next: NextFunction): void {
  const abortController = new AbortController();
  req.abortSignal = abortController.signal;

  res.on("close", () => {
    if (!res.writableEnded) {
      console.log(`[ClientDisconnect] Client disconnected: ${req.method} ${req.path}`);
      abortController.abort();
    }
  });

  next();
}

declare global {
  namespace Express {
    interface Request {
      abortSignal?: AbortSignal;
    }
  }
}
