import type { Response } from "express";
import type { ErrorResponse } from "../types/index.js";

/**
 * Send a standardized error response
 */
export function sendError(
  res: Response,
  message: string,
  code: string,
  statusCode: number = 500,
  details?: unknown
): void {
  const errorResponse: ErrorResponse = { error: message, code, details };
  res.status(statusCode).json(errorResponse);
}

/**
 * Send a success response with data
 */
export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): void {
  res.status(statusCode).json(data);
}

/**
 * Switch the response to a server-sent event stream
 */
export function openEventStream(res: Response): void {
  res.status(200);
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.flushHeaders();
}

/**
 * Write one event; the payload also carries its type for clients that only read `data`
 */
export function sendEvent(res: Response, type: string, data: Record<string, unknown> = {}): void {
  if (res.writableEnded) {
    return;
  }
  res.write(`event: ${type}\ndata: ${JSON.stringify({ type, ...data })}\n\n`);
}
