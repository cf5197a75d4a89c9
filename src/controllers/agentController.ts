import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import type { AgentService } from "../services/AgentService.js";
import { errorMessage } from "../services/errors.js";
import type {
  ErrorResponse,
  QueryResponse,
  SessionResult,
  StatusResponse,
  ToolsResponse,
} from "../types/index.js";
import { openEventStream, sendError, sendEvent, sendSuccess } from "../utils/index.js";

export type AgentRunner = Pick<AgentService, "run" | "listTools">;

const queryBodySchema = z.object({
  prompt: z.string().trim().min(1, "prompt is required"),
  max_turns: z.number().int().min(1).optional(),
});

type QueryBody = z.infer<typeof queryBodySchema>;

function parseBody(req: { body: unknown }, res: Response): QueryBody | null {
  const parsed = queryBodySchema.safeParse(req.body);
  if (!parsed.success) {
    sendError(res, "Invalid request body", "INVALID_REQUEST", 400, parsed.error.issues);
    return null;
  }
  return parsed.data;
}

export function toQueryResponse(prompt: string, result: SessionResult): QueryResponse {
  return {
    success: result.status !== "error",
    run_id: result.runId,
    prompt,
    response: result.response,
    status: result.status,
    tools_used: result.toolsUsed,
    turns: result.turns,
    cost_usd: result.costUsd ?? 0,
    elapsed_seconds: Math.round(result.elapsedMs / 10) / 100,
    error: result.error,
  };
}

/**
 * Request handlers bound to one agent service
 */
export function createAgentController(agent: AgentRunner) {
  /**
   * POST /api/query
   *
   * Run the agent to completion and return the session result. A failed
   * run is still a 200 with `success: false`.
   */
  async function query(
    req: Request,
    res: Response<QueryResponse | ErrorResponse>,
    next: NextFunction
  ): Promise<void> {
    const body = parseBody(req, res);
    if (!body) return;

    console.log(`[AgentController] Query: "${body.prompt.slice(0, 50)}..."`);

    try {
      const result = await agent.run({ prompt: body.prompt, maxTurns: body.max_turns, signal: req.abortSignal });
      sendSuccess(res, toQueryResponse(body.prompt, result));
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/query/stream
   *
   * Server-sent events: start, one reasoning event per tool request,
   * response or error, then done.
   */
  async function queryStream(req: Request, res: Response): Promise<void> {
    const body = parseBody(req, res);
    if (!body) return;

    console.log(`[AgentController] Streaming query: "${body.prompt.slice(0, 50)}..."`);

    openEventStream(res);
    sendEvent(res, "start", { query: body.prompt });

    try {
      const result = await agent.run({
        prompt: body.prompt,
        maxTurns: body.max_turns,
        signal: req.abortSignal,
        onProgress: (event) => sendEvent(res, "reasoning", { message: event.message, icon: event.icon }),
      });

      if (result.status === "error") {
        sendEvent(res, "error", { message: result.error ?? "Run failed" });
      } else {
        const response = toQueryResponse(body.prompt, result);
        sendEvent(res, "response", {
          response: response.response,
          status: response.status,
          tools_used: response.tools_used,
          turns: response.turns,
          cost_usd: response.cost_usd,
          elapsed_seconds: response.elapsed_seconds,
        });
      }
    } catch (error) {
      console.error("[AgentController] Stream error:", errorMessage(error));
      sendEvent(res, "error", { message: errorMessage(error) });
    } finally {
      sendEvent(res, "done");
      res.end();
    }
  }

  /**
   * GET /api/tools
   *
   * Discover every configured backend and return the merged catalog
   */
  async function tools(
    req: Request,
    res: Response<ToolsResponse | ErrorResponse>,
    next: NextFunction
  ): Promise<void> {
    try {
      sendSuccess(res, await agent.listTools(req.abortSignal));
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /api/status
   */
  function status(_req: Request, res: Response<StatusResponse>): void {
    sendSuccess(res, { status: "ok", timestamp: new Date().toISOString() });
  }

  return { query, queryStream, tools, status };
}
