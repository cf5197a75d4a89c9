import {
  ThrottlingException,
  type ConverseCommandInput,
  type ConverseCommandOutput,
  type ConverseStreamOutput,
} from "@aws-sdk/client-bedrock-runtime";
import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  BedrockService,
  BedrockStreamingService,
  accumulateStream,
  fromConverseOutput,
  toBedrockMessages,
  toToolConfiguration,
  type ConverseSender,
  type ConverseStreamSender,
} from "../services/BedrockService.js";
import { ModelError, RunCancelledError } from "../services/errors.js";
import type { InvocationRequest, ModelRequest } from "../types/index.js";
import { quietConsole } from "./helpers.js";

async function* streamOf(events: ConverseStreamOutput[]): AsyncGenerator<ConverseStreamOutput> {
  yield* events;
}

function textDelta(index: number, text: string): ConverseStreamOutput {
  return { contentBlockDelta: { contentBlockIndex: index, delta: { text } } };
}

function toolStart(index: number, toolUseId: string, name: string): ConverseStreamOutput {
  return { contentBlockStart: { contentBlockIndex: index, start: { toolUse: { toolUseId, name } } } };
}

function toolDelta(index: number, input: string): ConverseStreamOutput {
  return { contentBlockDelta: { contentBlockIndex: index, delta: { toolUse: { input } } } };
}

function blockStop(index: number): ConverseStreamOutput {
  return { contentBlockStop: { contentBlockIndex: index } };
}

function messageStop(stopReason: "end_turn" | "tool_use"): ConverseStreamOutput {
  return { messageStop: { stopReason } };
}

function usageEvent(inputTokens: number, outputTokens: number): ConverseStreamOutput {
  return {
    metadata: {
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
      metrics: { latencyMs: 12 },
    },
  };
}

function converseOutput(
  content: NonNullable<NonNullable<ConverseCommandOutput["output"]>["message"]>["content"],
  stopReason: "end_turn" | "tool_use"
): ConverseCommandOutput {
  return {
    output: { message: { role: "assistant", content } },
    stopReason,
    usage: { inputTokens: 30, outputTokens: 12, totalTokens: 42 },
    metrics: { latencyMs: 80 },
    $metadata: {},
  };
}

const request: ModelRequest = {
  system: "Be brief.",
  messages: [{ role: "user", content: [{ type: "text", text: "Hello" }] }],
  tools: [{ name: "send_email", description: "", inputSchema: { type: "object", properties: {} } }],
};

describe("toBedrockMessages", () => {
  it("maps every part and drops empty text", () => {
    const messages = toBedrockMessages([
      {
        role: "assistant",
        content: [
          { type: "text", text: "" },
          { type: "tool_use", id: "t1", name: "send_email", input: { to_email: "a@example.com", cc: undefined } },
        ],
      },
      {
        role: "user",
        content: [
          { type: "tool_result", toolUseId: "t1", text: "sent", isError: false },
          { type: "tool_result", toolUseId: "t2", text: "Error: boom", isError: true },
        ],
      },
    ]);

    expect(messages).toEqual([
      {
        role: "assistant",
        content: [{ toolUse: { toolUseId: "t1", name: "send_email", input: { to_email: "a@example.com" } } }],
      },
      {
        role: "user",
        content: [
          { toolResult: { toolUseId: "t1", content: [{ text: "sent" }], status: "success" } },
          { toolResult: { toolUseId: "t2", content: [{ text: "Error: boom" }], status: "error" } },
        ],
      },
    ]);
  });
});

describe("toToolConfiguration", () => {
  it("is omitted when there are no tools", () => {
    expect(toToolConfiguration([])).toBeUndefined();
  });

  it("fills in a description for tools without one", () => {
    expect(toToolConfiguration(request.tools)).toEqual({
      tools: [
        {
          toolSpec: {
            name: "send_email",
            description: "Tool: send_email",
            inputSchema: { json: { type: "object", properties: {} } },
          },
        },
      ],
    });
  });
});

describe("fromConverseOutput", () => {
  it("collects text and tool requests in order", () => {
    const turn = fromConverseOutput(
      converseOutput(
        [
          { text: "Sending now." },
          { toolUse: { toolUseId: "t1", name: "send_email", input: { to_email: "a@example.com" } } },
        ],
        "tool_use"
      )
    );

    expect(turn).toEqual({
      stopReason: "tool_use",
      text: "Sending now.",
      content: [
        { type: "text", text: "Sending now." },
        { type: "tool_use", id: "t1", name: "send_email", input: { to_email: "a@example.com" } },
      ],
      toolRequests: [{ id: "t1", name: "send_email", arguments: { to_email: "a@example.com" } }],
      usage: { inputTokens: 30, outputTokens: 12 },
    });
  });

  it("reports an unknown stop reason when none is given", () => {
    const turn = fromConverseOutput({
      output: undefined,
      stopReason: undefined,
      usage: undefined,
      metrics: undefined,
      $metadata: {},
    });
    expect(turn.stopReason).toBe("unknown");
    expect(turn.toolRequests).toEqual([]);
  });
});

describe("accumulateStream", () => {
  beforeEach(() => {
    quietConsole();
  });

  it("assembles text and tool input fragments per block", async () => {
    const onToolRequest = vi.fn<(request: InvocationRequest) => void>();

    const turn = await accumulateStream(
      streamOf([
        { messageStart: { role: "assistant" } },
        textDelta(0, "I'll send "),
        textDelta(0, "it."),
        blockStop(0),
        toolStart(1, "t1", "send_email"),
        toolDelta(1, '{"to_email":'),
        toolDelta(1, '"a@example.com"}'),
        blockStop(1),
        messageStop("tool_use"),
        usageEvent(3, 4),
      ]),
      onToolRequest
    );

    expect(turn).toEqual({
      stopReason: "tool_use",
      text: "I'll send it.",
      content: [
        { type: "text", text: "I'll send it." },
        { type: "tool_use", id: "t1", name: "send_email", input: { to_email: "a@example.com" } },
      ],
      toolRequests: [{ id: "t1", name: "send_email", arguments: { to_email: "a@example.com" } }],
      usage: { inputTokens: 3, outputTokens: 4 },
    });
    expect(onToolRequest).toHaveBeenCalledTimes(1);
    expect(onToolRequest).toHaveBeenCalledWith({ id: "t1", name: "send_email", arguments: { to_email: "a@example.com" } });
  });

  it("treats an empty tool input as no arguments", async () => {
    const turn = await accumulateStream(streamOf([toolStart(0, "t1", "list"), blockStop(0), messageStop("tool_use")]));
    expect(turn.toolRequests).toEqual([{ id: "t1", name: "list", arguments: {} }]);
  });

  it("finishes blocks the stream never closed", async () => {
    const turn = await accumulateStream(streamOf([textDelta(0, "partial"), messageStop("end_turn")]));
    expect(turn.text).toBe("partial");
    expect(turn.stopReason).toBe("end_turn");
  });

  it("fails on a stream exception", async () => {
    const outcome = accumulateStream(
      streamOf([
        textDelta(0, "Hi"),
        { throttlingException: new ThrottlingException({ message: "slow down", $metadata: {} }) },
      ])
    );
    await expect(outcome).rejects.toBeInstanceOf(ModelError);
    await expect(outcome).rejects.toThrow("Bedrock stream error: slow down");
  });

  it("fails when streamed tool input is not JSON", async () => {
    const outcome = accumulateStream(streamOf([toolStart(0, "t1", "send_email"), toolDelta(0, "{oops"), blockStop(0)]));
    await expect(outcome).rejects.toThrow(/^Streamed input for tool 'send_email' is not valid JSON/);
  });

  it("keeps going when the tool request callback throws", async () => {
    const turn = await accumulateStream(
      streamOf([toolStart(0, "t1", "ping"), blockStop(0), messageStop("tool_use")]),
      () => {
        throw new Error("listener gone");
      }
    );
    expect(turn.toolRequests).toHaveLength(1);
  });
});

describe("BedrockService", () => {
  beforeEach(() => {
    quietConsole();
  });

  it("sends one Converse request and returns the turn", async () => {
    const sender = vi.fn<ConverseSender>(async () => converseOutput([{ text: "Hi!" }], "end_turn"));
    const service = new BedrockService({ modelId: "test-model", maxTokens: 256 }, sender);

    const turn = await service.converse(request);

    expect(turn).toMatchObject({ stopReason: "end_turn", text: "Hi!", toolRequests: [] });
    const input: ConverseCommandInput | undefined = sender.mock.calls[0]?.[0];
    expect(input).toMatchObject({
      modelId: "test-model",
      system: [{ text: "Be brief." }],
      messages: [{ role: "user", content: [{ text: "Hello" }] }],
      inferenceConfig: { maxTokens: 256, temperature: 0.7 },
    });
    expect(input?.toolConfig?.tools).toHaveLength(1);
  });

  it("wraps API failures in a ModelError", async () => {
    const service = new BedrockService({ modelId: "test-model" }, async () => {
      throw new Error("throttled");
    });
    await expect(service.converse(request)).rejects.toThrow(new ModelError("Bedrock API error: throttled"));
  });

  it("reports cancellation rather than a model failure", async () => {
    const controller = new AbortController();
    controller.abort();
    const service = new BedrockService({ modelId: "test-model" }, async () => {
      throw new Error("Request aborted");
    });
    await expect(service.converse({ ...request, signal: controller.signal })).rejects.toBeInstanceOf(RunCancelledError);
  });
});

describe("BedrockStreamingService", () => {
  beforeEach(() => {
    quietConsole();
  });

  it("folds the stream into a turn and reports tool requests as they complete", async () => {
    const sender = vi.fn<ConverseStreamSender>(async () =>
      streamOf([toolStart(0, "t1", "send_email"), toolDelta(0, "{}"), blockStop(0), messageStop("tool_use")])
    );
    const service = new BedrockStreamingService({ modelId: "test-model" }, sender);
    const onToolRequest = vi.fn<(request: InvocationRequest) => void>();

    const turn = await service.converse({ ...request, onToolRequest });

    expect(turn.stopReason).toBe("tool_use");
    expect(onToolRequest).toHaveBeenCalledWith({ id: "t1", name: "send_email", arguments: {} });
    expect(sender.mock.calls[0]?.[0]).toMatchObject({ modelId: "test-model" });
  });

  it("passes stream errors through unchanged", async () => {
    const service = new BedrockStreamingService({ modelId: "test-model" }, async () =>
      streamOf([{ throttlingException: new ThrottlingException({ message: "slow down", $metadata: {} }) }])
    );
    await expect(service.converse(request)).rejects.toThrow(new ModelError("Bedrock stream error: slow down"));
  });
});
