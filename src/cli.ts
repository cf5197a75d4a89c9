#!/usr/bin/env node
/**
 * mcp-agent <prompt..>
 *
 * Runs one query against the configured backends and prints the result.
 */
import "dotenv/config";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { config } from "./config/index.js";
import { toQueryResponse } from "./controllers/agentController.js";
import { agentService } from "./services/index.js";

async function main(): Promise<number> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName("mcp-agent")
    .usage("$0 [options] <prompt..>")
    .option("max-turns", { type: "number", default: config.agent.maxTurns, describe: "Turn budget" })
    .option("stream", { type: "boolean", describe: "Use the streaming model client" })
    .option("json", { type: "boolean", default: false, describe: "Print the full result as JSON" })
    .demandCommand(1, "A prompt is required")
    .strictOptions()
    .help()
    .parse();

  const prompt = argv._.map(String).join(" ").trim();
  if (!prompt) {
    console.error("A prompt is required");
    return 1;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const result = await agentService.run({
    prompt,
    maxTurns: argv["max-turns"],
    stream: argv.stream,
    signal: controller.signal,
    onProgress: (event) => console.error(`${event.icon} ${event.message}`),
  });

  if (argv.json) {
    console.log(JSON.stringify({ ...toQueryResponse(prompt, result), tool_calls: result.toolCalls }, null, 2));
  } else {
    console.log(result.response || result.error || "");
    console.error(
      `\n[${result.status}] turns=${result.turns} tools=[${result.toolsUsed.join(", ")}] ${(result.elapsedMs / 1000).toFixed(2)}s`
    );
  }
  return result.status === "error" ? 1 : 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[Fatal]", error);
    process.exitCode = 1;
  });
