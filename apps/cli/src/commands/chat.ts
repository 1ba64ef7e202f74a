/**
 * Chat command - stream one completion to stdout.
 *
 *   relaykit chat <prompt> [--model <id>] [--system <text>] [--max-tokens <n>] [--verbose]
 *
 * Ctrl+C cancels the request.
 */

import { RelayError, userMessage, type ChatRequest } from "@relaykit/sdk";
import { createLogger } from "@relaykit/shared";
import { defaultProviderFactory } from "../bootstrap.js";
import { openModel } from "../utils/session.js";
import { describeError, stringFlag, type CliCommand, type ParsedArgs, type ProviderFactory } from "./base.js";

const logger = createLogger("cli:chat");

export class ChatCommand implements CliCommand {
  name = "chat";
  description = "Send a prompt and stream the reply";

  constructor(private readonly createProvider: ProviderFactory = defaultProviderFactory) {}

  async execute(args: ParsedArgs): Promise<number> {
    const prompt = args.positional.join(" ").trim();
    if (!prompt) {
      console.error("Usage: relaykit chat <prompt> [--model <id>] [--system <text>]");
      return 1;
    }

    const maxTokensFlag = stringFlag(args, "max-tokens");
    const maxTokens = maxTokensFlag === undefined ? undefined : Number(maxTokensFlag);
    if (maxTokens !== undefined && (!Number.isInteger(maxTokens) || maxTokens < 1)) {
      console.error(`--max-tokens must be a positive integer, got ${maxTokensFlag}`);
      return 1;
    }

    const controller = new AbortController();
    const onInterrupt = (): void => controller.abort();
    process.once("SIGINT", onInterrupt);

    try {
      const provider = await this.createProvider(args);
      const model = await openModel(provider, args);
      if (!model) return 1;

      const request: ChatRequest = {
        messages: [userMessage(prompt)],
        systemPrompt: stringFlag(args, "system"),
        maxTokens,
        signal: controller.signal,
      };

      let endsWithNewline = true;
      for await (const event of model.streamCompletion(request)) {
        switch (event.type) {
          case "text_delta":
            process.stdout.write(event.text);
            endsWithNewline = event.text.endsWith("\n");
            break;
          case "tool_call":
            console.log(`\n[tool call] ${event.toolCall.name} ${event.toolCall.rawArguments}`);
            endsWithNewline = true;
            break;
          case "usage":
            if (args.flags.verbose === true) {
              const { promptTokens, completionTokens, totalTokens } = event.usage;
              console.error(`[usage] prompt ${promptTokens}, completion ${completionTokens}, total ${totalTokens}`);
            }
            break;
          case "stop":
            if (!endsWithNewline) process.stdout.write("\n");
            if (event.reason !== "end_turn" && event.reason !== "tool_use") {
              console.error(`[stopped: ${event.reason}]`);
            }
            break;
        }
      }
      return 0;
    } catch (err) {
      if (!(err instanceof RelayError)) logger.debug("Chat failed", { error: describeError(err) });
      console.error(describeError(err));
      return 1;
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }
  }
}
