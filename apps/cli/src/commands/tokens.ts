/**
 * Tokens command - count a prompt's tokens against a model's context window.
 */

import { userMessage } from "@relaykit/sdk";
import { createTokenAccountant } from "@relaykit/core";
import { defaultProviderFactory } from "../bootstrap.js";
import { openModel } from "../utils/session.js";
import { describeError, stringFlag, type CliCommand, type ParsedArgs, type ProviderFactory } from "./base.js";

export class TokensCommand implements CliCommand {
  name = "tokens";
  description = "Count the tokens of a prompt";

  constructor(private readonly createProvider: ProviderFactory = defaultProviderFactory) {}

  async execute(args: ParsedArgs): Promise<number> {
    const prompt = args.positional.join(" ").trim();
    if (!prompt) {
      console.error("Usage: relaykit tokens <prompt> [--model <id>] [--system <text>]");
      return 1;
    }

    try {
      const provider = await this.createProvider(args);
      const model = await openModel(provider, args);
      if (!model) return 1;

      const budget = await createTokenAccountant().checkBudget(model, {
        messages: [userMessage(prompt)],
        systemPrompt: stringFlag(args, "system"),
      });

      console.log(`Model: ${model.descriptor.id}`);
      console.log(`Prompt tokens: ${budget.promptTokens}`);
      console.log(`Context window: ${budget.contextWindow}`);
      console.log(`Output reserve: ${budget.outputReserve}`);
      console.log(`Available: ${budget.available}${budget.fits ? "" : " (does not fit)"}`);
      return budget.fits ? 0 : 2;
    } catch (err) {
      console.error(describeError(err));
      return 1;
    }
  }
}
