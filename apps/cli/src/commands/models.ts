/**
 * Models command - list the models the provider offers.
 */

import { defaultProviderFactory } from "../bootstrap.js";
import { describeError, type CliCommand, type ParsedArgs, type ProviderFactory } from "./base.js";

export class ModelsCommand implements CliCommand {
  name = "models";
  description = "List available models";

  constructor(private readonly createProvider: ProviderFactory = defaultProviderFactory) {}

  async execute(args: ParsedArgs): Promise<number> {
    try {
      const provider = await this.createProvider(args);
      const defaultId = provider.defaultModel()?.descriptor.id;

      if (args.flags.json === true) {
        console.log(JSON.stringify(provider.listModels(), null, 2));
        return 0;
      }

      for (const model of provider.listModels()) {
        const marker = model.id === defaultId ? "*" : " ";
        const output = model.maxOutputTokens !== undefined ? `, ${model.maxOutputTokens} output` : "";
        console.log(`${marker} ${model.id}  ${model.name} (${model.contextWindow} context${output})`);
      }
      return 0;
    } catch (err) {
      console.error(describeError(err));
      return 1;
    }
  }
}
