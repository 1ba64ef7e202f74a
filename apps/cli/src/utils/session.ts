/**
 * Shared preamble of commands that talk to a model: authenticate, then pick
 * the model named by --model or the provider's default.
 */

import type { ILanguageModel } from "@relaykit/sdk";
import { createProviderRegistry } from "@relaykit/core";
import type { OpenRouterProvider } from "@relaykit/provider-openrouter";
import { stringFlag, type ParsedArgs } from "../commands/base.js";

export async function openModel(provider: OpenRouterProvider, args: ParsedArgs): Promise<ILanguageModel | undefined> {
  const outcome = await provider.authenticate();
  if (outcome.status !== "success") {
    console.error(outcome.error.message);
    if (outcome.status === "credentials_not_found") {
      console.error(`Set ${provider.settings.apiKeyEnvVar} or run: relaykit auth login <key>`);
    }
    return undefined;
  }

  const registry = createProviderRegistry();
  registry.register(provider);

  const modelId = stringFlag(args, "model");
  if (modelId) {
    const resolved = registry.resolveModel(modelId);
    if (!resolved) {
      console.error(`Unknown model: ${modelId}. Run "relaykit models" to list them.`);
    }
    return resolved?.model;
  }

  const model = registry.get(provider.id)?.defaultModel();
  if (!model) {
    console.error("No models configured");
  }
  return model;
}
