/**
 * ProviderRegistry: lookup of registered providers and their models.
 */

import { ConfigError, type ILanguageModel, type IProvider } from "@relaykit/sdk";
import { createLogger } from "@relaykit/shared";

const logger = createLogger("ProviderRegistry");

export interface ResolvedModel {
  provider: IProvider;
  model: ILanguageModel;
}

export interface ProviderRegistry {
  register(provider: IProvider): void;
  get(id: string): IProvider | undefined;
  /** First registered provider that offers `modelId`. */
  resolveModel(modelId: string): ResolvedModel | undefined;
  list(): IProvider[];
}

export function createProviderRegistry(): ProviderRegistry {
  const providers = new Map<string, IProvider>();

  return {
    register(provider: IProvider): void {
      if (providers.has(provider.id)) {
        throw new ConfigError(`Provider "${provider.id}" is already registered`);
      }
      logger.debug(`Registering provider: ${provider.id}`);
      providers.set(provider.id, provider);
    },

    get(id: string): IProvider | undefined {
      return providers.get(id);
    },

    resolveModel(modelId: string): ResolvedModel | undefined {
      for (const provider of providers.values()) {
        const model = provider.model(modelId);
        if (model) {
          return { provider, model };
        }
      }
      return undefined;
    },

    list(): IProvider[] {
      return [...providers.values()];
    },
  };
}
