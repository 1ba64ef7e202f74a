/**
 * OpenRouter provider. Model handles it hands out share its credential and
 * one rate limiter.
 */

import {
  ConfigError,
  type AuthenticationOutcome,
  type CredentialListener,
  type CredentialOrigin,
  type EventBus,
  type FetchLike,
  type ILanguageModel,
  type IProvider,
  type ModelDescriptor,
  type SecretStore,
} from "@relaykit/sdk";
import {
  ProviderSettingsSchema,
  createLogger,
  validateInput,
  type Logger,
  type ProviderSettings,
  type ProviderSettingsInput,
} from "@relaykit/shared";
import {
  CredentialManager,
  createEventBus,
  createRateLimiter,
  type MetricsCollector,
  type RateLimiter,
} from "@relaykit/core";
import { resolveCatalog } from "./catalog.js";
import { OpenRouterLanguageModel } from "./model.js";

export const OPENROUTER_PROVIDER_ID = "openrouter";
export const OPENROUTER_PROVIDER_NAME = "OpenRouter";

export interface OpenRouterProviderOptions {
  settings?: ProviderSettingsInput;
  store: SecretStore;
  /** Default: the global fetch */
  fetch?: FetchLike;
  /** Default: process.env */
  env?: NodeJS.ProcessEnv;
  bus?: EventBus;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export class OpenRouterProvider implements IProvider {
  readonly id = OPENROUTER_PROVIDER_ID;
  readonly name = OPENROUTER_PROVIDER_NAME;
  readonly settings: ProviderSettings;
  readonly credentials: CredentialManager;
  readonly limiter: RateLimiter;

  private readonly catalog: ModelDescriptor[];
  private readonly handles = new Map<string, OpenRouterLanguageModel>();
  private readonly fetchImpl: FetchLike;
  private readonly bus: EventBus;
  private readonly logger: Logger;
  private readonly metrics?: MetricsCollector;

  constructor(options: OpenRouterProviderOptions) {
    const validated = validateInput(ProviderSettingsSchema, options.settings ?? {});
    if (!validated.success) {
      throw new ConfigError(`Invalid ${OPENROUTER_PROVIDER_NAME} settings: ${validated.error}`);
    }
    this.settings = validated.data;

    this.logger = options.logger ?? createLogger(`provider:${OPENROUTER_PROVIDER_ID}`);
    this.logger.setContext({ providerId: OPENROUTER_PROVIDER_ID });
    this.bus = options.bus ?? createEventBus(this.logger);
    this.metrics = options.metrics;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));

    this.credentials = new CredentialManager({
      providerId: OPENROUTER_PROVIDER_ID,
      endpointUrl: this.settings.apiUrl,
      envVar: this.settings.apiKeyEnvVar,
      store: options.store,
      env: options.env,
      bus: this.bus,
      logger: this.logger.child("credentials"),
    });
    this.limiter = createRateLimiter(this.settings.maxConcurrentRequests, { metrics: this.metrics });
    this.catalog = resolveCatalog(this.settings.availableModels);
  }

  isAuthenticated(): boolean {
    return this.credentials.isAuthenticated();
  }

  authenticate(): Promise<AuthenticationOutcome> {
    return this.credentials.authenticate();
  }

  setCredential(secret: string): Promise<void> {
    return this.credentials.setCredential(secret);
  }

  resetCredential(): Promise<void> {
    return this.credentials.resetCredential();
  }

  credentialOrigin(): CredentialOrigin | undefined {
    return this.credentials.origin;
  }

  subscribe(listener: CredentialListener): () => void {
    return this.credentials.subscribe(listener);
  }

  listModels(): ModelDescriptor[] {
    return this.catalog.map((descriptor) => ({ ...descriptor }));
  }

  /** The configured default model, else the first in the catalog. */
  defaultModel(): ILanguageModel | undefined {
    const configured = this.settings.defaultModel;
    if (configured) {
      const model = this.model(configured);
      if (model) return model;
      this.logger.warn("Configured default model is not in the catalog", { modelId: configured });
    }
    const first = this.catalog[0];
    return first ? this.model(first.id) : undefined;
  }

  model(id: string): ILanguageModel | undefined {
    const cached = this.handles.get(id);
    if (cached) return cached;

    const descriptor = this.catalog.find((m) => m.id === id);
    if (!descriptor) return undefined;

    const handle = new OpenRouterLanguageModel({
      descriptor,
      providerId: this.id,
      apiUrl: this.settings.apiUrl,
      appName: this.settings.appName,
      appUrl: this.settings.appUrl,
      credentials: this.credentials,
      limiter: this.limiter,
      fetch: this.fetchImpl,
      bus: this.bus,
      logger: this.logger.child(id),
      metrics: this.metrics,
    });
    this.handles.set(id, handle);
    return handle;
  }
}

export function createOpenRouterProvider(options: OpenRouterProviderOptions): OpenRouterProvider {
  return new OpenRouterProvider(options);
}
