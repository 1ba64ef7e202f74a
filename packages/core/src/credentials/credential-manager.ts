/**
 * CredentialManager: owns a provider's API key and its authentication state.
 *
 * The key comes either from an environment variable (never persisted) or
 * from the secret store entry keyed by the provider's endpoint URL. Store
 * writes and deletes are best effort: a failure is logged and the local
 * state changes anyway.
 *
 * Operations that touch the store run one at a time in the order they were
 * called, so once an operation resolves its result is what `state` shows,
 * and the most recently called operation decides the final state.
 */

import {
  ConfigError,
  CredentialError,
  ErrorCode,
  ProviderEventType,
  type AuthState,
  type AuthenticationOutcome,
  type Credential,
  type CredentialListener,
  type CredentialOrigin,
  type EventBus,
  type SecretStore,
  type StoredCredential,
} from "@relaykit/sdk";
import { createLogger, type Logger } from "@relaykit/shared";
import { createEventBus, providerEvent } from "../bus/index.js";

/** Credential type label written next to the secret. */
export const BEARER_LABEL = "Bearer";

export interface CredentialManagerOptions {
  providerId: string;
  /** Endpoint URL; also the secret store key. */
  endpointUrl: string;
  /** Environment variable consulted before the store. */
  envVar: string;
  store: SecretStore;
  /** Environment to read `envVar` from. Default: process.env */
  env?: NodeJS.ProcessEnv;
  bus?: EventBus;
  logger?: Logger;
}

export interface CredentialChange {
  providerId: string;
  state: AuthState;
  origin: CredentialOrigin | undefined;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });
const encoder = new TextEncoder();

export class CredentialManager {
  readonly providerId: string;
  readonly endpointUrl: string;
  readonly envVar: string;

  private store: SecretStore;
  private env: NodeJS.ProcessEnv;
  private bus: EventBus;
  private logger: Logger;

  private current: Credential | undefined;
  private authState: AuthState = "unauthenticated";
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  constructor(options: CredentialManagerOptions) {
    this.providerId = options.providerId;
    this.endpointUrl = options.endpointUrl;
    this.envVar = options.envVar;
    this.store = options.store;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? createLogger(`${options.providerId}:credentials`);
    this.bus = options.bus ?? createEventBus(this.logger);
  }

  get state(): AuthState {
    return this.authState;
  }

  /** Origin of the active credential, if any. */
  get origin(): CredentialOrigin | undefined {
    return this.current?.origin;
  }

  isAuthenticated(): boolean {
    return this.current !== undefined;
  }

  /** A frozen copy of the active credential. */
  credential(): Credential | undefined {
    return this.current ? Object.freeze({ ...this.current }) : undefined;
  }

  /** Called after each state transition; returns an unsubscribe function. */
  subscribe(listener: CredentialListener): () => void {
    return this.bus.on(ProviderEventType.CREDENTIAL_CHANGED, (event) => {
      if (isCredentialChange(event.payload) && event.payload.providerId === this.providerId) {
        listener(event.payload.state, event.payload.origin);
      }
    });
  }

  authenticate(): Promise<AuthenticationOutcome> {
    // Queued set/reset calls were issued earlier and must settle first.
    if (this.current && this.pending === 0) {
      return Promise.resolve({ status: "success", origin: this.current.origin });
    }
    return this.serialize(() => this.resolveCredential());
  }

  async setCredential(secret: string): Promise<void> {
    if (secret.length === 0) {
      throw new ConfigError(`Provider "${this.providerId}" API key must not be empty`);
    }

    await this.serialize(async () => {
      try {
        await this.store.write(this.endpointUrl, BEARER_LABEL, encoder.encode(secret));
      } catch (err) {
        this.logger.warn("Failed to persist API key; keeping it for this session only", {
          key: this.endpointUrl,
          error: errorMessage(err),
        });
      }
      this.adopt({ secret, origin: "store" });
    });
  }

  async resetCredential(): Promise<void> {
    await this.serialize(async () => {
      try {
        await this.store.delete(this.endpointUrl);
      } catch (err) {
        this.logger.warn("Failed to delete stored API key", {
          key: this.endpointUrl,
          error: errorMessage(err),
        });
      }
      this.current = undefined;
      this.authState = "unauthenticated";
      this.notify();
    });
  }

  private serialize<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.tail.then(operation, operation);
    this.pending++;
    const settle = (): void => {
      this.pending--;
    };
    this.tail = result.then(settle, settle);
    return result;
  }

  private async resolveCredential(): Promise<AuthenticationOutcome> {
    // An earlier queued operation may already have authenticated us.
    if (this.current) {
      return { status: "success", origin: this.current.origin };
    }

    this.authState = "authenticating";

    const fromEnv = this.env[this.envVar];
    if (fromEnv) {
      this.adopt({ secret: fromEnv, origin: "environment" });
      return { status: "success", origin: "environment" };
    }

    const outcome = await this.readStore();
    if (outcome.status !== "success") {
      this.authState = "unauthenticated";
    }
    return outcome;
  }

  private async readStore(): Promise<AuthenticationOutcome> {
    let stored: StoredCredential | null;
    try {
      stored = await this.store.read(this.endpointUrl);
    } catch (err) {
      this.logger.warn("Secret store unavailable", { key: this.endpointUrl, error: errorMessage(err) });
      return {
        status: "store_unavailable",
        error: new CredentialError(this.providerId, ErrorCode.CREDENTIAL_STORE_UNAVAILABLE, "secret store unavailable", {
          cause: err,
        }),
      };
    }

    if (!stored) {
      this.logger.debug("No API key configured", { envVar: this.envVar });
      return {
        status: "credentials_not_found",
        error: new CredentialError(
          this.providerId,
          ErrorCode.CREDENTIALS_NOT_FOUND,
          `no API key in ${this.envVar} or the secret store`,
        ),
      };
    }

    let secret: string;
    try {
      secret = utf8.decode(stored.secret);
    } catch (err) {
      return this.malformed("stored API key is not valid UTF-8", err);
    }
    if (secret.length === 0) {
      return this.malformed("stored API key is empty");
    }

    this.adopt({ secret, origin: "store" });
    return { status: "success", origin: "store" };
  }

  private malformed(message: string, cause?: unknown): AuthenticationOutcome {
    this.logger.warn("Stored API key could not be decoded", { key: this.endpointUrl });
    return {
      status: "malformed",
      error: new CredentialError(this.providerId, ErrorCode.CREDENTIALS_MALFORMED, message, { cause }),
    };
  }

  private adopt(credential: Credential): void {
    this.current = credential;
    this.authState = "authenticated";
    this.logger.debug("API key adopted", { origin: credential.origin });
    this.notify();
  }

  private notify(): void {
    const change: CredentialChange = {
      providerId: this.providerId,
      state: this.authState,
      origin: this.current?.origin,
    };
    this.bus.emit(providerEvent(ProviderEventType.CREDENTIAL_CHANGED, change));
  }
}

function isCredentialChange(value: unknown): value is CredentialChange {
  return typeof value === "object" && value !== null && "providerId" in value && "state" in value;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
