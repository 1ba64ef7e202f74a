/**
 * Provider interface: LLM backends.
 */

import type { CompletionEvent, Message } from "./message.js";
import type { ForcedToolSpec, ToolJsonSchema } from "./tool.js";
import type {
  AuthenticationOutcome,
  CredentialListener,
  CredentialOrigin,
} from "./credentials.js";

/** Information about a model offered by a provider. */
export interface ModelDescriptor {
  id: string;
  name: string;
  contextWindow: number;
  maxOutputTokens?: number;
}

/** Immutable identity of a provider instance. */
export interface ProviderIdentity {
  readonly id: string;
  readonly name: string;
}

/** How the model may use the offered tools. */
export type ToolChoice = "auto" | "none" | "required" | { name: string };

/** A chat completion request. */
export interface ChatRequest {
  messages: Message[];
  systemPrompt?: string;
  tools?: ToolJsonSchema[];
  toolChoice?: ToolChoice;
  maxTokens?: number;
  temperature?: number;
  stop?: string[];
  signal?: AbortSignal;
}

/** A handle on one model of a provider. */
export interface ILanguageModel {
  readonly descriptor: ModelDescriptor;
  readonly providerId: string;
  maxTokenCount(): number;
  maxOutputTokens(): number | undefined;
  /** Provider-side token count of the request's prompt. */
  countTokens(request: ChatRequest): Promise<number>;
  /** Lazy, single-use stream. Ending iteration early cancels the request. */
  streamCompletion(request: ChatRequest): AsyncIterable<CompletionEvent>;
  /** Forces a call to `tool`; yields the raw argument JSON of that call. */
  useAnyTool(request: ChatRequest, tool: ForcedToolSpec): AsyncIterable<string>;
}

/** Provider adapter interface. */
export interface IProvider extends ProviderIdentity {
  isAuthenticated(): boolean;
  authenticate(): Promise<AuthenticationOutcome>;
  setCredential(secret: string): Promise<void>;
  resetCredential(): Promise<void>;
  credentialOrigin(): CredentialOrigin | undefined;
  /** Returns an unsubscribe function. */
  subscribe(listener: CredentialListener): () => void;
  listModels(): ModelDescriptor[];
  defaultModel(): ILanguageModel | undefined;
  model(id: string): ILanguageModel | undefined;
}
