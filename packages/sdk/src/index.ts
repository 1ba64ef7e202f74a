// Types
export type {
  MessageRole,
  ToolCallRequest,
  ToolCallResult,
  ContentSegment,
  Message,
  StopReason,
  TokenUsage,
  CompletionEvent,
} from "./types/message.js";

export { userMessage, messageText } from "./types/message.js";

export type { ToolJsonSchema, ForcedToolSpec } from "./types/tool.js";

export type {
  IProvider,
  ILanguageModel,
  ProviderIdentity,
  ChatRequest,
  ToolChoice,
  ModelDescriptor,
} from "./types/provider.js";

export type {
  AuthState,
  AuthenticationOutcome,
  Credential,
  CredentialListener,
  CredentialOrigin,
  SecretStore,
  StoredCredential,
} from "./types/credentials.js";

export type { FetchLike } from "./types/transport.js";

export type {
  EventHandler,
  EventBus,
  ProviderEvent,
  ProviderEventTypeValue,
} from "./types/events.js";

export { ProviderEventType } from "./types/events.js";

// Errors
export {
  RelayError,
  CredentialError,
  TransportError,
  ProtocolError,
  ToolCallError,
  ConfigError,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue, CredentialErrorCode } from "./errors/codes.js";
