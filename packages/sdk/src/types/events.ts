/**
 * Event system types and constants.
 */

/** Handler function for events. */
export type EventHandler = (event: ProviderEvent) => void | Promise<void>;

/** EventBus interface for pub/sub communication. */
export interface EventBus {
  on(type: string, handler: EventHandler): () => void;
  once(type: string, handler: EventHandler): () => void;
  onAny(handler: EventHandler): () => void;
  emit(event: ProviderEvent): void;
}

/** A typed event emitted by a provider runtime. */
export interface ProviderEvent {
  type: string;
  timestamp: number;
  payload?: unknown;
}

/** Core event type constants. */
export const ProviderEventType = {
  // Credentials
  CREDENTIAL_CHANGED: "credential:changed",

  // Requests
  REQUEST_STARTED: "request:started",
  REQUEST_FINISHED: "request:finished",
  REQUEST_FAILED: "request:failed",
  REQUEST_CANCELLED: "request:cancelled",
} as const;

export type ProviderEventTypeValue = (typeof ProviderEventType)[keyof typeof ProviderEventType];
