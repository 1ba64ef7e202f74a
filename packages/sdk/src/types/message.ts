/**
 * Conversation messages and the streamed completion events a provider emits.
 */

export type MessageRole = "user" | "assistant" | "system" | "tool";

/** A fully specified request from the model to invoke a tool. */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Argument JSON exactly as the upstream sent it. */
  rawArguments: string;
}

/** The result of a tool invocation, fed back to the model. */
export interface ToolCallResult {
  toolCallId: string;
  name: string;
  result: string;
  isError?: boolean;
}

/** A segment of content within a message. */
export type ContentSegment =
  | { type: "text"; text: string }
  | { type: "tool_call"; toolCall: ToolCallRequest }
  | { type: "tool_result"; toolResult: ToolCallResult };

/** A single message in the conversation. */
export interface Message {
  role: MessageRole;
  content: ContentSegment[];
}

/** Why the model stopped producing output. */
export type StopReason = "end_turn" | "tool_use" | "max_tokens" | "content_filter" | "error";

/** Token usage reported by the upstream for one request. */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/**
 * One incremental unit of a streamed response.
 *
 * Events of a stream keep upstream arrival order. `text_delta` payloads
 * concatenate to the full text; `tool_call` is only emitted once the call
 * is complete; `stop` is always the last event.
 */
export type CompletionEvent =
  | { type: "text_delta"; text: string }
  | { type: "tool_call"; toolCall: ToolCallRequest }
  | { type: "usage"; usage: TokenUsage }
  | { type: "stop"; reason: StopReason };

/** Build a user message holding plain text. */
export function userMessage(text: string): Message {
  return { role: "user", content: [{ type: "text", text }] };
}

/** Concatenate the text segments of a message. */
export function messageText(message: Message): string {
  return message.content
    .map((segment) => (segment.type === "text" ? segment.text : ""))
    .join("");
}
