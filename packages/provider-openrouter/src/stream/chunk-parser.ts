/**
 * CompletionChunkParser: turns decoded SSE payloads into CompletionEvents.
 *
 * Text deltas pass straight through. Tool-call fragments are buffered per
 * index and emitted whole once a finish reason arrives or the stream ends.
 * Usage is emitted when reported, and the single `stop` event is held back
 * until `[DONE]` (or end of body) so it is always last.
 */

import {
  ErrorCode,
  ProtocolError,
  TransportError,
  type CompletionEvent,
  type StopReason,
  type ToolCallRequest,
} from "@relaykit/sdk";
import { formatZodError } from "@relaykit/shared";
import {
  CompletionChunkSchema,
  UpstreamErrorSchema,
  type ToolCallDelta,
  type WireUsage,
} from "../wire.js";

export const DONE_SENTINEL = "[DONE]";

interface PendingToolCall {
  id: string;
  name: string;
  arguments: string;
}

const FINISH_REASONS: Record<string, StopReason> = {
  stop: "end_turn",
  end_turn: "end_turn",
  tool_calls: "tool_use",
  function_call: "tool_use",
  length: "max_tokens",
  content_filter: "content_filter",
  error: "error",
};

export function mapFinishReason(reason: string): StopReason {
  return FINISH_REASONS[reason] ?? "end_turn";
}

export function mapUsage(usage: WireUsage): { promptTokens: number; completionTokens: number; totalTokens: number } {
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens ?? usage.prompt_tokens + usage.completion_tokens,
  };
}

export class CompletionChunkParser {
  private pending = new Map<number, PendingToolCall>();
  private stopReason: StopReason | undefined;
  private done = false;

  constructor(private readonly providerId: string) {}

  /** True once the stop event has been produced. */
  get finished(): boolean {
    return this.done;
  }

  /** Parse one `data` payload. Throws TransportError or ProtocolError on a terminal failure. */
  push(payload: string): CompletionEvent[] {
    if (this.done) return [];
    if (payload.trim() === DONE_SENTINEL) {
      return this.complete();
    }

    let value: unknown;
    try {
      value = JSON.parse(payload);
    } catch (err) {
      throw new ProtocolError(this.providerId, "chunk is not valid JSON", { cause: err, chunk: payload });
    }

    const upstreamError = UpstreamErrorSchema.safeParse(value);
    if (upstreamError.success) {
      const { message, code } = upstreamError.data.error;
      throw new TransportError(this.providerId, message, {
        code: ErrorCode.UPSTREAM_ERROR,
        statusCode: typeof code === "number" ? code : undefined,
      });
    }

    const parsed = CompletionChunkSchema.safeParse(value);
    if (!parsed.success) {
      throw new ProtocolError(this.providerId, `unexpected chunk shape (${formatZodError(parsed.error)})`, {
        chunk: payload,
      });
    }

    const events: CompletionEvent[] = [];
    const choice = parsed.data.choices[0];
    if (choice) {
      const content = choice.delta?.content;
      if (content) {
        events.push({ type: "text_delta", text: content });
      }
      for (const fragment of choice.delta?.tool_calls ?? []) {
        this.accumulate(fragment);
      }
      if (choice.finish_reason) {
        this.stopReason = mapFinishReason(choice.finish_reason);
        events.push(...this.flushToolCalls());
      }
    }

    if (parsed.data.usage) {
      events.push({ type: "usage", usage: mapUsage(parsed.data.usage) });
    }
    return events;
  }

  /**
   * The body ended. Without `[DONE]` this is tolerated only when a finish
   * reason was already seen; otherwise the stream was cut short.
   */
  end(): CompletionEvent[] {
    if (this.done) return [];
    if (this.stopReason === undefined) {
      throw new TransportError(this.providerId, "stream ended before completion", {
        code: ErrorCode.STREAM_INTERRUPTED,
      });
    }
    return this.complete();
  }

  private complete(): CompletionEvent[] {
    const events = this.flushToolCalls();
    const reason = this.stopReason ?? (events.length > 0 ? "tool_use" : "end_turn");
    events.push({ type: "stop", reason });
    this.done = true;
    return events;
  }

  private accumulate(fragment: ToolCallDelta): void {
    let call = this.pending.get(fragment.index);
    if (!call) {
      call = { id: "", name: "", arguments: "" };
      this.pending.set(fragment.index, call);
    }
    if (fragment.id) call.id = fragment.id;
    if (fragment.function?.name) call.name += fragment.function.name;
    if (fragment.function?.arguments) call.arguments += fragment.function.arguments;
  }

  private flushToolCalls(): CompletionEvent[] {
    const indices = [...this.pending.keys()].sort((a, b) => a - b);
    const events: CompletionEvent[] = [];
    for (const index of indices) {
      const call = this.pending.get(index);
      if (call) events.push({ type: "tool_call", toolCall: this.toToolCall(index, call) });
    }
    this.pending.clear();
    return events;
  }

  private toToolCall(index: number, call: PendingToolCall): ToolCallRequest {
    if (!call.name) {
      throw new ProtocolError(this.providerId, `tool call at index ${index} has no function name`);
    }
    // A call without arguments takes no parameters.
    const rawArguments = call.arguments.trim() === "" ? "{}" : call.arguments;
    let args: unknown;
    try {
      args = JSON.parse(rawArguments);
    } catch (err) {
      throw new ProtocolError(this.providerId, `arguments of tool call "${call.name}" are not valid JSON`, {
        cause: err,
        chunk: rawArguments,
      });
    }
    if (!isRecord(args)) {
      throw new ProtocolError(this.providerId, `arguments of tool call "${call.name}" are not a JSON object`, {
        chunk: rawArguments,
      });
    }
    return { id: call.id || `call_${index}`, name: call.name, arguments: args, rawArguments };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
