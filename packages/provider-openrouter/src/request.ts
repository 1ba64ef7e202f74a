/**
 * Request construction: conversation → OpenRouter chat completions body and headers.
 */

import { z } from "zod";
import type { ChatRequest, ForcedToolSpec, Message, ToolChoice, ToolJsonSchema } from "@relaykit/sdk";
import { zodToJsonSchema } from "@relaykit/shared";
import type { WireMessage, WireRequestBody, WireToolCall, WireToolChoice } from "./wire.js";

export interface HeaderOptions {
  secret: string;
  stream: boolean;
  /** Sent as X-Title. */
  appName?: string;
  /** Sent as HTTP-Referer. */
  appUrl?: string;
}

export function buildHeaders(options: HeaderOptions): Record<string, string> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${options.secret}`,
    "Content-Type": "application/json",
    Accept: options.stream ? "text/event-stream" : "application/json",
  };
  if (options.appUrl) headers["HTTP-Referer"] = options.appUrl;
  if (options.appName) headers["X-Title"] = options.appName;
  return headers;
}

export function buildRequestBody(modelId: string, request: ChatRequest, options: { stream: boolean }): WireRequestBody {
  const messages = toWireMessages(request.messages);
  if (request.systemPrompt) {
    messages.unshift({ role: "system", content: request.systemPrompt });
  }

  const body: WireRequestBody = { model: modelId, messages, stream: options.stream };
  if (options.stream) body.usage = { include: true };
  if (request.maxTokens !== undefined) body.max_tokens = request.maxTokens;
  if (request.temperature !== undefined) body.temperature = request.temperature;
  if (request.stop && request.stop.length > 0) body.stop = request.stop;
  if (request.tools && request.tools.length > 0) {
    body.tools = request.tools.map((tool) => ({
      type: "function",
      function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    }));
  }
  if (request.toolChoice !== undefined) body.tool_choice = toWireToolChoice(request.toolChoice);
  return body;
}

function toWireToolChoice(choice: ToolChoice): WireToolChoice {
  return typeof choice === "string" ? choice : { type: "function", function: { name: choice.name } };
}

/** Flatten segmented messages into the OpenAI message shape; tool results become `tool` messages. */
export function toWireMessages(messages: Message[]): WireMessage[] {
  const out: WireMessage[] = [];

  for (const message of messages) {
    let text = "";
    const toolCalls: WireToolCall[] = [];
    const toolResults: WireMessage[] = [];

    for (const segment of message.content) {
      switch (segment.type) {
        case "text":
          text += segment.text;
          break;
        case "tool_call":
          toolCalls.push({
            id: segment.toolCall.id,
            type: "function",
            function: { name: segment.toolCall.name, arguments: segment.toolCall.rawArguments },
          });
          break;
        case "tool_result":
          toolResults.push({
            role: "tool",
            tool_call_id: segment.toolResult.toolCallId,
            content: segment.toolResult.result,
          });
          break;
      }
    }

    if (message.role === "assistant") {
      if (toolCalls.length > 0) {
        out.push({ role: "assistant", content: text || null, tool_calls: toolCalls });
      } else if (text) {
        out.push({ role: "assistant", content: text });
      }
    } else if (message.role !== "tool" && text) {
      out.push({ role: message.role, content: text });
    }
    out.push(...toolResults);
  }

  return out;
}

/** JSON Schema form of a forced tool; zod parameters are converted. */
export function forcedToolSchema(tool: ForcedToolSpec): ToolJsonSchema {
  const parameters = tool.parameters instanceof z.ZodType ? zodToJsonSchema(tool.parameters) : tool.parameters;
  return { name: tool.name, description: tool.description, parameters };
}
