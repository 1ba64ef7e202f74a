/**
 * Zod schemas for the OpenRouter (OpenAI-compatible) chat completions wire format.
 */

import { z } from "zod";

export const ToolCallDeltaSchema = z.object({
  index: z.number().int().nonnegative(),
  id: z.string().optional(),
  type: z.literal("function").optional(),
  function: z
    .object({
      name: z.string().optional(),
      arguments: z.string().optional(),
    })
    .optional(),
});

export const UsageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative(),
  completion_tokens: z.number().int().nonnegative(),
  total_tokens: z.number().int().nonnegative().optional(),
});

export const ChunkChoiceSchema = z.object({
  index: z.number().int().optional(),
  delta: z
    .object({
      role: z.string().nullish(),
      content: z.string().nullish(),
      tool_calls: z.array(ToolCallDeltaSchema).nullish(),
    })
    .optional(),
  finish_reason: z.string().nullish(),
});

export const CompletionChunkSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z.array(ChunkChoiceSchema).default([]),
  usage: UsageSchema.nullish(),
});

export const UpstreamErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    code: z.union([z.number(), z.string()]).optional(),
  }),
});

/** Non-streamed response; only the parts token counting reads. */
export const CompletionResponseSchema = z.object({
  usage: UsageSchema,
});

export type ToolCallDelta = z.infer<typeof ToolCallDeltaSchema>;
export type WireUsage = z.infer<typeof UsageSchema>;
export type CompletionChunk = z.infer<typeof CompletionChunkSchema>;
export type UpstreamError = z.infer<typeof UpstreamErrorSchema>;

export type WireMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

export interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export interface WireTool {
  type: "function";
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export type WireToolChoice = "auto" | "none" | "required" | { type: "function"; function: { name: string } };

export interface WireRequestBody {
  model: string;
  messages: WireMessage[];
  stream: boolean;
  max_tokens?: number;
  temperature?: number;
  stop?: string[];
  tools?: WireTool[];
  tool_choice?: WireToolChoice;
  usage?: { include: boolean };
}
