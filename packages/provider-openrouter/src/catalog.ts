/**
 * Models offered when settings list none.
 */

import type { ModelDescriptor } from "@relaykit/sdk";
import type { AvailableModel } from "@relaykit/shared";

export const BUILTIN_MODELS: readonly AvailableModel[] = [
  { name: "openai/gpt-4o", displayName: "GPT-4o", maxTokens: 128000, maxOutputTokens: 16384 },
  { name: "anthropic/claude-3.5-sonnet", displayName: "Claude 3.5 Sonnet", maxTokens: 200000, maxOutputTokens: 8192 },
  { name: "google/gemini-flash-1.5", displayName: "Gemini 1.5 Flash", maxTokens: 1000000, maxOutputTokens: 8192 },
  { name: "meta-llama/llama-3.1-70b-instruct", displayName: "Llama 3.1 70B Instruct", maxTokens: 131072 },
];

export function toDescriptor(model: AvailableModel): ModelDescriptor {
  const maxOutputTokens = model.maxOutputTokens ?? model.maxCompletionTokens;
  return {
    id: model.name,
    name: model.displayName ?? model.name,
    contextWindow: model.maxTokens,
    ...(maxOutputTokens !== undefined ? { maxOutputTokens } : {}),
  };
}

/** Configured models, or the built-in list when none are configured. */
export function resolveCatalog(availableModels: readonly AvailableModel[]): ModelDescriptor[] {
  const source = availableModels.length > 0 ? availableModels : BUILTIN_MODELS;
  return source.map(toDescriptor);
}
