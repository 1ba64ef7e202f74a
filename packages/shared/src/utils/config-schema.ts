/**
 * Zod schemas for provider settings and the host configuration file.
 *
 * Validated at load time so a misconfigured field is reported by path
 * instead of failing on the first request.
 */

import { z } from "zod";

export const DEFAULT_OPENROUTER_API_URL = "https://openrouter.ai/api/v1";
export const DEFAULT_API_KEY_ENV_VAR = "OPENROUTER_API_KEY";
export const DEFAULT_MAX_CONCURRENT_REQUESTS = 4;

export const AvailableModelSchema = z.object({
  name: z.string().min(1, "Model name must not be empty"),
  displayName: z.string().optional(),
  maxTokens: z.number().int().positive(),
  maxOutputTokens: z.number().int().positive().optional(),
  maxCompletionTokens: z.number().int().positive().optional(),
});

export const ProviderSettingsSchema = z.object({
  apiUrl: z.string().url().default(DEFAULT_OPENROUTER_API_URL),
  apiKeyEnvVar: z.string().min(1).default(DEFAULT_API_KEY_ENV_VAR),
  maxConcurrentRequests: z.number().int().positive().default(DEFAULT_MAX_CONCURRENT_REQUESTS),
  defaultModel: z.string().optional(),
  availableModels: z.array(AvailableModelSchema).default([]),
  /** Sent as X-Title for OpenRouter app attribution. */
  appName: z.string().optional(),
  /** Sent as HTTP-Referer for OpenRouter app attribution. */
  appUrl: z.string().url().optional(),
});

export const HostConfigSchema = z.object({
  openrouter: ProviderSettingsSchema.default({}),
});

export type AvailableModel = z.infer<typeof AvailableModelSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type ProviderSettingsInput = z.input<typeof ProviderSettingsSchema>;
export type HostConfig = z.infer<typeof HostConfigSchema>;
