import { describe, it, expect } from "vitest";
import { HostConfigSchema, ProviderSettingsSchema } from "./config-schema.js";
import { validateInput } from "./validation.js";

describe("ProviderSettingsSchema", () => {
  it("fills defaults for an empty object", () => {
    expect(ProviderSettingsSchema.parse({})).toEqual({
      apiUrl: "https://openrouter.ai/api/v1",
      apiKeyEnvVar: "OPENROUTER_API_KEY",
      maxConcurrentRequests: 4,
      availableModels: [],
    });
  });

  it("rejects a non-positive concurrency limit", () => {
    const result = validateInput(ProviderSettingsSchema, { maxConcurrentRequests: 0 });
    expect(result).toEqual({
      success: false,
      error: "maxConcurrentRequests: Number must be greater than 0",
    });
  });

  it("reports the path of a bad model entry", () => {
    const result = validateInput(ProviderSettingsSchema, {
      availableModels: [{ name: "", maxTokens: 1000 }],
    });
    expect(result).toEqual({
      success: false,
      error: "availableModels.0.name: Model name must not be empty",
    });
  });
});

describe("HostConfigSchema", () => {
  it("defaults the openrouter section", () => {
    const config = HostConfigSchema.parse({});
    expect(config.openrouter.apiUrl).toBe("https://openrouter.ai/api/v1");
  });
});
