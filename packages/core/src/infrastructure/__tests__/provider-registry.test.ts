import { describe, it, expect, vi } from "vitest";
import { ConfigError, type CompletionEvent, type ILanguageModel, type IProvider } from "@relaykit/sdk";
import { createProviderRegistry } from "../provider-registry.js";

function stubModel(id: string): ILanguageModel {
  return {
    descriptor: { id, name: id, contextWindow: 8192 },
    providerId: "stub",
    maxTokenCount: () => 8192,
    maxOutputTokens: () => undefined,
    countTokens: vi.fn(async () => 0),
    async *streamCompletion(): AsyncGenerator<CompletionEvent> {
      yield { type: "stop", reason: "end_turn" };
    },
    async *useAnyTool(): AsyncGenerator<string> {
      yield "{}";
    },
  };
}

function stubProvider(id: string, modelIds: string[] = []): IProvider {
  const models = new Map(modelIds.map((modelId) => [modelId, stubModel(modelId)]));
  return {
    id,
    name: `Provider ${id}`,
    isAuthenticated: () => false,
    authenticate: vi.fn(),
    setCredential: vi.fn(),
    resetCredential: vi.fn(),
    credentialOrigin: () => undefined,
    subscribe: () => () => {},
    listModels: () => [...models.values()].map((m) => m.descriptor),
    defaultModel: () => [...models.values()][0],
    model: (modelId: string) => models.get(modelId),
  };
}

describe("ProviderRegistry", () => {
  it("registers and retrieves a provider by id", () => {
    const registry = createProviderRegistry();
    const provider = stubProvider("test-provider");

    registry.register(provider);
    expect(registry.get("test-provider")).toBe(provider);
  });

  it("returns undefined for non-existent provider", () => {
    const registry = createProviderRegistry();
    expect(registry.get("non-existent")).toBeUndefined();
  });

  it("rejects a second provider with the same id", () => {
    const registry = createProviderRegistry();
    registry.register(stubProvider("dup"));
    expect(() => registry.register(stubProvider("dup"))).toThrow(ConfigError);
  });

  it("lists all registered providers", () => {
    const registry = createProviderRegistry();
    const provider1 = stubProvider("provider-1");
    const provider2 = stubProvider("provider-2");

    registry.register(provider1);
    registry.register(provider2);

    expect(registry.list()).toEqual([provider1, provider2]);
  });

  it("resolves a model to its provider", () => {
    const registry = createProviderRegistry();
    const first = stubProvider("first", ["vendor/a"]);
    const second = stubProvider("second", ["vendor/b"]);
    registry.register(first);
    registry.register(second);

    const resolved = registry.resolveModel("vendor/b");
    expect(resolved?.provider).toBe(second);
    expect(resolved?.model.descriptor.id).toBe("vendor/b");
  });

  it("returns undefined for an unknown model", () => {
    const registry = createProviderRegistry();
    registry.register(stubProvider("first", ["vendor/a"]));
    expect(registry.resolveModel("vendor/zzz")).toBeUndefined();
  });
});
