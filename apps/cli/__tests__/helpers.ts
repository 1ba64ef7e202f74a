import { vi } from "vitest";
import { MemorySecretStore, MockUpstream } from "@relaykit/sdk/testing";
import type { Logger, ProviderSettingsInput } from "@relaykit/shared";
import { OpenRouterProvider } from "@relaykit/provider-openrouter";
import type { ParsedArgs, ProviderFactory } from "../src/commands/base.js";

export const API_URL = "https://openrouter.ai/api/v1";

export function stubLogger(): Logger {
  const logger: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
    setContext: vi.fn(),
    time: () => () => 0,
  };
  return logger;
}

export interface TestHost {
  provider: OpenRouterProvider;
  upstream: MockUpstream;
  store: MemorySecretStore;
  factory: ProviderFactory;
}

export function createTestHost(
  options: { env?: NodeJS.ProcessEnv; settings?: ProviderSettingsInput; store?: MemorySecretStore } = {},
): TestHost {
  const upstream = new MockUpstream();
  const store = options.store ?? new MemorySecretStore();
  const provider = new OpenRouterProvider({
    settings: options.settings,
    store,
    fetch: upstream.fetch,
    env: options.env ?? {},
    logger: stubLogger(),
  });
  return { provider, upstream, store, factory: async () => provider };
}

export function args(command: string, positional: string[] = [], flags: ParsedArgs["flags"] = {}): ParsedArgs {
  return { command, flags, positional };
}

/** Every console.log / console.error line, joined per call. */
export function captureConsole() {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  return {
    log: () => log.mock.calls.map((call) => call.join(" ")),
    error: () => error.mock.calls.map((call) => call.join(" ")),
    restore: () => {
      log.mockRestore();
      error.mockRestore();
    },
  };
}
