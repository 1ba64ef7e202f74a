import { describe, it, expect, vi } from "vitest";
import { ProviderEventType } from "@relaykit/sdk";
import type { Logger } from "@relaykit/shared";
import { createEventBus, providerEvent } from "./index.js";

function silentLogger(): Logger {
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

describe("EventBus", () => {
  it("calls handler when matching event is emitted", () => {
    const bus = createEventBus(silentLogger());
    const handler = vi.fn();

    bus.on(ProviderEventType.CREDENTIAL_CHANGED, handler);
    const event = providerEvent(ProviderEventType.CREDENTIAL_CHANGED, { state: "authenticated" });
    bus.emit(event);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it("does not call handler for non-matching event types", () => {
    const bus = createEventBus(silentLogger());
    const handler = vi.fn();

    bus.on(ProviderEventType.REQUEST_STARTED, handler);
    bus.emit(providerEvent(ProviderEventType.REQUEST_FINISHED));

    expect(handler).not.toHaveBeenCalled();
  });

  it("unsubscribes handler via returned function", () => {
    const bus = createEventBus(silentLogger());
    const handler = vi.fn();

    const unsub = bus.on("test:event", handler);
    bus.emit(providerEvent("test:event"));
    unsub();
    bus.emit(providerEvent("test:event"));

    expect(handler).toHaveBeenCalledOnce();
  });

  it("once() handler fires only once", () => {
    const bus = createEventBus(silentLogger());
    const handler = vi.fn();

    bus.once("test:event", handler);
    bus.emit(providerEvent("test:event"));
    bus.emit(providerEvent("test:event"));

    expect(handler).toHaveBeenCalledOnce();
  });

  it("once() does not skip the next handler in the same emit", () => {
    const bus = createEventBus(silentLogger());
    const after = vi.fn();

    bus.once("test:event", vi.fn());
    bus.on("test:event", after);
    bus.emit(providerEvent("test:event"));

    expect(after).toHaveBeenCalledOnce();
  });

  it("onAny() receives all events and can be unsubscribed", () => {
    const bus = createEventBus(silentLogger());
    const handler = vi.fn();

    const unsub = bus.onAny(handler);
    bus.emit(providerEvent("type:a"));
    bus.emit(providerEvent("type:b"));
    unsub();
    bus.emit(providerEvent("type:c"));

    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("isolates a throwing handler and logs it", () => {
    const logger = silentLogger();
    const bus = createEventBus(logger);
    const goodHandler = vi.fn();

    bus.on("test:event", () => {
      throw new Error("boom");
    });
    bus.on("test:event", goodHandler);
    bus.emit(providerEvent("test:event"));

    expect(goodHandler).toHaveBeenCalledOnce();
    expect(logger.error).toHaveBeenCalledWith("Sync handler error", { type: "test:event", error: "Error: boom" });
  });

  it("isolates a rejecting async handler", async () => {
    const logger = silentLogger();
    const bus = createEventBus(logger);

    bus.on("test:event", async () => {
      throw new Error("async boom");
    });
    bus.emit(providerEvent("test:event"));
    await new Promise((r) => setTimeout(r, 0));

    expect(logger.error).toHaveBeenCalledWith("Async handler error", { type: "test:event", error: "Error: async boom" });
  });
});
