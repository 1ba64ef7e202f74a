import { describe, it, expect } from "vitest";
import { MemorySecretStore } from "./memory-secret-store.js";

const KEY = "https://api.example.test/v1";

describe("MemorySecretStore", () => {
  it("returns null for a missing key", async () => {
    const store = new MemorySecretStore();
    await expect(store.read(KEY)).resolves.toBeNull();
    expect(store.calls.read).toBe(1);
  });

  it("round-trips label and bytes", async () => {
    const store = new MemorySecretStore();
    await store.write(KEY, "Bearer", new TextEncoder().encode("test-secret"));
    const entry = await store.read(KEY);
    expect(entry?.label).toBe("Bearer");
    expect(new TextDecoder().decode(entry?.secret)).toBe("test-secret");
  });

  it("seed does not count as a write", () => {
    const store = new MemorySecretStore();
    store.seed(KEY, "test-secret");
    expect(store.calls.write).toBe(0);
    expect(store.peek(KEY)).toBe("test-secret");
  });

  it("fails on demand", async () => {
    const store = new MemorySecretStore({ failWrites: true });
    await expect(store.write(KEY, "Bearer", new Uint8Array([1]))).rejects.toThrow("secret store write failed");
    store.setFailures({ failWrites: false, failDeletes: true });
    await store.write(KEY, "Bearer", new Uint8Array([1]));
    await expect(store.delete(KEY)).rejects.toThrow("secret store delete failed");
    expect(store.calls).toEqual({ read: 0, write: 2, delete: 1 });
  });
});
