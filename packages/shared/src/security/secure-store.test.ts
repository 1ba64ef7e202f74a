import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { SecureStore, credentialFileName } from "./secure-store.js";
import { mkdtemp, rm, readFile, readdir, writeFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";

const KEY = "https://openrouter.ai/api/v1";
const encode = (text: string): Uint8Array => new TextEncoder().encode(text);
const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);

describe("SecureStore", () => {
  let tempDir: string;
  let store: SecureStore;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "securestore-test-"));
    store = new SecureStore({ basePath: tempDir, saltSuffix: "test-suite" });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("credentialFileName()", () => {
    it("is stable per key and hides the URL", () => {
      const name = credentialFileName(KEY);
      expect(name).toBe(credentialFileName(KEY));
      expect(name).toMatch(/^credential-[0-9a-f]{32}\.json$/);
      expect(credentialFileName("https://other.test/v1")).not.toBe(name);
    });
  });

  describe("read() / write() / delete()", () => {
    it("returns null for a key never written", async () => {
      await expect(store.read(KEY)).resolves.toBeNull();
    });

    it("round-trips label and secret bytes", async () => {
      await store.write(KEY, "Bearer", encode("test-secret"));
      const entry = await store.read(KEY);
      expect(entry?.label).toBe("Bearer");
      expect(entry && decode(entry.secret)).toBe("test-secret");
    });

    it("keeps bytes that are not valid UTF-8", async () => {
      await store.write(KEY, "Bearer", new Uint8Array([0xff, 0xfe, 0x41]));
      const entry = await store.read(KEY);
      expect(entry && Array.from(entry.secret)).toEqual([0xff, 0xfe, 0x41]);
    });

    it("overwrites a previous secret", async () => {
      await store.write(KEY, "Bearer", encode("first"));
      await store.write(KEY, "Bearer", encode("second"));
      const entry = await store.read(KEY);
      expect(entry && decode(entry.secret)).toBe("second");
    });

    it("deletes, and tolerates deleting twice", async () => {
      await store.write(KEY, "Bearer", encode("test-secret"));
      await store.delete(KEY);
      await expect(store.delete(KEY)).resolves.toBeUndefined();
      await expect(store.read(KEY)).resolves.toBeNull();
    });

    it("stores ciphertext only", async () => {
      await store.write(KEY, "Bearer", encode("test-secret"));
      const raw = await readFile(store.pathFor(KEY), "utf-8");
      expect(raw.includes("test-secret")).toBe(false);
      expect(Object.keys(JSON.parse(raw)).sort()).toEqual(["data", "iv", "salt", "tag"]);
    });

    it.skipIf(process.platform === "win32")("writes files readable by the owner only", async () => {
      await store.write(KEY, "Bearer", encode("test-secret"));
      const info = await stat(store.pathFor(KEY));
      expect(info.mode & 0o777).toBe(0o600);
    });
  });

  describe("unreadable files", () => {
    it("removes a file encrypted under another salt suffix", async () => {
      await store.write(KEY, "Bearer", encode("test-secret"));
      const other = new SecureStore({ basePath: tempDir, saltSuffix: "someone-else" });

      await expect(other.read(KEY)).resolves.toBeNull();
      await expect(readdir(tempDir)).resolves.toEqual([]);
    });

    it("removes a file that is not an encrypted payload", async () => {
      await writeFile(store.pathFor(KEY), JSON.stringify({ apiKey: "plain" }), "utf-8");
      await expect(store.read(KEY)).resolves.toBeNull();
      await expect(readdir(tempDir)).resolves.toEqual([]);
    });
  });

  describe("concurrency", () => {
    it("concurrent writes to the same key leave one readable value", async () => {
      await Promise.all(
        Array.from({ length: 8 }, (_, i) => store.write(KEY, "Bearer", encode(`value-${i}`))),
      );
      const entry = await store.read(KEY);
      expect(entry && decode(entry.secret)).toMatch(/^value-[0-7]$/);
    });

    it("leaves no lock files behind", async () => {
      await store.write(KEY, "Bearer", encode("a"));
      await store.read(KEY);
      await store.delete(KEY);
      const files = await readdir(tempDir);
      expect(files.filter((f) => f.endsWith(".lock"))).toHaveLength(0);
    });
  });
});
