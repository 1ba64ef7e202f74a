import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, rm, stat, writeFile } from "node:fs/promises";
import { homedir, tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError } from "@relaykit/sdk";
import { CONFIG_FILE_NAME, createHostProvider, credentialsDir, loadConfig, resolveHome } from "../src/bootstrap.js";
import { args } from "./helpers.js";

describe("bootstrap", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "relaykit-bootstrap-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("resolveHome", () => {
    it("prefers RELAYKIT_HOME", () => {
      expect(resolveHome({ RELAYKIT_HOME: "/srv/relaykit" })).toBe("/srv/relaykit");
      expect(credentialsDir("/srv/relaykit")).toBe(join("/srv/relaykit", "credentials"));
    });

    it("falls back to ~/.relaykit", () => {
      expect(resolveHome({})).toBe(join(homedir(), ".relaykit"));
    });
  });

  describe("loadConfig", () => {
    it("uses defaults when there is no config file", async () => {
      const config = await loadConfig(undefined, tempDir);
      expect(config.openrouter).toEqual({
        apiUrl: "https://openrouter.ai/api/v1",
        apiKeyEnvVar: "OPENROUTER_API_KEY",
        maxConcurrentRequests: 4,
        availableModels: [],
      });
    });

    it("reads relaykit.json from the working directory", async () => {
      await writeFile(
        join(tempDir, CONFIG_FILE_NAME),
        JSON.stringify({ openrouter: { maxConcurrentRequests: 2, defaultModel: "vendor/a" } }),
        "utf-8",
      );
      const config = await loadConfig(undefined, tempDir);
      expect(config.openrouter.maxConcurrentRequests).toBe(2);
      expect(config.openrouter.defaultModel).toBe("vendor/a");
    });

    it("resolves --config against the working directory", async () => {
      await writeFile(join(tempDir, "custom.json"), JSON.stringify({ openrouter: { appName: "Test App" } }), "utf-8");
      const config = await loadConfig("custom.json", tempDir);
      expect(config.openrouter.appName).toBe("Test App");
    });

    it("rejects a missing file named explicitly", async () => {
      const path = join(tempDir, "missing.json");
      await expect(loadConfig("missing.json", tempDir)).rejects.toThrow(`Cannot read config file ${path}`);
    });

    it("rejects invalid JSON", async () => {
      const path = join(tempDir, CONFIG_FILE_NAME);
      await writeFile(path, "{ nope", "utf-8");
      await expect(loadConfig(undefined, tempDir)).rejects.toThrow(ConfigError);
      await expect(loadConfig(undefined, tempDir)).rejects.toThrow(`Config file ${path} is not valid JSON`);
    });

    it("rejects settings that fail validation", async () => {
      const path = join(tempDir, CONFIG_FILE_NAME);
      await writeFile(path, JSON.stringify({ openrouter: { maxConcurrentRequests: 0 } }), "utf-8");
      await expect(loadConfig(undefined, tempDir)).rejects.toThrow(`Invalid config file ${path}: `);
    });
  });

  describe("createHostProvider", () => {
    it("creates the credentials directory and stores keys encrypted there", async () => {
      const home = join(tempDir, "home");
      const provider = await createHostProvider(args("auth"), { env: { RELAYKIT_HOME: home }, cwd: tempDir });

      const dir = credentialsDir(home);
      expect((await stat(dir)).isDirectory()).toBe(true);

      await provider.credentials.setCredential("test-secret");
      const files = await readdir(dir);
      expect(files).toHaveLength(1);
      expect(files[0]).toMatch(/^credential-[0-9a-f]{32}\.json$/);

      const reopened = await createHostProvider(args("auth"), { env: { RELAYKIT_HOME: home }, cwd: tempDir });
      const outcome = await reopened.authenticate();
      expect(outcome.status).toBe("success");
    });

    it("applies the config file", async () => {
      await writeFile(join(tempDir, CONFIG_FILE_NAME), JSON.stringify({ openrouter: { defaultModel: "anthropic/claude-3.5-sonnet" } }), "utf-8");
      const provider = await createHostProvider(args("models"), {
        env: { RELAYKIT_HOME: join(tempDir, "home") },
        cwd: tempDir,
      });
      expect(provider.defaultModel()?.descriptor.id).toBe("anthropic/claude-3.5-sonnet");
    });
  });
});
