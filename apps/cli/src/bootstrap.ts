/**
 * Bootstrap: host configuration and the provider the CLI commands share.
 *
 * Layout under RELAYKIT_HOME (default ~/.relaykit):
 *   ~/.relaykit/
 *   └── credentials/   # Encrypted API keys, one file per endpoint URL
 *
 * Settings come from ./relaykit.json, or the file named by --config.
 */

import { mkdir, readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { ConfigError } from "@relaykit/sdk";
import {
  HostConfigSchema,
  SecureStore,
  createLogger,
  isErrnoException,
  validateInput,
  type HostConfig,
} from "@relaykit/shared";
import { OpenRouterProvider } from "@relaykit/provider-openrouter";
import { stringFlag, type ParsedArgs, type ProviderFactory } from "./commands/base.js";

const logger = createLogger("cli:bootstrap");

export const CONFIG_FILE_NAME = "relaykit.json";

export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.RELAYKIT_HOME || join(homedir(), ".relaykit");
}

export function credentialsDir(home: string): string {
  return join(home, "credentials");
}

/**
 * Load and validate the host configuration.
 *
 * A missing ./relaykit.json means defaults; a missing file named explicitly
 * is an error.
 */
export async function loadConfig(configPath?: string, cwd: string = process.cwd()): Promise<HostConfig> {
  const path = configPath ? resolve(cwd, configPath) : join(cwd, CONFIG_FILE_NAME);

  let raw: string | undefined;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (!(isErrnoException(err) && err.code === "ENOENT") || configPath) {
      throw new ConfigError(`Cannot read config file ${path}`, { cause: err });
    }
    logger.debug("No config file, using defaults", { path });
  }

  let input: unknown = {};
  if (raw !== undefined) {
    try {
      input = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(`Config file ${path} is not valid JSON`, { cause: err });
    }
  }

  const result = validateInput(HostConfigSchema, input);
  if (!result.success) {
    throw new ConfigError(`Invalid config file ${path}: ${result.error}`);
  }
  return result.data;
}

export interface HostOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/** Provider wired to the configured settings and the encrypted store under RELAYKIT_HOME. */
export async function createHostProvider(args: ParsedArgs, options: HostOptions = {}): Promise<OpenRouterProvider> {
  const env = options.env ?? process.env;
  const config = await loadConfig(stringFlag(args, "config"), options.cwd);

  const basePath = credentialsDir(resolveHome(env));
  await mkdir(basePath, { recursive: true, mode: 0o700 });

  return new OpenRouterProvider({
    settings: config.openrouter,
    store: new SecureStore({ basePath }),
    env,
  });
}

export const defaultProviderFactory: ProviderFactory = (args) => createHostProvider(args);
