/**
 * Auth command - inspect, store or remove the OpenRouter API key.
 *
 *   relaykit auth status
 *   relaykit auth login <key>
 *   relaykit auth logout
 */

import type { OpenRouterProvider } from "@relaykit/provider-openrouter";
import { defaultProviderFactory } from "../bootstrap.js";
import { describeError, type CliCommand, type ParsedArgs, type ProviderFactory } from "./base.js";

export class AuthCommand implements CliCommand {
  name = "auth";
  description = "Show, store or remove the API key";

  constructor(private readonly createProvider: ProviderFactory = defaultProviderFactory) {}

  async execute(args: ParsedArgs): Promise<number> {
    const [subcommand = "status", ...rest] = args.positional;

    let provider: OpenRouterProvider;
    try {
      provider = await this.createProvider(args);
    } catch (err) {
      console.error(describeError(err));
      return 1;
    }

    switch (subcommand) {
      case "status":
        return this.status(provider);
      case "login":
        return this.login(provider, rest[0]);
      case "logout":
        return this.logout(provider);
      default:
        console.error(`Unknown auth subcommand: ${subcommand}`);
        console.error("Usage: relaykit auth status|login <key>|logout");
        return 1;
    }
  }

  private async status(provider: OpenRouterProvider): Promise<number> {
    const envVar = provider.settings.apiKeyEnvVar;
    const outcome = await provider.authenticate();

    switch (outcome.status) {
      case "success":
        console.log(
          outcome.origin === "environment"
            ? `Authenticated (API key from the ${envVar} environment variable)`
            : "Authenticated (API key from the secret store)",
        );
        return 0;
      case "credentials_not_found":
        console.log(`Not configured. Set ${envVar} or run: relaykit auth login <key>`);
        return 1;
      case "malformed":
        console.error("The stored API key is unreadable. Replace it with: relaykit auth login <key>");
        return 1;
      case "store_unavailable":
        console.error(`Secret store unavailable: ${outcome.error.message}`);
        return 1;
    }
  }

  private async login(provider: OpenRouterProvider, key: string | undefined): Promise<number> {
    if (!key) {
      console.error("Usage: relaykit auth login <key>");
      return 1;
    }
    try {
      await provider.setCredential(key);
    } catch (err) {
      console.error(describeError(err));
      return 1;
    }
    console.log("API key saved.");
    return 0;
  }

  private async logout(provider: OpenRouterProvider): Promise<number> {
    const envVar = provider.settings.apiKeyEnvVar;
    await provider.authenticate();
    if (provider.credentialOrigin() === "environment") {
      console.error(`The API key comes from the ${envVar} environment variable. Unset it to log out.`);
      return 1;
    }
    await provider.resetCredential();
    console.log("API key removed.");
    return 0;
  }
}
