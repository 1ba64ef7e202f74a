#!/usr/bin/env node

/**
 * relaykit entry point: CLI subcommand router.
 *
 * Supports:
 *   - relaykit auth status|login <key>|logout
 *   - relaykit models [--json]
 *   - relaykit chat <prompt> [--model <id>] [--system <text>]
 *   - relaykit tokens <prompt> [--model <id>]
 *   - relaykit version [--verbose]
 */

import { parseArgs } from "./utils/args.js";
import { AuthCommand } from "./commands/auth.js";
import { ModelsCommand } from "./commands/models.js";
import { ChatCommand } from "./commands/chat.js";
import { TokensCommand } from "./commands/tokens.js";
import { VersionCommand } from "./commands/version.js";
import type { CliCommand } from "./commands/base.js";

function printHelp(commands: CliCommand[]): void {
  console.log("relaykit - OpenRouter from the command line");
  console.log("");
  console.log("Usage: relaykit <command> [options]");
  console.log("");
  console.log("Commands:");
  for (const command of commands) {
    console.log(`  ${command.name.padEnd(10)} ${command.description}`);
  }
  console.log("");
  console.log("Options:");
  console.log("  --config <path>  Path to relaykit.json (default: ./relaykit.json)");
  console.log("  --model <id>     Model to use (default: the configured default model)");
  console.log("  --verbose        Show detailed output");
  console.log("  --help, -h       Show this help message");
  console.log("");
  console.log("Environment:");
  console.log("  OPENROUTER_API_KEY  API key (takes precedence over the stored key)");
  console.log("  RELAYKIT_HOME       Data directory (default: ~/.relaykit)");
  console.log("  LOG_LEVEL           debug | info | warn | error");
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));

  const commands: CliCommand[] = [
    new AuthCommand(),
    new ModelsCommand(),
    new ChatCommand(),
    new TokensCommand(),
    new VersionCommand(),
  ];

  if (parsed.flags.help === true || parsed.flags.h === true || parsed.command === "") {
    printHelp(commands);
    return 0;
  }

  const command = commands.find((cmd) => cmd.name === parsed.command);
  if (!command) {
    console.error(`Unknown command: ${parsed.command}`);
    console.error(`Available commands: ${commands.map((cmd) => cmd.name).join(", ")}`);
    return 1;
  }

  return command.execute(parsed);
}

// Always run: this file is the CLI entry point
main()
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
