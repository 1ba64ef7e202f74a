/**
 * Base command interface for all CLI subcommands.
 */

import type { OpenRouterProvider } from "@relaykit/provider-openrouter";

export interface ParsedArgs {
  /** Command name (e.g., "chat") */
  command: string;

  /** Named flags (e.g., { model: "openai/gpt-4o", verbose: true }) */
  flags: Record<string, string | boolean>;

  /** Positional arguments (e.g., ["login", "<key>"]) */
  positional: string[];
}

export interface CliCommand {
  /** Command name (e.g., "auth", "chat", "version") */
  name: string;

  /** Command description for help text */
  description: string;

  /** Execute the command with parsed arguments */
  execute(args: ParsedArgs): Promise<number>; // Exit code: 0 = success, 1+ = error
}

/** Builds the provider a command talks to; tests substitute their own. */
export type ProviderFactory = (args: ParsedArgs) => Promise<OpenRouterProvider>;

/** String value of a flag, if it was given one. */
export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags[name];
  return typeof value === "string" ? value : undefined;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
