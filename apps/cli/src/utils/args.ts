/**
 * CLI argument parser.
 *
 * Hand-rolled minimal parser; no external CLI framework needed.
 */

import type { ParsedArgs } from "../commands/base.js";

/** Flags that never take a value, so the argument after them stays positional. */
const BOOLEAN_FLAGS = new Set(["help", "verbose", "json"]);

/**
 * Parse CLI arguments into structured ParsedArgs.
 *
 * Supported formats:
 *   - Long flag with value: --model openai/gpt-4o or --model=openai/gpt-4o
 *   - Boolean flag: --verbose
 *   - Short flag: -h (treated as boolean)
 *   - Command: first non-flag argument
 *   - Positional: remaining non-flag arguments; everything after `--`
 *
 * Examples:
 *   parseArgs(["chat", "--model", "openai/gpt-4o", "Hi"]) → { command: "chat", flags: { model: "openai/gpt-4o" }, positional: ["Hi"] }
 *   parseArgs(["auth", "login", "sk-or-key"]) → { command: "auth", flags: {}, positional: ["login", "sk-or-key"] }
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command = "";

  const take = (arg: string): void => {
    if (!command) {
      command = arg;
    } else {
      positional.push(arg);
    }
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === "--") {
      argv.slice(i + 1).forEach(take);
      break;
    }

    if (arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      if (eq !== -1) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
        continue;
      }
      const next = argv[i + 1];
      if (!BOOLEAN_FLAGS.has(body) && next !== undefined && !next.startsWith("-")) {
        flags[body] = next;
        i++;
        continue;
      }
      flags[body] = true;
      continue;
    }

    // Short flag: -h
    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    take(arg);
  }

  return { command, flags, positional };
}
