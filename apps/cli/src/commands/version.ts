/**
 * Version command - display version information.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { describeError, type CliCommand, type ParsedArgs } from "./base.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageManifestSchema = z.object({ version: z.string() });

export class VersionCommand implements CliCommand {
  name = "version";
  description = "Display version information";

  constructor(private readonly manifestPath: string = resolve(__dirname, "../../package.json")) {}

  async execute(args: ParsedArgs): Promise<number> {
    let version: string;
    try {
      const manifest = PackageManifestSchema.parse(JSON.parse(await readFile(this.manifestPath, "utf-8")));
      version = manifest.version;
    } catch (err) {
      console.error(`Failed to read version information: ${describeError(err)}`);
      return 1;
    }

    console.log(`relaykit v${version}`);

    if (args.flags.verbose) {
      console.log(`Node.js ${process.version}`);
      console.log(`Platform: ${process.platform} ${process.arch}`);
    }

    return 0;
  }
}
