/**
 * Listing Engine CLI program
 */

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { createInterface, type Interface } from "node:readline/promises";
import { z } from "zod";
import { logger, openCatalog } from "@listing-engine/sdk";
import { MenuSession } from "./menu.js";
import { parseLogLevel } from "./lib/arg.js";
import { isVerbose } from "./lib/env.js";
import { CliError } from "./lib/errors.js";
import { createReadlinePrompter, stdoutOutput, type Output, type Prompter } from "./lib/io.js";
import { colorize } from "./lib/render.js";

const PackageJsonSchema = z.object({ version: z.string() });

// Read package.json for version
const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"))
);

const ProgramOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
});

/**
 * I/O overrides; the terminal is used for whatever is left out
 */
export interface CliIo {
  prompter?: Prompter;
  output?: Output;
}

/**
 * Build the `listings` program
 */
export function createProgram(io: CliIo = {}): Command {
  const program = new Command();

  program
    .name("listings")
    .description("Listing Engine - in-memory property catalog")
    .version(packageJson.version)
    .option("--verbose", "Print per-action timing metrics to stderr")
    .option("--quiet", "Do not print the menu before each prompt")
    .option("--log-level <level>", "Minimum engine log level (debug, info, warn, error)", parseLogLevel)
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
    })
    .action(async () => {
      const opts = ProgramOptionsSchema.parse(program.opts());

      if (opts.verbose && opts.quiet) {
        throw new CliError("Cannot use both --verbose and --quiet");
      }

      if (opts.logLevel) {
        logger.setLevel(opts.logLevel);
      }

      const catalog = openCatalog();
      const output = io.output ?? stdoutOutput;
      let rl: Interface | null = null;
      let prompter = io.prompter;
      if (!prompter) {
        rl = createInterface({ input: process.stdin, output: process.stdout });
        prompter = createReadlinePrompter(rl);
      }

      try {
        await new MenuSession(catalog, prompter, output, {
          verbose: opts.verbose ?? isVerbose(),
          quiet: opts.quiet ?? false,
        }).run();
      } finally {
        rl?.close();
      }
    });

  return program;
}
