#!/usr/bin/env node

/**
 * Listing Engine CLI entry point
 */

import { createProgram } from "./cli.js";
import { isVerbose } from "./lib/env.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { colorize } from "./lib/render.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    process.stderr.write(colorize(`Error: ${formatCliError(err, isVerbose())}\n`, "red", process.stderr));
    process.exitCode = mapErrorToExitCode(err);
  });
