/**
 * Tests for the commander program, run in process
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { CommanderError } from "commander";
import { logger } from "@listing-engine/sdk";
import { ScriptedPrompter, CapturedOutput } from "@listing-engine/testkit";
import { createProgram } from "../src/cli.js";
import { CliError } from "../src/lib/errors.js";
import { GOODBYE, MENU_TITLE } from "../src/menu.js";

function setup(answers: string[]) {
  const prompter = new ScriptedPrompter(answers);
  const output = new CapturedOutput();
  const written: string[] = [];
  const program = createProgram({ prompter, output })
    .exitOverride()
    .configureOutput({
      writeOut: (str) => written.push(str),
      writeErr: (str) => written.push(str),
    });
  return { program, prompter, output, written };
}

describe("listings program", () => {
  afterEach(() => {
    logger.setLevel("info");
    vi.restoreAllMocks();
  });

  it("should run the menu against the given I/O", async () => {
    const { program, output } = setup(["1", "A", "Austin", "100000", "house", "7"]);

    await program.parseAsync(["node", "listings"]);

    expect(output.lines).toContain(MENU_TITLE);
    expect(output.lines).toContain("Property added successfully with ID: 1");
    expect(output.lines.at(-1)).toBe(GOODBYE);
  });

  it("should hide the menu with --quiet", async () => {
    const { program, output } = setup(["7"]);

    await program.parseAsync(["node", "listings", "--quiet"]);

    expect(output.lines).toEqual([GOODBYE]);
  });

  it("should reject --verbose together with --quiet", async () => {
    const { program } = setup(["7"]);

    const run = program.parseAsync(["node", "listings", "--verbose", "--quiet"]);

    await expect(run).rejects.toThrow(CliError);
    await expect(run).rejects.toThrow("Cannot use both --verbose and --quiet");
  });

  it("should reject an unknown --log-level", async () => {
    const { program, written } = setup(["7"]);

    await expect(program.parseAsync(["node", "listings", "--log-level", "loud"])).rejects.toThrow(
      CommanderError
    );
    expect(written.join("")).toContain("log level must be one of debug, info, warn, error");
  });

  it("should apply --log-level to the engine logger", async () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const { program } = setup(["1", "A", "Austin", "100000", "house", "7"]);

    await program.parseAsync(["node", "listings", "--log-level", "debug"]);

    const messages = debug.mock.calls.map((call) => String(call[0]));
    expect(messages.some((m) => m.includes("[DEBUG] [catalog.add]"))).toBe(true);
  });

  it("should print the package version", async () => {
    const { program, written } = setup([]);

    await expect(program.parseAsync(["node", "listings", "--version"])).rejects.toMatchObject({
      code: "commander.version",
    });
    expect(written.join("")).toBe("0.1.0\n");
  });
});
