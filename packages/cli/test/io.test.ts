/**
 * Tests for the readline-backed prompter
 */

import { describe, it, expect } from "vitest";
import { Readable } from "node:stream";
import { createInterface } from "node:readline/promises";
import { openCatalog } from "@listing-engine/sdk";
import { CapturedOutput } from "@listing-engine/testkit";
import { createReadlinePrompter } from "../src/lib/io.js";
import { MenuSession, CHOICE_PROMPT, GOODBYE } from "../src/menu.js";

function prompterOver(text: string) {
  const rl = createInterface({ input: Readable.from([text]), terminal: false });
  const prompts: string[] = [];
  const prompter = createReadlinePrompter(rl, (prompt) => {
    prompts.push(prompt);
  });
  return { rl, prompter, prompts };
}

describe("createReadlinePrompter", () => {
  it("should return each line in order, then null once input ends", async () => {
    const { rl, prompter, prompts } = prompterOver("first\nsecond\n");

    expect(await prompter.ask("a? ")).toBe("first");
    expect(await prompter.ask("b? ")).toBe("second");
    expect(await prompter.ask("c? ")).toBeNull();
    expect(prompts).toEqual(["a? ", "b? ", "c? "]);

    rl.close();
  });

  it("should keep answers that arrive before their prompt", async () => {
    const { rl, prompter, prompts } = prompterOver("1\nA\nAustin\n100000\nhouse\n6\n7\n");
    const catalog = openCatalog();
    const output = new CapturedOutput();

    await new MenuSession(catalog, prompter, output, { quiet: true }).run();
    rl.close();

    expect(output.lines).toContain("Property added successfully with ID: 1");
    expect(output.lines).toContain("All Properties (1):");
    expect(output.lines[output.lines.length - 1]).toBe(GOODBYE);
    expect(catalog.listAll()).toEqual([
      { id: 1, title: "A", location: "Austin", price: 100000, category: "house" },
    ]);
    expect(prompts[0]).toBe(CHOICE_PROMPT);
    expect(prompts[prompts.length - 1]).toBe(CHOICE_PROMPT);
  });
});
