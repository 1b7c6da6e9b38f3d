/**
 * I/O seams for the interactive menu
 */

import type { Interface } from "node:readline/promises";

/**
 * Source of answers to prompts
 */
export interface Prompter {
  /**
   * @returns The answer, or null once input has ended
   */
  ask(question: string): Promise<string | null>;
}

/**
 * Sink for menu output
 */
export interface Output {
  writeLine(line: string): void;
}

/**
 * Prompter over a readline interface
 *
 * Lines are read through one iterator for the whole session, so answers that
 * arrive before their prompt (piped or pasted input) are kept. Closing the
 * interface (Ctrl+D, end of piped stdin) ends input.
 */
export function createReadlinePrompter(
  rl: Interface,
  writePrompt: (text: string) => void = (text) => {
    process.stdout.write(text);
  }
): Prompter {
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question: string): Promise<string | null> {
      writePrompt(question);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
  };
}

/**
 * Write lines to stdout
 */
export const stdoutOutput: Output = {
  writeLine(line: string): void {
    process.stdout.write(line + "\n");
  },
};

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}
