/**
 * In-process helpers for driving the interactive menu under test
 */

/**
 * Answers prompts from a fixed script; reports end of input once it runs out
 */
export class ScriptedPrompter {
  #answers: string[];
  /** Every question asked, in order */
  readonly questions: string[] = [];

  constructor(answers: string[]) {
    this.#answers = [...answers];
  }

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.#answers.shift() ?? null;
  }

  /** Answers never consumed */
  get remaining(): number {
    return this.#answers.length;
  }
}

/**
 * Collects written lines
 */
export class CapturedOutput {
  readonly lines: string[] = [];

  writeLine(line: string): void {
    this.lines.push(line);
  }

  /**
   * Lines following the first line equal to `marker`, up to the next blank line
   */
  blockAfter(marker: string): string[] {
    const start = this.lines.indexOf(marker);
    if (start === -1) {
      return [];
    }
    const block: string[] = [];
    for (const line of this.lines.slice(start + 1)) {
      if (line === "") break;
      block.push(line);
    }
    return block;
  }
}
