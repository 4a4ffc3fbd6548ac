import { createInterface } from 'readline/promises';

/** Operator interaction; the terminal implementation reads stdin */
export interface Prompter {
  /** Yes/no question. Anything but an explicit yes is a no. */
  confirm(question: string): Promise<boolean>;
  /** Free-text choice among `options`; null when the answer names none of them */
  choose(question: string, options: string[]): Promise<string | null>;
}

export class TerminalPrompter implements Prompter {
  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout,
  ) {}

  async confirm(question: string): Promise<boolean> {
    const answer = await this.ask(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  }

  async choose(question: string, options: string[]): Promise<string | null> {
    const answer = await this.ask(`${question} Options:\n\t${options.join('\n\t')}\n $ `);
    const picked = answer.trim();
    return options.includes(picked) ? picked : null;
  }

  private async ask(question: string): Promise<string> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  }
}
