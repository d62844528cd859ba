import { createInterface, type Interface } from 'readline';

/** Asks a question and resolves with the answer, or `undefined` at end of input. */
export interface Prompter {
  ask(question: string): Promise<string | undefined>;
  close(): void;
}

export interface OutputSink {
  write(text: string): unknown;
}

/**
 * Reads one line per question from a stream. Lines are pulled from a single
 * iterator so input piped in ahead of the prompts is not lost.
 */
export class LinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(input: NodeJS.ReadableStream, private readonly output: OutputSink) {
    this.rl = createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(question: string): Promise<string | undefined> {
    this.output.write(question);
    const next = await this.lines.next();
    return next.done ? undefined : next.value;
  }

  close(): void {
    this.rl.close();
  }
}
