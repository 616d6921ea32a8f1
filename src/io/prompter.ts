import { createInterface, Interface } from "node:readline";
import { InputClosedError } from "../errors.js";

export interface Prompter {
  ask(question: string): Promise<string>;
  print(line?: string): void;
  close(): void;
}

type PendingQuestion = {
  resolve: (answer: string) => void;
  reject: (error: Error) => void;
};

/**
 * Line-queued prompter over readline. Lines that arrive before a question is
 * asked (piped or pasted input) are kept and answer the next questions in order.
 */
export class ConsolePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly queued: string[] = [];
  private pending?: PendingQuestion;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
    options: { terminal?: boolean } = {}
  ) {
    this.rl = createInterface({ input, output, terminal: options.terminal });
    this.rl.on("line", (line: string) => {
      const pending = this.pending;
      if (pending) {
        this.pending = undefined;
        pending.resolve(line);
        return;
      }
      this.queued.push(line);
    });
    this.rl.on("close", () => {
      this.closed = true;
      const pending = this.pending;
      this.pending = undefined;
      pending?.reject(new InputClosedError());
    });
    // Ctrl-C ends the session the same way as end of input.
    this.rl.on("SIGINT", () => this.rl.close());
  }

  ask(question: string): Promise<string> {
    if (this.pending) {
      return Promise.reject(new Error("A question is already waiting for an answer."));
    }

    const queued = this.queued.shift();
    if (queued !== undefined) {
      this.output.write(question);
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.reject(new InputClosedError());
    }

    this.rl.setPrompt(question);
    this.rl.prompt(true);
    return new Promise<string>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  print(line = ""): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
