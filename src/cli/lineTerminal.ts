// src/cli/lineTerminal.ts
//
// Thin readline wrapper: one question at a time, null once input is closed (Ctrl-D / EOF).

import readline from "readline";

const CLEAR_SCREEN = "\x1b[H\x1b[2J";

export interface Terminal {
  ask(question: string): Promise<string | null>;
  print(line?: string): void;
  clear(): void;
}

export class LineTerminal implements Terminal {
  private readonly rl: readline.Interface;
  private closed = false;
  private pending: ((answer: string | null) => void) | undefined;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on("close", () => {
      this.closed = true;
      const resolve = this.pending;
      this.pending = undefined;
      resolve?.(null);
    });
  }

  ask(question: string): Promise<string | null> {
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.pending = resolve;
      this.rl.question(question, (answer) => {
        this.pending = undefined;
        resolve(answer);
      });
    });
  }

  print(line = ""): void {
    this.output.write(`${line}\n`);
  }

  clear(): void {
    this.output.write(CLEAR_SCREEN);
  }

  close(): void {
    this.rl.close();
  }
}
