/**
 * Line-based terminal prompts, with an echo-free variant for passwords.
 */

import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";

export interface Prompt {
  /** Ask a question and return the answer line */
  ask(question: string): Promise<string>;
  /** Ask without echoing what is typed */
  askSecret(question: string): Promise<string>;
  close(): void;
}

/** Forwards writes to a target stream unless muted */
class MutableOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    if (!this.muted) this.target.write(chunk);
    callback();
  }
}

export function createTerminalPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompt {
  const mutable = new MutableOutput(output);
  const terminal = "isTTY" in input && input.isTTY === true;
  const rl = createInterface({ input, output: mutable, terminal });

  return {
    ask: (question) => rl.question(question),
    async askSecret(question) {
      output.write(question);
      mutable.muted = true;
      try {
        return await rl.question("");
      } finally {
        mutable.muted = false;
        output.write("\n");
      }
    },
    close: () => rl.close(),
  };
}
