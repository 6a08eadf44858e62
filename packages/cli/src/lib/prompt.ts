/**
 * Terminal prompts for credentials
 */

import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";
import type { Prompter } from "@opsbridge/sdk";

/**
 * Create a prompter reading from a terminal. Questions go to `output`;
 * answers to `askSecret` are read without echo.
 */
export function createTerminalPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): Prompter {
  async function question(text: string, masked: boolean): Promise<string> {
    let muted = false;
    const sink = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        if (!muted) {
          output.write(chunk);
        }
        callback();
      },
    });
    const rl = createInterface({ input, output: sink, terminal: true });

    try {
      output.write(text);
      muted = masked;
      return await rl.question("");
    } finally {
      rl.close();
      if (masked) {
        output.write("\n");
      }
    }
  }

  return {
    ask: (text) => question(text, false),
    askSecret: (text) => question(text, true),
  };
}
