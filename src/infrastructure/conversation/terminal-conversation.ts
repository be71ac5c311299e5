import { createInterface } from "node:readline";
import { Writable } from "node:stream";
import type { Conversation, PromptOptions } from "../../core/ports/conversation.js";

interface TerminalStreams {
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
}

export interface TerminalConversation extends Conversation {
  /** Stop reading input so the process can exit. */
  close(): void;
}

/**
 * Conversation over a terminal or pipe. One readline interface serves every
 * prompt so buffered lines are not lost between prompts. While a masked
 * prompt is open, readline's echo is dropped; end of input resolves to null.
 */
export const createTerminalConversation = (
  streams: TerminalStreams = { input: process.stdin, output: process.stdout },
): TerminalConversation => {
  const { input, output } = streams;
  let masking = false;

  const echo = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!masking) output.write(chunk);
      callback();
    },
  });

  const rl = createInterface({
    input,
    output: echo,
    terminal: "isTTY" in input && input.isTTY === true,
  });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async prompt(message: string, options: PromptOptions): Promise<string | null> {
      output.write(message);
      masking = options.masked;
      try {
        const next = await lines.next();
        return next.done ? null : next.value;
      } finally {
        if (masking) output.write("\n");
        masking = false;
      }
    },

    info(message: string): void {
      output.write(`${message}\n`);
    },

    error(message: string): void {
      output.write(`${message}\n`);
    },

    close(): void {
      rl.close();
    },
  };
};
