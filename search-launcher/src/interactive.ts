import { createInterface } from "node:readline/promises";
import type { Readable, Writable } from "node:stream";

const EXIT_WORDS = new Set(["quit", "exit", "q"]);

export type QueryHandler = (query: string) => Promise<string>;

/**
 * Prompts for queries until an exit word or end of input, writing whatever
 * the handler reports after each one.
 */
export async function runInteractive(
  input: Readable,
  output: Writable,
  handler: QueryHandler,
  prompt = "Enter search query: "
): Promise<number> {
  const rl = createInterface({ input, output, terminal: false });
  let handled = 0;

  output.write(prompt);
  try {
    for await (const line of rl) {
      const query = line.trim();
      if (EXIT_WORDS.has(query.toLowerCase())) {
        output.write("Goodbye!\n");
        break;
      }

      if (query) {
        output.write(`${await handler(query)}\n`);
        handled++;
      } else {
        output.write("Please enter a valid search query\n");
      }
      output.write(prompt);
    }
  } finally {
    rl.close();
  }

  return handled;
}
