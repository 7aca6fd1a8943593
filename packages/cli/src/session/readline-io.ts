// ─── Readline IO ───────────────────────────────────────────────────
// SessionIO over a pair of streams, one line at a time.

import { createInterface } from "node:readline/promises";
import type { Interface } from "node:readline/promises";
import type { SessionIO } from "./game-session";

export interface ReadlineIO extends SessionIO {
  close(): void;
}

/**
 * Writes prompts to `output` without a newline and reads answers from
 * `input`. Lines go through console.log so they interleave with other
 * console output in order.
 */
export function createReadlineIO(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): ReadlineIO {
  const rl: Interface = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async readLine(prompt) {
      output.write(prompt);
      const next = await lines.next();
      return next.done === true ? null : next.value;
    },
    writeLine(line) {
      console.log(line);
    },
    close() {
      rl.close();
    },
  };
}
