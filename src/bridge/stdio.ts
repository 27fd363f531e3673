/**
 * Stdio worker loop: stdin carries one request per line, stdout one response
 * per line, stderr logs only. Requests are handled strictly one at a time.
 */

import { createInterface, type Interface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { serializeLine } from "../protocols/envelope/codec.js";
import { getLogger, type Logger } from "../shared/logging.js";
import type { Dispatcher } from "./dispatcher.js";

export interface StdioBridgeOptions {
  dispatcher: Dispatcher;
  input?: Readable;
  output?: Writable;
  logger?: Logger;
}

/** Resolves once the line has been handed to the underlying stream. */
function writeLine(output: Writable, obj: unknown): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(serializeLine(obj), (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/**
 * Emits the ready envelope, then answers every input line until the input
 * ends. Rejects if the output stream fails.
 */
export async function runStdioBridge(options: StdioBridgeOptions): Promise<void> {
  const { dispatcher } = options;
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const logger = options.logger ?? getLogger();

  let rl: Interface | undefined;
  const onOutputError = (err: Error) => {
    logger.error({ err }, "output stream failed");
    rl?.close();
  };
  // Listener is in place before the first write; a failed write rejects below.
  output.on("error", onOutputError);

  let handled = 0;
  try {
    const ready = dispatcher.ready();
    await writeLine(output, ready);
    logger.info({ arrays: ready.arrays, tables: ready.tables }, "bridge ready");

    // Input is only read once the interface exists; the loop below attaches in the same tick.
    rl = createInterface({ input, crlfDelay: Infinity });
    for await (const line of rl) {
      const response = await dispatcher.handleLine(line);
      if (!response) continue;
      await writeLine(output, response);
      handled++;
    }
  } finally {
    output.off("error", onOutputError);
    rl?.close();
    logger.debug({ handled }, "input closed");
  }
}
