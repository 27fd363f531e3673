import { createRuntime } from "../../bridge/runtime.js";
import { loadConfig } from "../../config.js";
import { serializeLine } from "../../protocols/envelope/codec.js";
import { isRecord } from "../../protocols/wire/codec.js";
import { EXIT, exit } from "../../shared/errors.js";
import { initLogger } from "../../shared/logging.js";
import { parseCliValue, toCliConfig } from "../utils.js";

/** Run a single request through the dispatcher and print its response line. */
export async function runCall(
  module: string,
  fn: string,
  args: string[],
  opts: Record<string, unknown>
): Promise<void> {
  const kwargs = typeof opts.kwargs === "string" ? parseCliValue(opts.kwargs) : undefined;
  if (kwargs !== undefined && !isRecord(kwargs)) {
    exit(EXIT.INVALID_ARGS, "--kwargs must be a JSON object");
  }
  const config = await loadConfig(toCliConfig(opts));
  const logger = initLogger(config.logLevel, config.logFormat);
  const { dispatcher } = await createRuntime(config, logger);

  const response = await dispatcher.handleEnvelope({
    m: module,
    f: fn,
    a: args.map(parseCliValue),
    ...(kwargs !== undefined ? { k: kwargs } : {}),
  });
  process.stdout.write(serializeLine(response));
  if ("error" in response) process.exitCode = EXIT.GENERIC_ERROR;
}
