import { createRuntime } from "../../bridge/runtime.js";
import { runStdioBridge } from "../../bridge/stdio.js";
import { loadConfig } from "../../config.js";
import { EXIT, exit } from "../../shared/errors.js";
import { initLogger } from "../../shared/logging.js";
import { toCliConfig } from "../utils.js";

export async function runServe(opts: Record<string, unknown>): Promise<void> {
  const config = await loadConfig(toCliConfig(opts));
  const logger = initLogger(config.logLevel, config.logFormat);
  const { dispatcher, registry } = await createRuntime(config, logger);
  logger.debug({ modules: registry.list().map((m) => m.module) }, "modules registered");

  try {
    await runStdioBridge({ dispatcher, logger });
  } catch (err) {
    exit(EXIT.TRANSPORT_FAILURE, `transport failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}
