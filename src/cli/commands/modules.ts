import { createRuntime } from "../../bridge/runtime.js";
import { loadConfig } from "../../config.js";
import { initLogger } from "../../shared/logging.js";
import { toCliConfig } from "../utils.js";

export async function runModules(opts: Record<string, unknown>): Promise<void> {
  const config = await loadConfig(toCliConfig(opts));
  const logger = initLogger(config.logLevel, config.logFormat);
  const { registry, codec } = await createRuntime(config, logger);
  process.stdout.write(
    JSON.stringify({ capabilities: codec.capabilities, modules: registry.list() }, null, 2) + "\n"
  );
}
