import type { BridgeConfig } from "../config.js";
import { WireCodec } from "../protocols/wire/codec.js";
import type { Logger } from "../shared/logging.js";
import { Dispatcher } from "./dispatcher.js";
import { registerModuleFiles } from "./loader.js";
import { registerBuiltins } from "./modules/index.js";
import { ModuleRegistry } from "./registry.js";

export interface BridgeRuntime {
  codec: WireCodec;
  registry: ModuleRegistry;
  dispatcher: Dispatcher;
}

/** Codec, registry (built-ins plus configured modules) and dispatcher for one worker. */
export async function createRuntime(config: BridgeConfig, logger?: Logger): Promise<BridgeRuntime> {
  const codec = new WireCodec(config.capabilities);
  const registry = registerBuiltins(new ModuleRegistry(), codec.capabilities);
  await registerModuleFiles(registry, config.modules);
  const dispatcher = new Dispatcher({ registry, codec, logger });
  return { codec, registry, dispatcher };
}
