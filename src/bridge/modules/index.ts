import type { Capabilities } from "../../protocols/wire/types.js";
import type { ModuleRegistry } from "../registry.js";
import { builtins } from "./builtins.js";
import { frame } from "./frame.js";
import { math } from "./math.js";
import { ndarray } from "./ndarray.js";

export function registerBuiltins(registry: ModuleRegistry, capabilities: Readonly<Capabilities>): ModuleRegistry {
  registry.register("math", math).register("builtins", builtins);
  if (capabilities.arrays) registry.register("ndarray", ndarray);
  if (capabilities.tables) registry.register("frame", frame);
  return registry;
}
